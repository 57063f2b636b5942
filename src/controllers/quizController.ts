import type { Request, Response, NextFunction } from 'express';
import type { QuizOrchestrator } from '../services/quiz-orchestrator/quizOrchestrator';
import { toQuizView } from '../services/quiz/quizView';
import { DEFAULT_QUIZ_QUESTIONS, MAX_QUIZ_QUESTIONS } from '../services/quiz/quizFlow';
import { ApiError } from '../middlewares/errorHandler';
import { readInteger, readString, readStringList } from '../utils/requestFields';

type SessionParams = { sessionId: string };
type AnswerParams = SessionParams & { questionIndex: string };

export class QuizController {
  constructor(private readonly orchestrator: QuizOrchestrator) {}

  startQuiz = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const topic = readString(req.body, 'topic');
      if (!topic.trim()) {
        throw new ApiError(400, 'Please provide a quiz topic.');
      }

      const { session, notices } = await this.orchestrator.generateQuiz({
        topic,
        skills: readStringList(req.body, 'skills'),
        quantity: readInteger(req.body, 'quantity', {
          fallback: DEFAULT_QUIZ_QUESTIONS,
          min: 1,
          max: MAX_QUIZ_QUESTIONS,
        }),
      });

      res.status(201).json({ success: true, data: { ...toQuizView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  getQuiz = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const session = await this.orchestrator.getQuizState(req.params.sessionId);
      res.json({ success: true, data: toQuizView(session) });
    } catch (error) {
      next(error);
    }
  };

  selectOption = async (req: Request<AnswerParams>, res: Response, next: NextFunction) => {
    try {
      const questionIndex = Number(req.params.questionIndex);
      if (!Number.isInteger(questionIndex) || questionIndex < 0) {
        throw new ApiError(400, 'questionIndex must be a non-negative whole number');
      }

      const option = readString(req.body, 'option');
      if (!option) {
        throw new ApiError(400, 'option is required');
      }

      const { session, notices } = await this.orchestrator.selectOption(req.params.sessionId, questionIndex, option);
      res.json({ success: true, data: { ...toQuizView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  submitQuiz = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const { session, notices } = await this.orchestrator.submitQuiz(req.params.sessionId);
      res.json({ success: true, data: { ...toQuizView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  explainMistakes = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const { session, notices } = await this.orchestrator.explainMistakes(req.params.sessionId);
      res.json({ success: true, data: { ...toQuizView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  clearQuiz = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      await this.orchestrator.clearQuiz(req.params.sessionId);
      res.json({ success: true, message: 'Quiz session cleared' });
    } catch (error) {
      next(error);
    }
  };
}
