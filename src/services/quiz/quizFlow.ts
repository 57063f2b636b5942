import type { QuizRequest, QuizSession, QuizStatus, Transition } from '../../models/types';
import { ApiError } from '../../middlewares/errorHandler';
import { buildExplanationPrompt, buildQuizPrompt } from '../ai/prompts';
import { parseQuizResponse } from './quizParser';
import { collectMissedQuestions, scoreQuiz } from './scoring';

export type QuizRequestPurpose = 'quiz' | 'explanation';

export type QuizTransition = Transition<QuizSession, QuizRequestPurpose>;

export type QuizCommand =
  | { type: 'selectOption'; questionIndex: number; option: string }
  | { type: 'submit' }
  | { type: 'requestExplanations' };

export type QuizEvent =
  | { type: 'quizGenerated'; completion: string }
  | { type: 'quizFailed'; error: string }
  | { type: 'explanationsGenerated'; explanations: string }
  | { type: 'explanationsFailed'; error: string };

export const MAX_QUIZ_QUESTIONS = 20;
export const DEFAULT_QUIZ_QUESTIONS = 5;

const touch = (session: QuizSession, now: Date): QuizSession => ({ ...session, updatedAt: now.toISOString() });

const requireStatus = (session: QuizSession, status: QuizStatus, message: string): void => {
  if (session.status !== status) {
    throw new ApiError(409, message);
  }
};

export const startQuiz = (sessionId: string, request: QuizRequest, now: Date = new Date()): QuizTransition => {
  const topic = request.topic.trim();
  if (!topic) {
    throw new ApiError(400, 'Please provide a quiz topic.');
  }
  if (!Number.isInteger(request.quantity) || request.quantity < 1 || request.quantity > MAX_QUIZ_QUESTIONS) {
    throw new ApiError(400, `quantity must be a whole number between 1 and ${MAX_QUIZ_QUESTIONS}`);
  }

  const session: QuizSession = {
    sessionId,
    kind: 'quiz',
    request: { topic, skills: request.skills, quantity: request.quantity },
    status: 'generating',
    questions: [],
    selections: [],
    result: null,
    pendingExplanationPrompt: null,
    explanations: null,
    generationError: null,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };

  return { session, requests: [{ purpose: 'quiz', prompt: buildQuizPrompt(session.request) }] };
};

export const applyQuizCommand = (session: QuizSession, command: QuizCommand, now: Date = new Date()): QuizTransition => {
  switch (command.type) {
    case 'selectOption': {
      requireStatus(session, 'ready', 'Answers can only be changed before the quiz is submitted');
      const question = session.questions[command.questionIndex];
      if (!Number.isInteger(command.questionIndex) || question === undefined) {
        throw new ApiError(400, `Question ${command.questionIndex + 1} does not exist`);
      }
      if (!question.options.includes(command.option)) {
        throw new ApiError(400, 'Selected option is not one of the question options');
      }

      const selections = [...session.selections];
      selections[command.questionIndex] = command.option;
      return { session: touch({ ...session, selections }, now), requests: [] };
    }

    case 'submit': {
      requireStatus(session, 'ready', 'Quiz is not ready to be submitted');
      const result = scoreQuiz(session.questions, session.selections);
      const missed = collectMissedQuestions(session.questions, result);

      return {
        session: touch(
          {
            ...session,
            status: 'submitted',
            result,
            pendingExplanationPrompt: missed.length > 0 ? buildExplanationPrompt(missed) : null,
          },
          now
        ),
        requests: [],
      };
    }

    case 'requestExplanations': {
      requireStatus(session, 'submitted', 'Submit the quiz before asking for explanations');
      if (session.explanations !== null) {
        return { session, requests: [] };
      }
      if (session.pendingExplanationPrompt === null) {
        return { session, requests: [], notice: 'All answers were correct. Nothing to explain.' };
      }
      return { session, requests: [{ purpose: 'explanation', prompt: session.pendingExplanationPrompt }] };
    }
  }
};

export const applyQuizEvent = (session: QuizSession, event: QuizEvent, now: Date = new Date()): QuizTransition => {
  switch (event.type) {
    case 'quizGenerated': {
      const parsed = parseQuizResponse(event.completion);
      if (!parsed.ok) {
        return {
          session: touch(
            {
              ...session,
              status: 'failed',
              questions: [],
              selections: [],
              generationError: { message: `Failed to parse quiz questions: ${parsed.error}`, rawOutput: event.completion },
            },
            now
          ),
          requests: [],
        };
      }

      return {
        session: touch(
          {
            ...session,
            status: 'ready',
            questions: parsed.questions,
            selections: parsed.questions.map(() => null),
            generationError: null,
          },
          now
        ),
        requests: [],
      };
    }

    case 'quizFailed':
      return {
        session: touch(
          { ...session, status: 'failed', generationError: { message: `Error generating quiz: ${event.error}`, rawOutput: null } },
          now
        ),
        requests: [],
      };

    case 'explanationsGenerated':
      return { session: touch({ ...session, explanations: event.explanations.trim() }, now), requests: [] };

    case 'explanationsFailed':
      return { session, requests: [], notice: `Error generating explanations: ${event.error}` };
  }
};
