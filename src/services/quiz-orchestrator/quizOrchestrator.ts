import { v4 as uuidv4 } from 'uuid';
import type { QuizRequest, QuizSession } from '../../models/types';
import type { SessionStore } from '../../repositories/sessionRepository';
import { ApiError } from '../../middlewares/errorHandler';
import { describeError } from '../ai/textModel';
import type { TextModel } from '../ai/textModel';
import type { QuizCommand, QuizEvent, QuizRequestPurpose, QuizTransition } from '../quiz/quizFlow';
import { applyQuizCommand, applyQuizEvent, startQuiz } from '../quiz/quizFlow';
import { KeyedQueue } from '../../utils/keyedQueue';

export interface QuizOutcome {
  session: QuizSession;
  notices: string[];
}

export class QuizOrchestrator {
  private readonly queue = new KeyedQueue();

  constructor(
    private readonly store: SessionStore<QuizSession>,
    private readonly model: TextModel,
    private readonly createId: () => string = uuidv4
  ) {}

  async generateQuiz(request: QuizRequest): Promise<QuizOutcome> {
    const outcome = await this.run(startQuiz(this.createId(), request));
    await this.store.save(outcome.session);

    const { session } = outcome;
    if (session.status === 'failed') {
      throw new ApiError(502, session.generationError?.message ?? 'Error generating quiz', {
        sessionId: session.sessionId,
        rawOutput: session.generationError?.rawOutput ?? null,
      });
    }

    console.log(`📝 Quiz ${session.sessionId} generated: ${session.questions.length} questions on "${session.request.topic}"`);
    return outcome;
  }

  async getQuizState(sessionId: string): Promise<QuizSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new ApiError(404, 'Quiz session not found');
    }
    return session;
  }

  async selectOption(sessionId: string, questionIndex: number, option: string): Promise<QuizOutcome> {
    return this.dispatch(sessionId, { type: 'selectOption', questionIndex, option });
  }

  async submitQuiz(sessionId: string): Promise<QuizOutcome> {
    const outcome = await this.dispatch(sessionId, { type: 'submit' });
    const { result } = outcome.session;
    if (result) {
      console.log(`✅ Quiz ${sessionId} submitted: ${result.correctCount}/${result.total} correct`);
    }
    return outcome;
  }

  async explainMistakes(sessionId: string): Promise<QuizOutcome> {
    return this.dispatch(sessionId, { type: 'requestExplanations' });
  }

  async clearQuiz(sessionId: string): Promise<void> {
    const removed = await this.queue.run(sessionId, () => this.store.delete(sessionId));
    if (!removed) {
      throw new ApiError(404, 'Quiz session not found');
    }
  }

  private dispatch(sessionId: string, command: QuizCommand): Promise<QuizOutcome> {
    return this.queue.run(sessionId, async () => {
      const session = await this.getQuizState(sessionId);
      const outcome = await this.run(applyQuizCommand(session, command));
      await this.store.save(outcome.session);
      return outcome;
    });
  }

  private async run(transition: QuizTransition): Promise<QuizOutcome> {
    let session = transition.session;
    const notices = transition.notice ? [transition.notice] : [];

    for (const request of transition.requests) {
      const next = applyQuizEvent(session, await this.callModel(request.purpose, request.prompt));
      session = next.session;
      if (next.notice) notices.push(next.notice);
    }

    return { session, notices };
  }

  private async callModel(purpose: QuizRequestPurpose, prompt: string): Promise<QuizEvent> {
    try {
      const text = await this.model.generate(prompt);
      return purpose === 'quiz'
        ? { type: 'quizGenerated', completion: text }
        : { type: 'explanationsGenerated', explanations: text };
    } catch (error) {
      console.warn(`⚠️ Model call for ${purpose} failed:`, error);
      const message = describeError(error);
      return purpose === 'quiz' ? { type: 'quizFailed', error: message } : { type: 'explanationsFailed', error: message };
    }
  }
}
