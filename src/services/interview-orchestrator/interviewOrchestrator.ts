import { v4 as uuidv4 } from 'uuid';
import type { CandidateProfile, InterviewSession } from '../../models/types';
import type { SessionStore } from '../../repositories/sessionRepository';
import { ApiError } from '../../middlewares/errorHandler';
import { describeError } from '../ai/textModel';
import type { TextModel } from '../ai/textModel';
import type { InterviewCommand, InterviewEvent, InterviewTransition } from '../interview/interviewFlow';
import {
  applyInterviewCommand,
  applyInterviewEvent,
  listTurns,
  startInterview,
} from '../interview/interviewFlow';
import { buildTranscriptReport } from '../report/transcriptReport';
import { KeyedQueue } from '../../utils/keyedQueue';

export interface InterviewOutcome {
  session: InterviewSession;
  notices: string[];
}

export class InterviewOrchestrator {
  // Commands on one session run one at a time so each sees the previous save.
  private readonly queue = new KeyedQueue();

  constructor(
    private readonly store: SessionStore<InterviewSession>,
    private readonly model: TextModel,
    private readonly createId: () => string = uuidv4
  ) {}

  async initializeInterview(profile: CandidateProfile): Promise<InterviewOutcome> {
    const outcome = await this.run(startInterview(this.createId(), profile));

    // Without a first question there is nothing to show, so the session is not kept.
    if (outcome.session.completed) {
      throw new ApiError(502, outcome.notices[0] ?? 'Error generating question');
    }

    await this.store.save(outcome.session);
    console.log(`📝 Interview ${outcome.session.sessionId} started for "${outcome.session.profile.jobTitle}"`);
    return outcome;
  }

  async getInterviewState(sessionId: string): Promise<InterviewSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new ApiError(404, 'Interview session not found');
    }
    return session;
  }

  async submitAnswer(sessionId: string, answer: string): Promise<InterviewOutcome> {
    return this.dispatch(sessionId, { type: 'submitAnswer', answer });
  }

  async completeInterview(sessionId: string): Promise<InterviewOutcome> {
    return this.dispatch(sessionId, { type: 'endInterview' });
  }

  async getReport(sessionId: string): Promise<string> {
    const session = await this.getInterviewState(sessionId);
    if (!session.completed) {
      throw new ApiError(409, 'The report is available once the interview has ended');
    }
    return buildTranscriptReport(listTurns(session));
  }

  async clearInterview(sessionId: string): Promise<void> {
    const removed = await this.queue.run(sessionId, () => this.store.delete(sessionId));
    if (!removed) {
      throw new ApiError(404, 'Interview session not found');
    }
  }

  private dispatch(sessionId: string, command: InterviewCommand): Promise<InterviewOutcome> {
    return this.queue.run(sessionId, () => this.execute(sessionId, command));
  }

  private async execute(sessionId: string, command: InterviewCommand): Promise<InterviewOutcome> {
    const session = await this.getInterviewState(sessionId);
    const outcome = await this.run(applyInterviewCommand(session, command));

    await this.store.save(outcome.session);
    if (outcome.session.completed) {
      console.log(`✅ Interview ${sessionId} completed (${outcome.session.endReason})`);
    }
    return outcome;
  }

  /** Issues the requested model calls in order, feeding each completion back into the flow. */
  private async run(transition: InterviewTransition): Promise<InterviewOutcome> {
    let session = transition.session;
    const notices = transition.notice ? [transition.notice] : [];

    for (const request of transition.requests) {
      if (session.completed) break;

      const next = applyInterviewEvent(session, await this.callModel(request.purpose, request.prompt));
      session = next.session;
      if (next.notice) notices.push(next.notice);
    }

    return { session, notices };
  }

  private async callModel(purpose: 'feedback' | 'question', prompt: string): Promise<InterviewEvent> {
    try {
      const text = await this.model.generate(prompt);
      return purpose === 'feedback'
        ? { type: 'feedbackGenerated', feedback: text }
        : { type: 'questionGenerated', question: text };
    } catch (error) {
      console.warn(`⚠️ Model call for ${purpose} failed:`, error);
      const message = describeError(error);
      return purpose === 'feedback' ? { type: 'feedbackFailed', error: message } : { type: 'questionFailed', error: message };
    }
  }
}
