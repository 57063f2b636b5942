import type { CandidateProfile, InterviewSession, InterviewTurn, Transition } from '../../models/types';
import { ApiError } from '../../middlewares/errorHandler';
import { buildFeedbackPrompt, buildQuestionPrompt, formatPastResponses } from '../ai/prompts';

export type InterviewRequestPurpose = 'feedback' | 'question';

export type InterviewTransition = Transition<InterviewSession, InterviewRequestPurpose>;

export type InterviewCommand = { type: 'submitAnswer'; answer: string } | { type: 'endInterview' };

export type InterviewEvent =
  | { type: 'feedbackGenerated'; feedback: string }
  | { type: 'feedbackFailed'; error: string }
  | { type: 'questionGenerated'; question: string }
  | { type: 'questionFailed'; error: string };

export const QUIT_SENTINELS = ['quit', 'exit'];
export const FEEDBACK_FAILED_PLACEHOLDER = 'Feedback generation failed.';

export const isQuitSentinel = (answer: string): boolean =>
  QUIT_SENTINELS.includes(answer.trim().toLowerCase());

const questionPrompt = (session: InterviewSession): string =>
  buildQuestionPrompt({
    ...session.profile,
    pastResponses: formatPastResponses(session.questions, session.responses),
  });

const touch = (session: InterviewSession, now: Date): InterviewSession => ({
  ...session,
  updatedAt: now.toISOString(),
});

export const startInterview = (
  sessionId: string,
  profile: CandidateProfile,
  now: Date = new Date()
): InterviewTransition => {
  if (!profile.jobTitle.trim() || !profile.resumeText.trim()) {
    throw new ApiError(400, 'Please provide both the job title and your resume.');
  }

  const session: InterviewSession = {
    sessionId,
    kind: 'interview',
    profile: {
      jobTitle: profile.jobTitle.trim(),
      resumeText: profile.resumeText.trim(),
      jobDescription: profile.jobDescription?.trim() || null,
    },
    questions: [],
    responses: [],
    feedback: [],
    currentQuestion: 0,
    completed: false,
    endReason: null,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };

  return { session, requests: [{ purpose: 'question', prompt: questionPrompt(session) }] };
};

export const applyInterviewCommand = (
  session: InterviewSession,
  command: InterviewCommand,
  now: Date = new Date()
): InterviewTransition => {
  if (session.completed) {
    throw new ApiError(409, 'Interview has already ended');
  }

  if (command.type === 'endInterview') {
    return { session: touch({ ...session, completed: true, endReason: 'ended-early' }, now), requests: [] };
  }

  if (isQuitSentinel(command.answer)) {
    return { session: touch({ ...session, completed: true, endReason: 'sentinel' }, now), requests: [] };
  }

  const answer = command.answer.trim();
  if (!answer) {
    throw new ApiError(400, 'Answer is required');
  }

  const question = session.questions[session.currentQuestion];
  if (question === undefined || session.responses.length !== session.currentQuestion) {
    throw new ApiError(409, 'No question is waiting for an answer');
  }

  const next = touch({ ...session, responses: [...session.responses, answer] }, now);

  return {
    session: next,
    requests: [
      { purpose: 'feedback', prompt: buildFeedbackPrompt(question, answer) },
      { purpose: 'question', prompt: questionPrompt(next) },
    ],
  };
};

export const applyInterviewEvent = (
  session: InterviewSession,
  event: InterviewEvent,
  now: Date = new Date()
): InterviewTransition => {
  switch (event.type) {
    case 'feedbackGenerated':
      return {
        session: touch({ ...session, feedback: [...session.feedback, event.feedback.trim()] }, now),
        requests: [],
      };

    case 'feedbackFailed':
      return {
        session: touch({ ...session, feedback: [...session.feedback, FEEDBACK_FAILED_PLACEHOLDER] }, now),
        requests: [],
        notice: `Error generating feedback: ${event.error}`,
      };

    case 'questionGenerated': {
      const questions = [...session.questions, event.question.trim()];
      return {
        session: touch({ ...session, questions, currentQuestion: questions.length - 1 }, now),
        requests: [],
      };
    }

    case 'questionFailed':
      return {
        session: touch({ ...session, completed: true, endReason: 'question-failed' }, now),
        requests: [],
        notice: `Error generating ${session.questions.length === 0 ? 'question' : 'next question'}: ${event.error}`,
      };
  }
};

/** Completed turns only: a question without an answer is not part of the transcript. */
export const listTurns = (session: InterviewSession): InterviewTurn[] => {
  const count = Math.min(session.questions.length, session.responses.length, session.feedback.length);
  return Array.from({ length: count }, (_, i) => ({
    number: i + 1,
    question: session.questions[i],
    answer: session.responses[i],
    feedback: session.feedback[i],
  }));
};
