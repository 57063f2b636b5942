import type { InterviewEndReason, InterviewSession, InterviewTurn } from '../../models/types';
import { listTurns } from './interviewFlow';

export interface InterviewView {
  sessionId: string;
  status: 'in-progress' | 'completed';
  endReason: InterviewEndReason | null;
  jobTitle: string;
  currentQuestion: { number: number; text: string } | null;
  turns: InterviewTurn[];
  message: string | null;
}

export const toInterviewView = (session: InterviewSession): InterviewView => {
  const pending = session.completed ? undefined : session.questions[session.currentQuestion];

  return {
    sessionId: session.sessionId,
    status: session.completed ? 'completed' : 'in-progress',
    endReason: session.endReason,
    jobTitle: session.profile.jobTitle,
    currentQuestion: pending === undefined ? null : { number: session.currentQuestion + 1, text: pending },
    turns: listTurns(session),
    message: session.completed ? 'Mock interview completed!' : null,
  };
};
