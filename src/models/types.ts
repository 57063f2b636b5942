export interface CandidateProfile {
  jobTitle: string;
  resumeText: string;
  jobDescription: string | null;
}

export type InterviewEndReason = 'sentinel' | 'ended-early' | 'question-failed';

export interface InterviewSession {
  sessionId: string;
  kind: 'interview';
  profile: CandidateProfile;
  questions: string[];
  responses: string[];
  feedback: string[];
  currentQuestion: number;
  completed: boolean;
  endReason: InterviewEndReason | null;
  createdAt: string;
  updatedAt: string;
}

export interface InterviewTurn {
  number: number;
  question: string;
  answer: string;
  feedback: string;
}

export type OptionLetter = 'A' | 'B' | 'C' | 'D';

export interface QuizQuestion {
  question: string;
  options: string[];
  answer: OptionLetter;
}

export interface QuizRequest {
  topic: string;
  skills: string[];
  quantity: number;
}

export interface QuestionResult {
  index: number;
  question: string;
  selected: string | null;
  answer: OptionLetter;
  correct: boolean;
}

export interface QuizScore {
  correctCount: number;
  total: number;
  score: number;
  results: QuestionResult[];
}

export type QuizStatus = 'generating' | 'ready' | 'submitted' | 'failed';

export interface QuizGenerationError {
  message: string;
  rawOutput: string | null;
}

export interface QuizSession {
  sessionId: string;
  kind: 'quiz';
  request: QuizRequest;
  status: QuizStatus;
  questions: QuizQuestion[];
  selections: Array<string | null>;
  result: QuizScore | null;
  pendingExplanationPrompt: string | null;
  explanations: string | null;
  generationError: QuizGenerationError | null;
  createdAt: string;
  updatedAt: string;
}

/** A model call a flow transition asks the orchestrator to make. */
export interface ModelRequest<P extends string> {
  purpose: P;
  prompt: string;
}

export interface Transition<S, P extends string> {
  session: S;
  requests: ModelRequest<P>[];
  notice?: string;
}
