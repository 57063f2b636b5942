import type { QuizGenerationError, QuizScore, QuizSession, QuizStatus } from '../../models/types';

export interface QuizQuestionView {
  number: number;
  question: string;
  options: string[];
  selected: string | null;
  answer?: string;
}

export interface QuizView {
  sessionId: string;
  status: QuizStatus;
  topic: string;
  skills: string[];
  questions: QuizQuestionView[];
  result: QuizScore | null;
  explanations: string | null;
  explanationsAvailable: boolean;
  error: QuizGenerationError | null;
}

export const toQuizView = (session: QuizSession): QuizView => {
  const revealAnswers = session.status === 'submitted';

  return {
    sessionId: session.sessionId,
    status: session.status,
    topic: session.request.topic,
    skills: session.request.skills,
    questions: session.questions.map((question, index) => ({
      number: index + 1,
      question: question.question,
      options: question.options,
      selected: session.selections[index] ?? null,
      ...(revealAnswers ? { answer: question.answer } : {}),
    })),
    result: session.result,
    explanations: session.explanations,
    explanationsAvailable: session.pendingExplanationPrompt !== null,
    error: session.generationError,
  };
};
