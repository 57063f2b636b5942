import type { OptionLetter, QuizQuestion, QuizScore } from '../../models/types';
import type { MissedQuestion } from '../ai/prompts';

export const isCorrectChoice = (selected: string | null, answer: OptionLetter): boolean =>
  selected !== null && selected.startsWith(answer);

export const scoreQuiz = (questions: QuizQuestion[], selections: Array<string | null>): QuizScore => {
  const results = questions.map((question, index) => {
    const selected = selections[index] ?? null;
    return {
      index,
      question: question.question,
      selected,
      answer: question.answer,
      correct: isCorrectChoice(selected, question.answer),
    };
  });

  const correctCount = results.filter((result) => result.correct).length;
  const total = questions.length;

  return {
    correctCount,
    total,
    score: total === 0 ? 0 : correctCount / total,
    results,
  };
};

export const collectMissedQuestions = (questions: QuizQuestion[], score: QuizScore): MissedQuestion[] =>
  score.results
    .filter((result) => !result.correct)
    .map((result) => ({
      number: result.index + 1,
      question: questions[result.index],
      selected: result.selected,
    }));
