import { describe, expect, it } from 'vitest';
import type { QuizQuestion } from '../../models/types';
import { collectMissedQuestions, isCorrectChoice, scoreQuiz } from './scoring';

const questions: QuizQuestion[] = [
  { question: 'What is 2 + 2?', options: ['A. 3', 'B. 4', 'C. 5', 'D. 22'], answer: 'B' },
  { question: 'Which is a prime?', options: ['A. 4', 'B. 6', 'C. 9', 'D. 7'], answer: 'D' },
  { question: 'Which is even?', options: ['A. 8', 'B. 3', 'C. 5', 'D. 9'], answer: 'A' },
];

describe('isCorrectChoice', () => {
  it('matches the selected option by its letter prefix', () => {
    expect(isCorrectChoice('B. 4', 'B')).toBe(true);
    expect(isCorrectChoice('A. 3', 'B')).toBe(false);
    expect(isCorrectChoice(null, 'B')).toBe(false);
  });
});

describe('scoreQuiz', () => {
  it('divides correct answers by the number of questions', () => {
    const score = scoreQuiz(questions, ['B. 4', 'A. 4', null]);

    expect(score.correctCount).toBe(1);
    expect(score.total).toBe(3);
    expect(score.score).toBeCloseTo(1 / 3);
    expect(score.results).toEqual([
      { index: 0, question: 'What is 2 + 2?', selected: 'B. 4', answer: 'B', correct: true },
      { index: 1, question: 'Which is a prime?', selected: 'A. 4', answer: 'D', correct: false },
      { index: 2, question: 'Which is even?', selected: null, answer: 'A', correct: false },
    ]);
  });

  it('scores a perfect quiz as 1', () => {
    expect(scoreQuiz(questions, ['B. 4', 'D. 7', 'A. 8']).score).toBe(1);
  });

  it('scores an empty quiz as 0', () => {
    expect(scoreQuiz([], [])).toEqual({ correctCount: 0, total: 0, score: 0, results: [] });
  });
});

describe('collectMissedQuestions', () => {
  it('returns the missed questions with their numbers and choices', () => {
    const missed = collectMissedQuestions(questions, scoreQuiz(questions, ['B. 4', 'A. 4', null]));

    expect(missed).toEqual([
      { number: 2, question: questions[1], selected: 'A. 4' },
      { number: 3, question: questions[2], selected: null },
    ]);
  });
});
