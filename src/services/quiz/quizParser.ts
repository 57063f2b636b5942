import type { OptionLetter, QuizQuestion } from '../../models/types';
import { isRecord } from '../../utils/requestFields';

export type ParseResult = { ok: true; questions: QuizQuestion[] } | { ok: false; error: string };

const LETTERS: readonly OptionLetter[] = ['A', 'B', 'C', 'D'];

const isOptionLetter = (value: string): value is OptionLetter =>
  LETTERS.some((letter) => letter === value);

/** Removes a Markdown code fence (``` or ```json) wrapped around a completion. */
export const stripCodeFence = (text: string): string =>
  text
    .trim()
    .replace(/^```(?:json)?[^\S\n]*\n?/i, '')
    .replace(/\n?```$/, '')
    .trim();

const validateQuestion = (item: unknown, number: number): QuizQuestion | string => {
  if (!isRecord(item)) {
    return `Question ${number} is not an object`;
  }

  const { question, options, answer } = item;
  if (typeof question !== 'string' || question.trim() === '') {
    return `Question ${number} has no question text`;
  }

  if (!Array.isArray(options) || options.length !== LETTERS.length) {
    return `Question ${number} must have exactly 4 options`;
  }

  const optionTexts: string[] = [];
  for (const [i, option] of options.entries()) {
    if (typeof option !== 'string' || !option.trim().startsWith(`${LETTERS[i]}.`)) {
      return `Question ${number} option ${i + 1} must be a string starting with "${LETTERS[i]}."`;
    }
    optionTexts.push(option.trim());
  }

  const letter = typeof answer === 'string' ? answer.trim().toUpperCase() : '';
  if (!isOptionLetter(letter)) {
    return `Question ${number} answer must be one of A, B, C or D`;
  }

  return { question: question.trim(), options: optionTexts, answer: letter };
};

/**
 * Decodes a quiz completion. Fenced and unfenced text parse the same way; any
 * shape problem fails the whole batch rather than dropping single questions.
 */
export const parseQuizResponse = (text: string): ParseResult => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(text));
  } catch {
    return { ok: false, error: 'Response is not valid JSON' };
  }

  if (!Array.isArray(decoded) || decoded.length === 0) {
    return { ok: false, error: 'Response must be a non-empty JSON array of questions' };
  }

  const questions: QuizQuestion[] = [];
  for (const [i, item] of decoded.entries()) {
    const result = validateQuestion(item, i + 1);
    if (typeof result === 'string') {
      return { ok: false, error: result };
    }
    questions.push(result);
  }

  return { ok: true, questions };
};
