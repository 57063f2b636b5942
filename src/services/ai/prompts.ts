import type { CandidateProfile, QuizQuestion, QuizRequest } from '../../models/types';

export interface QuestionPromptInput extends CandidateProfile {
  pastResponses: string;
}

export interface MissedQuestion {
  number: number;
  question: QuizQuestion;
  selected: string | null;
}

/** `Q1: …\nA1: …` blocks for every answered question, separated by a blank line. */
export const formatPastResponses = (questions: string[], responses: string[]): string =>
  responses
    .map((answer, i) => `Q${i + 1}: ${questions[i] ?? ''}\nA${i + 1}: ${answer}`)
    .join('\n\n');

export const buildQuestionPrompt = (input: QuestionPromptInput): string => {
  const isFirst = input.pastResponses.trim() === '';

  return `
You are an AI interviewer conducting a behavioral mock interview for the position of ${input.jobTitle}.

**Candidate Resume:**
${input.resumeText}

**Job Description:**
${input.jobDescription || 'Not provided'}

**Candidate's Previous Answers:**
${input.pastResponses}

Ask the next behavioral interview question. Ask exactly 1 question and nothing else.
${isFirst ? 'Start with an introduction question.' : 'Build on what the candidate has already said where it helps.'}
  `.trim();
};

export const buildFeedbackPrompt = (question: string, answer: string): string =>
  `
You are an expert interview coach. Give constructive feedback on the candidate's answer below,
focusing on clarity, relevance, depth, and communication.

Question: ${question}
Answer: ${answer}

Feedback:
  `.trim();

export const buildQuizPrompt = ({ topic, skills, quantity }: QuizRequest): string => {
  const skillLine = skills.length > 0 ? skills.join(', ') : 'Not specified';

  return `
Create ${quantity} multiple-choice questions on the topic "${topic}".

**Skills to assess:** ${skillLine}

**Return JSON ONLY**, as an array of exactly ${quantity} objects in this shape:

[
  {
    "question": "question text",
    "options": ["A. first option", "B. second option", "C. third option", "D. fourth option"],
    "answer": "A"
  }
]

Every question has exactly four options prefixed "A.", "B.", "C." and "D." in that order.
"answer" is the single letter of the one correct option. Do not add any text outside the JSON.
  `.trim();
};

export const buildExplanationPrompt = (missed: MissedQuestion[]): string => {
  const blocks = missed.map(({ number, question, selected }) =>
    [
      `Question ${number}: ${question.question}`,
      'Options:',
      ...question.options.map((option) => `  ${option}`),
      `Correct answer: ${question.answer}`,
      `Candidate's answer: ${selected ?? 'No answer'}`,
    ].join('\n')
  );

  return `
You are a patient tutor. The candidate got the following quiz questions wrong.
For each one, explain why the correct answer is right and why the candidate's choice is not.
Keep each explanation short and label it with its question number.

${blocks.join('\n\n')}
  `.trim();
};
