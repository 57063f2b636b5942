import { describe, expect, it } from 'vitest';
import { buildTranscriptReport } from './transcriptReport';

describe('buildTranscriptReport', () => {
  it('writes one Q/A/Feedback block per turn in order', () => {
    const report = buildTranscriptReport([
      { number: 1, question: 'Tell me about yourself.', answer: 'I build APIs.', feedback: 'Good summary.' },
      { number: 2, question: 'Describe a conflict.', answer: 'We compromised.', feedback: 'Add an outcome.' },
    ]);

    expect(report).toBe(
      'Q1: Tell me about yourself.\nA1: I build APIs.\nFeedback: Good summary.\n\n' +
        'Q2: Describe a conflict.\nA2: We compromised.\nFeedback: Add an outcome.'
    );
  });

  it('is empty when no turn was completed', () => {
    expect(buildTranscriptReport([])).toBe('');
  });
});
