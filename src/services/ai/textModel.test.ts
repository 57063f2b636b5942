import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GroqTextModel, describeError } from './textModel';

const create = vi.hoisted(() => vi.fn());

vi.mock('groq-sdk', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

const config = { apiKey: 'test-secret', model: 'llama-3.3-70b-versatile', temperature: 0.7 };

describe('GroqTextModel', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('sends the prompt as a single user message', async () => {
    create.mockResolvedValueOnce({ choices: [{ message: { content: 'Tell me about yourself.' } }] });

    const text = await new GroqTextModel(config).generate('Ask one question');

    expect(text).toBe('Tell me about yourself.');
    expect(create).toHaveBeenCalledWith({
      messages: [{ role: 'user', content: 'Ask one question' }],
      model: 'llama-3.3-70b-versatile',
      temperature: 0.7,
    });
  });

  it('rejects an empty completion', async () => {
    create.mockResolvedValueOnce({ choices: [] });
    await expect(new GroqTextModel(config).generate('Ask one question')).rejects.toThrow('No response from LLM');
  });

  it('passes SDK errors through', async () => {
    create.mockRejectedValueOnce(new Error('429 rate limit'));
    await expect(new GroqTextModel(config).generate('Ask one question')).rejects.toThrow('429 rate limit');
  });
});

describe('describeError', () => {
  it('prefers the error message', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain failure')).toBe('plain failure');
  });
});
