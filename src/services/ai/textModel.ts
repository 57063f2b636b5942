import Groq from 'groq-sdk';
import type { GroqConfig } from '../../config/services';

/** "Generate text from a prompt string": the only contract the flows depend on. */
export interface TextModel {
  generate(prompt: string): Promise<string>;
}

export class GroqTextModel implements TextModel {
  private groq: Groq;

  constructor(private readonly config: GroqConfig) {
    this.groq = new Groq({ apiKey: config.apiKey });
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.groq.chat.completions.create({
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
      model: this.config.model,
      temperature: this.config.temperature,
    });

    const response = completion.choices[0]?.message?.content;
    if (!response) {
      throw new Error('No response from LLM');
    }

    return response;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
