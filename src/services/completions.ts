// src/services/completions.ts
// What: Completion service contract and its OpenAI chat-completions implementation.
// How: complete() returns the whole message; completeStream() yields content deltas in arrival order.

import type OpenAI from 'openai';

export interface CompletionService {
  complete(prompt: string): Promise<string>;
  completeStream(prompt: string): AsyncIterable<string>;
}

interface OpenAICompletionOptions {
  model: string;
  temperature: number;
  maxTokens?: number;
}

export class OpenAICompletionService implements CompletionService {
  constructor(
    private readonly client: OpenAI,
    private readonly opts: OpenAICompletionOptions,
  ) {}

  async complete(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.opts.model,
      temperature: this.opts.temperature,
      max_completion_tokens: this.opts.maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });
    return completion.choices[0]?.message?.content ?? '';
  }

  async *completeStream(prompt: string): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create({
      model: this.opts.model,
      temperature: this.opts.temperature,
      max_completion_tokens: this.opts.maxTokens,
      messages: [{ role: 'user', content: prompt }],
      stream: true,
    });
    for await (const part of stream) {
      const delta = part.choices[0]?.delta?.content;
      if (delta) yield delta;
    }
  }
}
