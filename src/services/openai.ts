import { z } from 'zod';
import { fetchWithRetry } from '../utils/fetchWithRetry.ts';
import type { FetchLike, LlmClient, LlmRequest, LlmResponse } from './interfaces.ts';

const ChatCompletion = z.object({
  model: z.string(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z.object({ total_tokens: z.number().int() }).optional(),
});

/** Client for any OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAiChatClient implements LlmClient {
  private readonly baseUrl: string;

  constructor(
    private readonly opts: {
      apiKey: string;
      model: string;
      baseUrl: string;
      maxTokens?: number;
      maxRetries?: number;
      fetch?: FetchLike;
    },
  ) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  async complete({ system, prompt, signal }: LlmRequest): Promise<LlmResponse> {
    const fetchImpl = this.opts.fetch ?? fetch;
    const body = JSON.stringify({
      model: this.opts.model,
      max_tokens: this.opts.maxTokens ?? 1024,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
    });

    const response = await fetchWithRetry(
      () =>
        fetchImpl(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.opts.apiKey}`,
          },
          body,
          signal,
        }),
      this.opts.maxRetries ?? 2,
      1000,
      signal,
    );
    if (!response.ok) {
      throw new Error(`chat completion failed with HTTP ${response.status}`);
    }

    const parsed = ChatCompletion.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`unexpected chat completion response: ${z.prettifyError(parsed.error)}`);
    }

    const text = parsed.data.choices[0].message.content ?? '';
    return {
      text: text.trim(),
      model: parsed.data.model,
      tokensUsed: parsed.data.usage?.total_tokens,
    };
  }
}
