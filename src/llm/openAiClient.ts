import OpenAI from 'openai';

import { executeWithTimeout } from '../utils/timing';
import {
  LlmError,
  toLlmError,
  type LlmClient,
  type LlmGenerateRequest,
  type LlmGenerateResponse,
} from './llmClient';

export interface OpenAiClientOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  baseURL?: string;
}

type ChatCompletion = OpenAI.Chat.ChatCompletion;
type ChatMessageParam = OpenAI.Chat.ChatCompletionMessageParam;

export class OpenAiClient implements LlmClient {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAiClientOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAiClient requires an API key');
    }

    this.model = options.model ?? 'gpt-4o-mini';
    this.timeoutMs = options.timeoutMs ?? 60_000;
    // Retries are owned by the caller's RetryPolicy.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: LlmGenerateRequest): Promise<LlmGenerateResponse> {
    if (request.messages.length === 0) {
      throw new Error('OpenAiClient.generate requires at least one message');
    }

    const messages: ChatMessageParam[] = request.messages.map((message) => {
      switch (message.role) {
        case 'system':
          return { role: 'system', content: message.content };
        case 'assistant':
          return { role: 'assistant', content: message.content };
        case 'user':
          return { role: 'user', content: message.content };
      }
    });

    let completion: ChatCompletion;
    try {
      completion = await executeWithTimeout(
        this.client.chat.completions.create({
          model: this.model,
          messages,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
          response_format: request.jsonOutput ? { type: 'json_object' } : undefined,
        }),
        this.timeoutMs,
      );
    } catch (err) {
      throw toLlmError(this.name, err);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new LlmError('malformed', 'openai: response has no choices');
    }
    if (choice.finish_reason === 'content_filter' || choice.message.refusal) {
      throw new LlmError('safety_block', `openai: response refused (${choice.message.refusal ?? choice.finish_reason})`);
    }

    const text = (choice.message.content ?? '').trim();
    if (!text) {
      throw new LlmError('malformed', `openai: empty response text (finish_reason=${choice.finish_reason})`);
    }

    return { text, raw: completion };
  }
}
