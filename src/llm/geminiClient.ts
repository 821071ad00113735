import {
  GoogleGenerativeAI,
  type Content,
  type GenerateContentRequest,
  type GenerateContentResult,
  type GenerationConfig,
  type GenerativeModel,
} from '@google/generative-ai';

import { executeWithTimeout } from '../utils/timing';
import {
  LlmError,
  toLlmError,
  type LlmClient,
  type LlmGenerateRequest,
  type LlmGenerateResponse,
  type LlmMessage,
} from './llmClient';

export interface GeminiClientOptions {
  apiKey: string;
  model?: string;
  defaultGenerationConfig?: Partial<GenerationConfig>;
  timeoutMs?: number;
}

// Finish reasons that mean the candidate was withheld for policy reasons.
const SAFETY_FINISH_REASONS = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

export class GeminiClient implements LlmClient {
  readonly name = 'gemini';
  private readonly model: GenerativeModel;
  private readonly defaultGenerationConfig?: Partial<GenerationConfig>;
  private readonly timeoutMs: number;

  constructor(options: GeminiClientOptions) {
    if (!options.apiKey) {
      throw new Error('GeminiClient requires an API key');
    }

    const genAI = new GoogleGenerativeAI(options.apiKey);

    this.defaultGenerationConfig = options.defaultGenerationConfig;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.model = genAI.getGenerativeModel(
      { model: options.model ?? 'gemini-2.0-flash' },
      { timeout: this.timeoutMs },
    );
  }

  async generate(request: LlmGenerateRequest): Promise<LlmGenerateResponse> {
    if (request.messages.length === 0) {
      throw new Error('GeminiClient.generate requires at least one message');
    }

    const systemInstruction = request.messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n');
    const contents = request.messages
      .filter((message) => message.role !== 'system')
      .map(transformMessageToContent);
    if (contents.length === 0) {
      throw new Error('GeminiClient.generate requires at least one user message');
    }

    const generationConfig = buildGenerationConfig(this.defaultGenerationConfig, request);

    const payload: GenerateContentRequest = { contents };
    if (generationConfig) {
      payload.generationConfig = generationConfig;
    }
    if (systemInstruction) {
      payload.systemInstruction = systemInstruction;
    }

    let result: GenerateContentResult;
    try {
      result = await executeWithTimeout(this.model.generateContent(payload), this.timeoutMs);
    } catch (err) {
      throw toLlmError(this.name, err);
    }

    const { response } = result;
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new LlmError('safety_block', `gemini: prompt blocked (${blockReason})`);
    }

    const candidate = response.candidates?.[0];
    if (!candidate) {
      throw new LlmError('malformed', 'gemini: response has no candidates');
    }

    const finishReason = candidate.finishReason ? String(candidate.finishReason) : undefined;
    if (finishReason && SAFETY_FINISH_REASONS.has(finishReason)) {
      throw new LlmError('safety_block', `gemini: response stopped (${finishReason})`);
    }

    const text = (candidate.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();
    if (!text) {
      throw new LlmError('malformed', `gemini: empty response text (finishReason=${finishReason ?? 'none'})`);
    }

    return {
      text,
      raw: result,
    };
  }
}

function transformMessageToContent(message: LlmMessage): Content {
  return {
    role: message.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: message.content }],
  };
}

function buildGenerationConfig(
  defaults: Partial<GenerationConfig> | undefined,
  request: LlmGenerateRequest,
): GenerationConfig | undefined {
  const merged: GenerationConfig = { ...defaults };

  if (request.temperature !== undefined) {
    merged.temperature = request.temperature;
  }
  if (request.maxOutputTokens !== undefined) {
    merged.maxOutputTokens = request.maxOutputTokens;
  }
  if (request.jsonOutput) {
    merged.responseMimeType = 'application/json';
  }

  const hasValues = Object.values(merged).some((value) => value !== undefined);
  return hasValues ? merged : undefined;
}
