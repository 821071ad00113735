import { FakeLlmClient } from './fakeLlmClient';
import { GeminiClient } from './geminiClient';
import type { LlmClient } from './llmClient';
import { OpenAiClient } from './openAiClient';

export type ProviderConfig =
  | { kind: 'gemini'; apiKey: string; model: string; temperature: number; timeoutMs: number }
  | { kind: 'openai'; apiKey: string; model: string; temperature: number; timeoutMs: number }
  | { kind: 'fake'; cannedText?: string };

export function createLlmClient(config: ProviderConfig): LlmClient {
  switch (config.kind) {
    case 'gemini':
      return new GeminiClient({
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
        defaultGenerationConfig: { temperature: config.temperature },
      });
    case 'openai':
      return new OpenAiClient({
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
    case 'fake':
      return new FakeLlmClient(
        config.cannedText !== undefined ? { cannedText: config.cannedText } : { mode: 'echo' },
      );
  }
}

/** Sampling temperature the parser should request, if the provider has one. */
export function providerTemperature(config: ProviderConfig): number | undefined {
  return config.kind === 'fake' ? undefined : config.temperature;
}
