// src/llm/fakeLlmClient.ts
// ------------------------------------------------------------------------------------
// Offline LLM client for tests and dry runs (AI_PROVIDER=fake).
//
// Modes:
//   - "canned": always answer with cannedText (default when cannedText is set)
//   - "echo":   answer with the last user message
//   - "script": answer with whatever script(request) returns
//
// Failure injection: each entry of `failures` is consumed by one generate() call,
// which throws an LlmError of that kind instead of answering. Calls after the
// queue is drained answer normally.
//
//   new FakeLlmClient({ cannedText: '{"quotes":[]}', failures: ["rate_limit"] })
// ------------------------------------------------------------------------------------

import { sleep } from "../utils/timing";
import {
  LlmError,
  type LlmClient,
  type LlmErrorKind,
  type LlmGenerateRequest,
  type LlmGenerateResponse,
  type LlmMessage,
} from "./llmClient";

export type FakeLlmMode = "echo" | "canned" | "script";

export interface FakeLlmClientOptions {
  mode?: FakeLlmMode;
  cannedText?: string;
  script?: (request: LlmGenerateRequest) => string | Promise<string>;
  failures?: LlmErrorKind[];
  /** Artificial latency per call. */
  delayMs?: number;
}

export class FakeLlmClient implements LlmClient {
  readonly name = "fake";
  readonly requests: LlmGenerateRequest[] = [];
  private readonly mode: FakeLlmMode;
  private readonly cannedText: string;
  private readonly script?: (request: LlmGenerateRequest) => string | Promise<string>;
  private readonly failures: LlmErrorKind[];
  private readonly delayMs: number;

  constructor(options: FakeLlmClientOptions = {}) {
    this.mode = options.mode ?? (options.script ? "script" : options.cannedText !== undefined ? "canned" : "echo");
    this.cannedText = options.cannedText ?? "";
    this.script = options.script;
    this.failures = [...(options.failures ?? [])];
    this.delayMs = options.delayMs ?? 0;
  }

  get callCount(): number {
    return this.requests.length;
  }

  async generate(request: LlmGenerateRequest): Promise<LlmGenerateResponse> {
    if (!request.messages.length) {
      throw new Error("FakeLlmClient.generate requires at least one message");
    }
    this.requests.push(request);

    await sleep(this.delayMs);

    const failure = this.failures.shift();
    if (failure) {
      throw new LlmError(failure, `fake: injected ${failure} on call #${this.callCount}`);
    }

    const text = await this.produceText(request);
    if (!text.trim()) {
      throw new LlmError("malformed", "fake: empty response text");
    }

    return {
      text,
      raw: { mode: this.mode, callCount: this.callCount },
    };
  }

  private async produceText(request: LlmGenerateRequest): Promise<string> {
    switch (this.mode) {
      case "canned":
        return this.cannedText;
      case "script":
        return this.script ? await this.script(request) : lastUserContent(request.messages);
      case "echo":
        return lastUserContent(request.messages);
    }
  }
}

function lastUserContent(messages: LlmMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i].role === "user") return messages[i].content;
  }
  return messages[messages.length - 1]?.content ?? "";
}
