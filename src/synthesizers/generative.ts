import OpenAI from "openai";
import { describeError } from "../errors";
import type { AnswerSynthesizer, SynthesisRequest } from "./types";

/** Minimal completion backend: prompt in, text out. */
export interface ChatClient {
  complete(prompt: string): Promise<string>;
}

export interface OpenAiChatClientOptions {
  model: string;
  apiKey?: string;
  /** OpenAI-compatible endpoint (llama.cpp server, GPT4All API server); default api.openai.com. */
  baseURL?: string;
  timeoutMs?: number;
  maxTokens?: number;
}

/**
 * Chat-completions client for OpenAI and OpenAI-compatible local servers.
 * The SDK client is created on first use.
 */
export class OpenAiChatClient implements ChatClient {
  private client: OpenAI | null = null;

  public constructor(private readonly opts: OpenAiChatClientOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        // Local servers ignore the key but the SDK requires one.
        apiKey: this.opts.apiKey ?? "no-key",
        baseURL: this.opts.baseURL,
        timeout: this.opts.timeoutMs ?? 30_000,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  public async complete(prompt: string): Promise<string> {
    const resp = await this.getClient().chat.completions.create({
      model: this.opts.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: this.opts.maxTokens ?? 256,
    });
    return resp.choices[0]?.message?.content?.trim() ?? "";
  }
}

export function buildPrompt(query: string, contexts: readonly string[]): string {
  const joined = contexts.join("\n\n---\n\n");
  return `Use the following contexts to answer the query:\n\n${joined}\n\nQuery: ${query}\nAnswer:`;
}

/**
 * Answer via a language model. Backend failures become a descriptive answer
 * string so a query never fails because a model is unreachable.
 */
export class GenerativeSynthesizer implements AnswerSynthesizer {
  public constructor(
    private readonly label: string,
    private readonly client: ChatClient,
  ) {}

  public async synthesize(req: SynthesisRequest): Promise<string> {
    try {
      return await this.client.complete(buildPrompt(req.query, req.contexts));
    } catch (e) {
      console.error(`[RAG] ${this.label} completion failed:`, e);
      return `${this.label} call failed: ${describeError(e)}`;
    }
  }
}
