import type { Config } from "../config";
import { GenerativeSynthesizer, OpenAiChatClient } from "./generative";
import { SimpleSynthesizer } from "./simple";
import type { SynthesizerMap } from "./types";

export { PROVIDERS } from "./types";
export type { AnswerSynthesizer, Provider, SynthesisRequest, SynthesizerMap } from "./types";

export type SynthesizerConfig = Pick<
  Config,
  | "OPENAI_API_KEY"
  | "OPENAI_MODEL"
  | "OPENAI_TIMEOUT_MS"
  | "LOCAL_LLM_BASE_URL"
  | "LOCAL_LLM_MODEL"
  | "GPT4ALL_BASE_URL"
  | "GPT4ALL_MODEL"
>;

/**
 * One strategy per provider. Without an OpenAI key the "openai" provider
 * answers with the exact-text search instead.
 */
export function createSynthesizers(cfg: SynthesizerConfig): SynthesizerMap {
  const simple = new SimpleSynthesizer();
  const timeoutMs = cfg.OPENAI_TIMEOUT_MS;
  return {
    simple,
    openai: cfg.OPENAI_API_KEY
      ? new GenerativeSynthesizer(
          "OpenAI",
          new OpenAiChatClient({ model: cfg.OPENAI_MODEL, apiKey: cfg.OPENAI_API_KEY, timeoutMs }),
        )
      : simple,
    local: new GenerativeSynthesizer(
      "Local LLM",
      new OpenAiChatClient({ model: cfg.LOCAL_LLM_MODEL, baseURL: cfg.LOCAL_LLM_BASE_URL, timeoutMs }),
    ),
    gpt4all: new GenerativeSynthesizer(
      "GPT4All",
      new OpenAiChatClient({ model: cfg.GPT4ALL_MODEL, baseURL: cfg.GPT4ALL_BASE_URL, timeoutMs }),
    ),
  };
}
