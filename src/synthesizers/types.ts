/** Closed set of answer strategies a query may request. */
export const PROVIDERS = ["simple", "openai", "local", "gpt4all"] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface SynthesisRequest {
  query: string;
  /** Retrieved document texts, best first. */
  contexts: readonly string[];
  /** Ids parallel to `contexts`. */
  docIds: readonly string[];
  /** Results shown per page by the caller. */
  topK: number;
}

/**
 * Turns a query plus retrieved contexts into a human-readable answer.
 * Implementations resolve with a string and do not reject.
 */
export interface AnswerSynthesizer {
  synthesize(req: SynthesisRequest): Promise<string>;
}

export type SynthesizerMap = Readonly<Record<Provider, AnswerSynthesizer>>;
