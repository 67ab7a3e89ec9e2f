import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AnswerSynthesizer, SynthesisRequest, SynthesizerMap } from "../synthesizers";
import { SimpleSynthesizer } from "../synthesizers/simple";
import type { CorpusSource, DocRecord } from "../types";

export interface TempDir {
  dir: string;
  cleanup: () => Promise<void>;
}

export async function makeTempDir(prefix = "rag-test-"): Promise<TempDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return { dir, cleanup: () => fs.rm(dir, { recursive: true, force: true }) };
}

/** In-memory corpus; `records` may be swapped between builds. */
export class ArrayCorpus implements CorpusSource {
  public constructor(public records: DocRecord[]) {}

  public async load(): Promise<DocRecord[]> {
    return [...this.records];
  }
}

/** Corpus whose load() resolves only when the test releases it. */
export class GatedCorpus implements CorpusSource {
  private release: (docs: DocRecord[]) => void = () => undefined;
  private fail: (e: Error) => void = () => undefined;

  public load(): Promise<DocRecord[]> {
    return new Promise<DocRecord[]>((resolve, reject) => {
      this.release = resolve;
      this.fail = reject;
    });
  }

  public resolveWith(docs: DocRecord[]): void {
    this.release(docs);
  }

  public rejectWith(e: Error): void {
    this.fail(e);
  }
}

/** Synthesizer that records its requests and answers with a fixed string. */
export class RecordingSynthesizer implements AnswerSynthesizer {
  public readonly requests: SynthesisRequest[] = [];

  public constructor(private readonly answer = "generated answer") {}

  public async synthesize(req: SynthesisRequest): Promise<string> {
    this.requests.push(req);
    return this.answer;
  }
}

export function testSynthesizers(generative: AnswerSynthesizer = new RecordingSynthesizer()): SynthesizerMap {
  return { simple: new SimpleSynthesizer(), openai: generative, local: generative, gpt4all: generative };
}

export const SAMPLE_DOCS: DocRecord[] = [
  { id: "a.txt", text: "alpha beta\ngamma" },
  { id: "b.txt", text: "delta epsilon" },
  { id: "c.txt", text: "beta zeta" },
];
