import { describe, expect, it } from "vitest";
import { cosineSimilarity, Retriever } from "../retriever";
import { TfidfVectorizer } from "../vectorizer";

const vec = (...xs: number[]) => Float64Array.from(xs);

describe("cosineSimilarity", () => {
  it("is 1 for identical and 0 for orthogonal vectors", () => {
    expect(cosineSimilarity(vec(3, 4), vec(3, 4))).toBeCloseTo(1, 12);
    expect(cosineSimilarity(vec(1, 0), vec(0, 1))).toBe(0);
  });

  it("scores a vector against itself as exactly 1", () => {
    expect(cosineSimilarity(vec(1, 1, 1), vec(1, 1, 1))).toBe(1);
    expect(cosineSimilarity(vec(1, 1, 1), vec(-1, -1, -1))).toBe(-1);
  });

  it("is 0 against a zero vector", () => {
    expect(cosineSimilarity(vec(0, 0), vec(1, 1))).toBe(0);
  });
});

describe("Retriever", () => {
  const retriever = new Retriever([vec(1, 0), vec(0, 1), vec(1, 0), vec(1, 1), vec(0, 0)]);

  it("ranks by similarity and breaks ties by document order", () => {
    const { indices, scores } = retriever.query(vec(1, 0), 5);
    expect(indices).toEqual([0, 2, 3, 1, 4]);
    expect(scores[0]).toBe(1);
    expect(scores[1]).toBe(1);
    expect(scores[2]).toBeCloseTo(Math.SQRT1_2, 12);
    expect(scores[3]).toBe(0);
    expect(scores[4]).toBe(0);
  });

  it("clamps topK into [1, size]", () => {
    expect(retriever.query(vec(0, 1), 100).indices).toHaveLength(5);
    expect(retriever.query(vec(0, 1), 0).indices).toEqual([1]);
  });

  it("never scores above 1", () => {
    expect(new Retriever([vec(1, 1, 1)]).query(vec(1, 1, 1), 1).scores).toEqual([1]);
  });

  it("scores a TF-IDF document queried by its own text as 1", async () => {
    const texts = ["apple banana cherry", "banana grape melon", "cherry apple grape kiwi"];
    const vectorizer = new TfidfVectorizer();
    await vectorizer.fit(texts);
    const docVectors = await vectorizer.embed(texts);
    const tfidf = new Retriever(docVectors);
    for (const [i, text] of texts.entries()) {
      const [q] = await vectorizer.embed([text]);
      const { indices, scores } = tfidf.query(q, 1);
      expect(indices).toEqual([i]);
      expect(scores).toEqual([1]);
    }
  });

  it("returns nothing for an empty index", () => {
    expect(new Retriever([]).query(vec(1), 3)).toEqual({ indices: [], scores: [] });
  });
});
