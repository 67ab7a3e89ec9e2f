import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileCorpus } from "../corpus";
import { tagParagraphs } from "../docx-extractor";
import { tagPages } from "../pdf-extractor";
import { statusManager } from "../status";
import { makeTempDir, type TempDir } from "./helpers";

async function write(root: string, rel: string, content: string) {
  const file = path.join(root, rel);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}

describe("FileCorpus", () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await makeTempDir();
    await write(tmp.dir, "b.txt", "  bravo text \n");
    await write(tmp.dir, "a.txt", "alpha text");
    await write(tmp.dir, "empty.txt", "   ");
    await write(tmp.dir, "notes/c.MD", "# charlie");
    await write(tmp.dir, "node_modules/pkg/readme.txt", "ignored");
    await write(tmp.dir, "image.png", "binary");
    await write(tmp.dir, "index.txt", "the index file");
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  const corpus = () =>
    new FileCorpus({
      dataDir: tmp.dir,
      allowedExt: ["txt", "md"],
      excludedFolders: ["node_modules"],
      excludeFiles: [path.join(tmp.dir, "index.txt")],
    });

  it("discovers files per extension, pruning excluded folders and files", async () => {
    const files = await corpus().discoverFiles();
    expect(files.map((f) => path.relative(tmp.dir, f))).toEqual([
      "a.txt",
      "b.txt",
      "empty.txt",
      path.join("notes", "c.MD"),
    ]);
  });

  it("loads trimmed text keyed by absolute path, skipping empty files", async () => {
    const docs = await corpus().load();
    expect(docs).toEqual([
      { id: path.join(tmp.dir, "a.txt"), text: "alpha text" },
      { id: path.join(tmp.dir, "b.txt"), text: "bravo text" },
      { id: path.join(tmp.dir, "notes", "c.MD"), text: "# charlie" },
    ]);
    expect(statusManager.getStatus().indexing.filesDiscovered).toBe(4);
  });
});

describe("extraction tags", () => {
  it("prefixes every PDF line with its page", () => {
    expect(
      tagPages([
        { num: 1, text: "Title\nIntro" },
        { num: 2, text: "Body" },
      ]),
    ).toBe("[Page 1] Title\n[Page 1] Intro\n[Page 2] Body");
  });

  it("numbers non-empty Word paragraphs", () => {
    expect(tagParagraphs("First\n\n\n  Second  \n")).toBe("[Para 1] First\n[Para 2] Second");
  });
});
