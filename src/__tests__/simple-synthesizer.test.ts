import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  findMatches,
  locateTag,
  renderMatch,
  searchAnswer,
  SimpleSynthesizer,
  stripTag,
} from "../synthesizers/simple";

const quote = (s: string) => encodeURIComponent(s).replace(/%2F/gi, "/");

describe("tags", () => {
  it("strips a leading structural tag", () => {
    expect(stripTag("[Table 4]   cell")).toBe("cell");
    expect(stripTag("text [Page 1]")).toBe("text [Page 1]");
  });

  it("prefers Page over Para over Table", () => {
    expect(locateTag("[Para 2] x [Page 5]")).toEqual({ kind: "Page", num: 5 });
    expect(locateTag("[Table 7] [Para 1]")).toEqual({ kind: "Para", num: 1 });
    expect(locateTag("untagged")).toBeNull();
  });
});

describe("findMatches", () => {
  it("finds the matching line of a plain-text document", () => {
    const [m, ...rest] = findMatches("beta", ["alpha beta", "no match here"], ["a.txt", "b.txt"]);
    expect(rest).toEqual([]);
    expect(m).toEqual({
      docId: "a.txt",
      line: 1,
      location: null,
      snippetHtml: "alpha <mark>beta</mark>",
      viewUrl: `/view?file=${quote(path.resolve("a.txt"))}&line=1&query=beta`,
      document: null,
    });
  });

  it("links PDF matches to their page and includes the next line", () => {
    const text = "[Page 2] The bow-tie rule\n[Page 2] second line";
    const [m] = findMatches("bowtie", [text], ["/docs/manual.pdf"]);
    expect(m.line).toBe(1);
    expect(m.location).toEqual({ kind: "Page", num: 2 });
    expect(m.snippetHtml).toBe("The <mark>bow-tie</mark> rule<br>second line");
    expect(m.document).toEqual({ kind: "pdf", url: "/download?file=/docs/manual.pdf&page=2#page=2" });
    expect(renderMatch(m)).toContain("<span class=\"result-location\"> : Line 1 (Page 2)</span>");
    expect(renderMatch(m)).toContain(
      ' <a href="/download?file=/docs/manual.pdf&page=2#page=2" target="_blank" class="pdf-link" title="Open PDF in browser">📖 Open PDF</a>',
    );
  });

  it("links Word matches to the document", () => {
    const [m] = findMatches("beta", ["[Para 1] intro\n[Para 3] beta here"], ["/docs/report.docx"]);
    expect(m.line).toBe(2);
    expect(m.location).toEqual({ kind: "Para", num: 3 });
    expect(m.snippetHtml).toBe("<mark>beta</mark> here");
    expect(m.document).toEqual({ kind: "word", url: "/download?file=/docs/report.docx" });
    expect(renderMatch(m)).toContain(
      ' <a href="/download?file=/docs/report.docx" target="_blank" class="pdf-link" title="Download Word document">📝 Open Doc</a>',
    );
  });

  it("renders the link for the document kind, whatever its URL", () => {
    const [m] = findMatches("beta", ["beta"], ["/docs/notes#page=1.docx"]);
    expect(m.document?.kind).toBe("word");
    expect(renderMatch(m)).toContain("📝 Open Doc</a>");
    expect(renderMatch(m)).not.toContain("Open PDF");
  });

  it("defaults PDF links to page 1 without a page tag", () => {
    const [m] = findMatches("beta", ["beta"], ["/docs/scan.pdf"]);
    expect(m.document).toEqual({ kind: "pdf", url: "/download?file=/docs/scan.pdf&page=1#page=1" });
  });

  it("truncates long snippets", () => {
    const [m] = findMatches("beta", [`beta ${"x".repeat(500)}`], ["long.txt"]);
    expect(m.snippetHtml).toBe(`<mark>beta</mark> ${"x".repeat(395)}...`);
  });

  it("escapes document text before highlighting", () => {
    const [m] = findMatches("beta", ["a <b>beta</b>"], ["tags.html"]);
    expect(m.snippetHtml).toBe("a &lt;b&gt;<mark>beta</mark>&lt;/b&gt;");
  });

  it("labels contexts without an id", () => {
    expect(findMatches("beta", ["beta"]).map((m) => m.docId)).toEqual(["Document 1"]);
  });
});

describe("searchAnswer", () => {
  it("renders a header and one block per match", () => {
    const viewUrl = `/view?file=${quote(path.resolve("a.txt"))}&line=1&query=beta`;
    const answer = searchAnswer({
      query: "beta",
      contexts: ["alpha beta", "no match here"],
      docIds: ["a.txt", "b.txt"],
      topK: 10,
    });
    expect(answer).toBe(
      `<div class="search-header">Search results for "<strong>beta</strong>" (1 total matches)</div>` +
        `<div class="result-item"><div class="result-file">` +
        `<a href="${viewUrl}" target="_blank" title="View extracted text at line 1">📄 a.txt</a>` +
        `<span class="result-location"> : Line 1</span></div>` +
        `<div class="result-text">alpha <mark>beta</mark></div></div>`,
    );
  });

  it("notes the page size when matches exceed it", () => {
    const answer = searchAnswer({
      query: "beta",
      contexts: ["beta one\nbeta two\nbeta three"],
      docIds: ["a.txt"],
      topK: 2,
    });
    expect(answer.split("</div>")[0]).toBe(
      `<div class="search-header">Search results for "<strong>beta</strong>" (3 total matches (showing 2 per page))`,
    );
    expect(answer.split(`<div class="result-item">`)).toHaveLength(4);
  });

  it("reports no matches with the escaped query", () => {
    expect(searchAnswer({ query: "zzz", contexts: ["alpha"], docIds: ["a.txt"], topK: 5 })).toBe(
      "No matches found for 'zzz'.",
    );
    expect(searchAnswer({ query: "<x>", contexts: ["alpha"], docIds: ["a.txt"], topK: 5 })).toBe(
      "No matches found for '&lt;x&gt;'.",
    );
  });

  it("handles a blank query", async () => {
    const answer = await new SimpleSynthesizer().synthesize({ query: "  ", contexts: ["a"], docIds: [], topK: 1 });
    expect(answer).toBe("No search query provided.");
  });
});
