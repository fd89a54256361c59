import { describe, expect, it } from "vitest";
import { extractSnippets, splitSentences } from "../extractor.js";

describe("extractSnippets", () => {
  it("returns the sentence naming a leader from a paragraph", () => {
    const html = "<html><body><p>John Doe mixed reactions today.</p></body></html>";
    expect(extractSnippets(html, ["John Doe"])).toEqual([
      { text: "John Doe mixed reactions today.", context: "John Doe mixed reactions today." },
    ]);
  });

  it("keeps only the sentences that mention a leader", () => {
    const html = "<p>The weather was calm. Jane Smith spoke at the rally! Nobody else did?</p>";
    expect(extractSnippets(html, ["jane smith"])).toEqual([
      {
        text: "Jane Smith spoke at the rally!",
        context: "The weather was calm. Jane Smith spoke at the rally! Nobody else did?",
      },
    ]);
  });

  it("joins inline markup with spaces and collapses whitespace", () => {
    const html = "<ul><li>  Mayor <b>Jane</b>\n   Smith   resigned   today  </li></ul>";
    expect(extractSnippets(html, ["Jane Smith"])).toEqual([
      { text: "Mayor Jane Smith resigned today", context: "Mayor Jane Smith resigned today" },
    ]);
  });

  it("emits one snippet per matching container, including nested ones", () => {
    const html = "<div><p>Jane Smith opened the new library.</p></div>";
    const snippets = extractSnippets(html, ["Jane Smith"]);
    expect(snippets).toHaveLength(2);
    expect(snippets.map((snippet) => snippet.text)).toEqual([
      "Jane Smith opened the new library.",
      "Jane Smith opened the new library.",
    ]);
  });

  it("emits a sentence once even when it names several leaders", () => {
    const html = "<blockquote>John Doe and Jane Smith argued on stage.</blockquote>";
    expect(extractSnippets(html, ["John Doe", "Jane Smith"])).toHaveLength(1);
  });

  it("ignores script and style content", () => {
    const html =
      '<div><script>var note = "Jane Smith is trending right now";</script></div>' +
      "<style>.jane-smith-banner { color: red; }</style><p>Nothing to see</p>";
    expect(extractSnippets(html, ["Jane Smith"])).toEqual([]);
  });

  it("falls back to the whole page when no block is long enough", () => {
    expect(extractSnippets("<span>Jane Smith</span>", ["Jane Smith"])).toEqual([
      { text: "Jane Smith", context: "Jane Smith" },
    ]);
  });

  it("clamps the fallback window around the first mention", () => {
    const html = `<table><tr><td>${"a".repeat(300)} Jane Smith ${"b".repeat(300)}</td></tr></table>`;
    const expected = `${"a".repeat(199)} Jane Smith ${"b".repeat(189)}`;
    expect(extractSnippets(html, ["Jane Smith"])).toEqual([{ text: expected, context: expected }]);
  });

  it("produces one fallback snippet per leader in configuration order", () => {
    const html = "<h1>Doe</h1><h2>Jane Smith</h2><h3>John Doe</h3>";
    expect(extractSnippets(html, ["John Doe", "Jane Smith", "Nobody"]).map((s) => s.text)).toEqual([
      "Doe Jane Smith John Doe",
      "Doe Jane Smith John Doe",
    ]);
  });

  it("measures the minimum block length in characters, not UTF-16 units", () => {
    const short = "<h1>Headline</h1><p>Jo Doe 😀😀😀😀😀</p>";
    expect(extractSnippets(short, ["Jo Doe"])).toEqual([
      { text: "Headline Jo Doe 😀😀😀😀😀", context: "Headline Jo Doe 😀😀😀😀😀" },
    ]);

    const long = "<h1>Headline</h1><p>Jo Doe 😀😀😀😀😀😀😀😀</p>";
    expect(extractSnippets(long, ["Jo Doe"])).toEqual([
      { text: "Jo Doe 😀😀😀😀😀😀😀😀", context: "Jo Doe 😀😀😀😀😀😀😀😀" },
    ]);
  });

  it("searches the selector it is given", () => {
    const html = "<table><tr><td>Jane Smith resigned from the board.</td></tr></table><p>Jane Smith again today.</p>";
    expect(extractSnippets(html, ["Jane Smith"], { selector: "td" })).toEqual([
      { text: "Jane Smith resigned from the board.", context: "Jane Smith resigned from the board." },
    ]);
  });

  it("sizes the fallback window from the options", () => {
    expect(extractSnippets("<h1>Intro words Jane Smith end</h1>", ["Jane Smith"], { fallbackWindow: 5 })).toEqual([
      { text: "ords Jane", context: "ords Jane" },
    ]);
  });

  it("counts the fallback window in characters", () => {
    const html = `<h1>${"😀".repeat(10)} Jane Smith</h1>`;
    expect(extractSnippets(html, ["Jane Smith"], { fallbackWindow: 5 })).toEqual([
      { text: "😀😀😀😀 Jane", context: "😀😀😀😀 Jane" },
    ]);
  });

  it("returns nothing when no leader is mentioned", () => {
    expect(extractSnippets("<p>A long paragraph about the weather.</p>", ["Jane Smith"])).toEqual([]);
  });

  it("honours a custom minimum block length", () => {
    const html = "<p>Jane Smith won.</p><p>Jane Smith</p>";
    expect(extractSnippets(html, ["Jane Smith"], { minBlockLength: 5 }).map((s) => s.text)).toEqual([
      "Jane Smith won.",
      "Jane Smith",
    ]);
  });
});

describe("splitSentences", () => {
  it("splits after terminal punctuation followed by whitespace", () => {
    expect(splitSentences("One. Two! Three? Four.Five")).toEqual(["One.", "Two!", "Three?", "Four.Five"]);
  });
});
