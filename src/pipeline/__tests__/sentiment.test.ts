import { describe, it, expect } from "vitest";
import { loadLexicon, type Lexicon } from "../../resources.js";
import { bucketOf, polarity, tokenize } from "../sentiment.js";

const lexicon: Lexicon = {
  positive: new Map([
    ["moon", 1],
    ["bullish", 1],
    ["🚀", 2],
  ]),
  negative: new Map([
    ["crash", 1],
    ["bearish", 1],
  ]),
  negators: new Set(["not"]),
};

describe("tokenize", () => {
  it("lower-cases and keeps inner apostrophes", () => {
    expect(tokenize("Don't STOP")).toEqual(["don't", "stop"]);
    expect(tokenize("'hello'")).toEqual(["hello"]);
  });

  it("splits emoji into their own tokens", () => {
    expect(tokenize("GME🚀🚀")).toEqual(["gme", "🚀", "🚀"]);
  });
});

describe("polarity", () => {
  it("scores (pos - neg) / (pos + neg)", () => {
    expect(polarity("to the moon", lexicon)).toBe(1);
    expect(polarity("moon then crash", lexicon)).toBe(0);
    expect(polarity("🚀🚀 crash", lexicon)).toBeCloseTo(0.6, 10);
  });

  it("flips a negated term", () => {
    expect(polarity("not bullish", lexicon)).toBe(-1);
  });

  it("returns null without opinion words", () => {
    expect(polarity("hello world", lexicon)).toBeNull();
  });

  it("stays within [-1, 1] on the bundled lexicon", () => {
    const lx = loadLexicon();
    expect(polarity("GME to the moon 🚀 diamond hands", lx)).toBe(1);
    expect(polarity("bagholder panic, total crash", lx)).toBe(-1);
  });
});

describe("bucketOf", () => {
  it("uses ±0.1 cut-offs", () => {
    expect(bucketOf(0.5)).toBe("positive");
    expect(bucketOf(0.1)).toBe("neutral");
    expect(bucketOf(-0.1)).toBe("neutral");
    expect(bucketOf(-0.11)).toBe("negative");
  });
});
