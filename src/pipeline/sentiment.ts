// src/pipeline/sentiment.ts
import type { Lexicon } from "../resources.js";

const WORD = /[\p{L}\p{N}']+|\p{Extended_Pictographic}/gu;

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(WORD) ?? []).map((t) => t.replace(/^'+|'+$/g, ""));
}

/**
 * Lexicon polarity in [-1, 1]: (pos − neg) / (pos + neg) over weighted hits.
 * A negator directly before a term moves its weight to the other side
 * ("not bullish" counts as bearish). Returns null when nothing matched, so
 * texts without opinion words do not dilute the daily mean.
 */
export function polarity(text: string, lexicon: Lexicon): number | null {
  const tokens = tokenize(text);
  let pos = 0;
  let neg = 0;

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    const p = lexicon.positive.get(t) ?? 0;
    const n = lexicon.negative.get(t) ?? 0;
    if (!p && !n) continue;
    const negated = i > 0 && lexicon.negators.has(tokens[i - 1]);
    if (negated) {
      pos += n;
      neg += p;
    } else {
      pos += p;
      neg += n;
    }
  }

  const total = pos + neg;
  if (total === 0) return null;
  return (pos - neg) / total;
}

export type PolarityBucket = "positive" | "neutral" | "negative";

/** Same cut-offs as the market-wide distribution: ±0.1. */
export function bucketOf(score: number): PolarityBucket {
  if (score > 0.1) return "positive";
  if (score < -0.1) return "negative";
  return "neutral";
}
