// src/pipeline/extract.ts

export type ExtractOptions = {
  /** Symbols matched as plain tokens (case-sensitive). */
  known: ReadonlySet<string>;
  /** Ambiguous words; rejected unless written as a cashtag. */
  blacklist: ReadonlySet<string>;
  /** Longer texts are cut before scanning. */
  maxTextLength?: number;
};

/** Alphanumeric runs, with an optional `$` directly in front. */
const TOKEN = /(\$?)([A-Za-z0-9]+)/g;
const SYMBOL_SHAPE = /^[A-Z][A-Z0-9]{0,4}$/;

export function isValidSymbol(s: string): boolean {
  return SYMBOL_SHAPE.test(s);
}

/**
 * Find ticker symbols in free text. Matching is by whole token only, so
 * "GMEX" never yields GME. Cashtags (`$gme`, `$NEWCO`) are accepted even when
 * unknown or blacklisted; `$100` is a price and is ignored.
 */
export function extractTickers(text: string, opts: ExtractOptions): string[] {
  const src = opts.maxTextLength ? text.slice(0, opts.maxTextLength) : text;
  const found = new Set<string>();

  for (const m of src.matchAll(TOKEN)) {
    const [, dollar, token] = m;
    const start = m.index ?? 0;
    // "A$B" or "x$GME" is not a cashtag
    const prev = start > 0 ? src[start - 1] : "";
    const cashtag = dollar === "$" && !/[A-Za-z0-9]/.test(prev);

    if (cashtag) {
      const sym = token.toUpperCase();
      if (isValidSymbol(sym)) found.add(sym);
      continue;
    }
    if (!opts.known.has(token)) continue;
    if (opts.blacklist.has(token)) continue;
    if (!isValidSymbol(token)) continue;
    found.add(token);
  }
  return [...found];
}
