import { readFileSync } from "node:fs";
import { z } from "zod";

/** Word lists and the tracked-symbol table live in <repo>/data. */
const DATA_DIR = new URL("../data/", import.meta.url);

function readJson<T extends z.ZodTypeAny>(file: string, schema: T): z.output<T> {
  const raw: unknown = JSON.parse(readFileSync(new URL(file, DATA_DIR), "utf8"));
  return schema.parse(raw);
}

const SymbolTableSchema = z.record(z.string(), z.string());
const BlacklistSchema = z.array(z.string());
const LexiconSchema = z.object({
  positive: z.record(z.string(), z.number().positive()),
  negative: z.record(z.string(), z.number().positive()),
  negators: z.array(z.string()),
});

export type Lexicon = {
  positive: ReadonlyMap<string, number>;
  negative: ReadonlyMap<string, number>;
  negators: ReadonlySet<string>;
};

let symbolNames: ReadonlyMap<string, string> | null = null;
let blacklist: ReadonlySet<string> | null = null;
let lexicon: Lexicon | null = null;

/** Tracked symbols → display names. */
export function loadSymbolNames(): ReadonlyMap<string, string> {
  symbolNames ??= new Map(Object.entries(readJson("symbols.json", SymbolTableSchema)));
  return symbolNames;
}

export function loadBlacklist(): ReadonlySet<string> {
  blacklist ??= new Set(readJson("blacklist.json", BlacklistSchema));
  return blacklist;
}

export function loadLexicon(): Lexicon {
  if (!lexicon) {
    const raw = readJson("lexicon.json", LexiconSchema);
    lexicon = {
      positive: new Map(Object.entries(raw.positive)),
      negative: new Map(Object.entries(raw.negative)),
      negators: new Set(raw.negators),
    };
  }
  return lexicon;
}
