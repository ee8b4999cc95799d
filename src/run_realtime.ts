// src/run_realtime.ts
import { cfg } from "./config.js";
import { HistoryDB } from "./db/HistoryDB.js";
import { Coordinator } from "./engine/Coordinator.js";
import { settingsFromEnv } from "./engine/settings.js";
import { log } from "./logger.js";
import { authFailureEmbed, notifyDiscord, transitionEmbed } from "./notify/discord.js";
import { createHttpUpstream } from "./providers/index.js";
import type { EngineSnapshot } from "./types.js";

const nowIso = () => new Date().toISOString();

/* ---------------- helpers ---------------- */
function summaryLines(snap: EngineSnapshot, max = 5) {
  return snap.tickers.slice(0, max).map((t) => ({
    symbol: t.symbol,
    impact: t.impactScore,
    likelihood: t.memeLikelihood,
    stage: t.stage,
    mentions: t.mentionCount,
  }));
}

/* --------------- preconditions --------------- */
const settings = settingsFromEnv(cfg);
log.info("[BOOT] using DB:", cfg.DB_PATH);
log.info("[BOOT] cadence:", {
  UPDATE_INTERVAL_SECONDS: settings.updateIntervalMs / 1000,
  SUBREDDITS: settings.subreddits,
  MIN_POSTS: settings.minPosts,
  MIN_KARMA: settings.minKarma,
  WEIGHTS: settings.weights,
});

/* ---------------- state ---------------- */
const historyDb = new HistoryDB(cfg.DB_PATH);
const engine = new Coordinator({
  upstream: createHttpUpstream(cfg, settings),
  settings,
  db: historyDb,
});

engine.on("cycle", (snap) => {
  log.info("[CYCLE] snapshot", {
    status: snap.overview.status,
    tickers: snap.tickers.length,
    posts: snap.overview.postsProcessed,
    top: summaryLines(snap),
  });
});

engine.on("degraded", (notice) => {
  log.warn("[CYCLE] degraded source", notice);
});

engine.on("auth-error", (err) => {
  notifyDiscord({ content: "", embeds: [authFailureEmbed(err)] }).catch((e: unknown) =>
    log.error("[DISCORD] auth notice failed", e)
  );
});

engine.on("transition", (t) => {
  log.info("[STAGE]", { symbol: t.symbol, from: t.from, to: t.to });
  if (!cfg.NOTIFY_TRANSITIONS) return;
  notifyDiscord({
    content: "",
    embeds: [transitionEmbed(t)],
    reactions: t.to === "DoNotBuy" || t.to === "Dropping" ? ["👀", "📉"] : ["👀", "📈"],
  }).catch((e: unknown) => log.error("[DISCORD] transition notice failed", e));
});

/* ---------------- boot ---------------- */
function shutdown(signal: string) {
  log.info("[BOOT] shutting down", { signal });
  engine.stop();
  historyDb.close();
  process.exit(0);
}

function start() {
  log.info("Realtime: polling subreddits and market data", { at: nowIso() });
  engine.start();
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
start();
