import axios from "axios";
import { z } from "zod";
import { cfg } from "../config.js";
import type { UpstreamAuthError } from "../errors.js";
import { log } from "../logger.js";
import type { Stage, StageTransition } from "../types.js";

// ---------- Types ----------
export type EmbedField = { name: string; value: string; inline?: boolean };
export type Embed = {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  timestamp?: string; // ISO
  fields?: EmbedField[];
  footer?: { text: string; icon_url?: string };
  author?: { name: string; url?: string; icon_url?: string };
};

type SendOptions =
  | string
  | {
      content?: string;
      embeds?: Embed[];
      // post-send reactions
      reactions?: string[];
      // suppress link previews in content, if any
      suppress_embeds?: boolean;
    };

export type DiscordTarget = { token: string; channelId: string };

// ---------- Limits ----------
const LIMITS = {
  CONTENT: 2000,
  TITLE: 256,
  DESC: 4096,
  FIELDS: 25,
  FIELD_NAME: 256,
  FIELD_VALUE: 1024,
  TOTAL_EMBEDS: 10,
};

export function sanitizeEmbed(e: Embed): Embed {
  const out: Embed = { ...e };
  if (out.title && out.title.length > LIMITS.TITLE) out.title = out.title.slice(0, LIMITS.TITLE - 1) + "…";
  if (out.description && out.description.length > LIMITS.DESC)
    out.description = out.description.slice(0, LIMITS.DESC - 1) + "…";
  if (out.fields) {
    out.fields = out.fields.slice(0, LIMITS.FIELDS).map((f) => {
      let name = f.name || "";
      let value = f.value || "";
      if (name.length > LIMITS.FIELD_NAME) name = name.slice(0, LIMITS.FIELD_NAME - 1) + "…";
      if (value.length > LIMITS.FIELD_VALUE) value = value.slice(0, LIMITS.FIELD_VALUE - 1) + "…";
      return { name, value, inline: f.inline };
    });
  }
  return out;
}

const RateLimitBody = z.object({ retry_after: z.number().nonnegative() }).partial();
const MessageBody = z.object({ id: z.string() }).partial();

async function requestWith429Retry(url: string, body: unknown, headers: Record<string, string>) {
  try {
    return await axios.post<unknown>(url, body, { headers, timeout: 8000 });
  } catch (err) {
    if (axios.isAxiosError(err) && err.response?.status === 429) {
      const parsed = RateLimitBody.safeParse(err.response.data);
      const retryAfter = ((parsed.success ? parsed.data.retry_after : undefined) ?? 1) * 1000;
      await new Promise((r) => setTimeout(r, retryAfter));
      return await axios.post<unknown>(url, body, { headers, timeout: 8000 });
    }
    throw err;
  }
}

/* ---------------- message builders ---------------- */

const STAGE_COLOR: Record<Stage, number> = {
  Start: 0x738adb, // blurple
  RisingInterest: 0x58a6ff, // blue
  StockRising: 0x23d18b, // green
  WithinEstimatedPeak: 0xffa657, // orange
  DoNotBuy: 0xf85149, // red
  Dropping: 0x666a70, // muted gray
};

const STAGE_LABEL: Record<Stage, string> = {
  Start: "Start",
  RisingInterest: "Rising interest",
  StockRising: "Stock rising",
  WithinEstimatedPeak: "Within estimated peak",
  DoNotBuy: "Do not buy",
  Dropping: "Dropping",
};

function meter(score: number, width = 14) {
  const v = Math.max(0, Math.min(100, score));
  const filled = Math.round((v / 100) * width);
  return "`" + "█".repeat(filled) + "░".repeat(width - filled) + "` " + Math.round(v);
}

export function transitionEmbed(t: StageTransition): Embed {
  const s = t.snapshot;
  const title = `${t.symbol}${s.name ? ` (${s.name})` : ""}: ${STAGE_LABEL[t.from]} → ${STAGE_LABEL[t.to]}`;
  return sanitizeEmbed({
    title,
    color: STAGE_COLOR[t.to],
    timestamp: new Date(t.at).toISOString(),
    author: { name: "Meme Radar · stage change" },
    description: s.declineFlag ? "> ⚠️ decline flag set" : undefined,
    fields: [
      { name: "Impact", value: meter(s.impactScore), inline: true },
      { name: "Meme likelihood", value: `${Math.round(s.memeLikelihood * 100)}%`, inline: true },
      { name: "Mentions today", value: String(s.mentionCount), inline: true },
      {
        name: "Signals",
        value: [
          `• Volume: ${Math.round(s.volumeScore)}`,
          `• Sentiment: ${Math.round(s.sentimentScore)}`,
          `• Momentum: ${Math.round(s.momentumScore)}`,
          `• Short interest: ${s.shortInterest === null ? "n/a" : `${s.shortInterest}%`}`,
        ].join("\n"),
        inline: false,
      },
    ],
    footer: { text: `shortable=${s.shortable ? "yes" : "no"} • days active=${s.daysActive}` },
  });
}

export function authFailureEmbed(err: UpstreamAuthError): Embed {
  return sanitizeEmbed({
    title: `Source suspended: ${err.source}`,
    color: STAGE_COLOR.DoNotBuy,
    timestamp: new Date().toISOString(),
    description: `${err.message}\nFix the credentials and reconfigure to resume.`,
  });
}

/**
 * Send a message via Bot Token + Channel ID.
 * - Plain text: notifyDiscord("hello")
 * - Rich: notifyDiscord({ content, embeds, reactions })
 * Without a token or channel this is a no-op. Delivery failures are logged,
 * never thrown.
 */
export async function notifyDiscord(
  opts: SendOptions,
  target: Partial<DiscordTarget> = { token: cfg.DISCORD_BOT_TOKEN, channelId: cfg.DISCORD_CHANNEL_ID }
): Promise<{ messageId?: string } | void> {
  const { token, channelId } = target;
  if (!token || !channelId) return;

  const url = `https://discord.com/api/v10/channels/${channelId}/messages`;
  const headers = {
    Authorization: `Bot ${token}`,
    "Content-Type": "application/json",
  };

  let content: string | undefined;
  let embeds: Embed[] | undefined;
  let suppress_embeds: boolean | undefined;
  let reactions: string[] | undefined;

  if (typeof opts === "string") {
    content = opts.slice(0, LIMITS.CONTENT);
  } else {
    content = opts.content ? opts.content.slice(0, LIMITS.CONTENT) : undefined;
    embeds = (opts.embeds || []).slice(0, LIMITS.TOTAL_EMBEDS).map(sanitizeEmbed);
    suppress_embeds = opts.suppress_embeds;
    reactions = opts.reactions;
  }

  const flags = suppress_embeds ? 1 << 2 /* SUPPRESS_EMBEDS */ : undefined;
  const body = { content, embeds, flags };

  let messageId: string | undefined;
  try {
    const res = await requestWith429Retry(url, body, headers);
    const parsed = MessageBody.safeParse(res.data);
    messageId = parsed.success ? parsed.data.id : undefined;
  } catch (err) {
    log.warn("[DISCORD] send failed", axios.isAxiosError(err) ? err.response?.status ?? err.code : err);
    return;
  }

  // --- Optional: add reactions
  if (messageId && reactions?.length) {
    for (const emoji of reactions.slice(0, 10)) {
      // emoji must be URL-encoded
      const e = encodeURIComponent(emoji);
      const rUrl = `https://discord.com/api/v10/channels/${channelId}/messages/${messageId}/reactions/${e}/@me`;
      try {
        await axios.put(rUrl, null, { headers, timeout: 5000 });
      } catch (err) {
        log.warn("[DISCORD] reaction failed", { emoji, status: axios.isAxiosError(err) ? err.response?.status : undefined });
      }
    }
  }

  return { messageId };
}
