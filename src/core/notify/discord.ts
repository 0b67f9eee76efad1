/**
 * Discord webhook notifications
 */

import { DISCORD_CONSTANTS } from "../constants";
import { errorMessage, Logger } from "../utils/logger";

/** Delivers a message somewhere a person will see it */
export interface Notifier {
  /**
   * Best effort; resolves `false` instead of throwing when delivery fails
   * or no target is configured
   */
  send(message: string): Promise<boolean>;
}

export class DiscordNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs: number = DISCORD_CONSTANTS.TIMEOUT_MS,
  ) {}

  async send(message: string): Promise<boolean> {
    if (!this.webhookUrl) return false;

    // Cut on code points so an emoji is never split in half
    const chars = Array.from(message);
    const content =
      chars.length > DISCORD_CONSTANTS.MAX_CONTENT_LENGTH
        ? chars.slice(0, DISCORD_CONSTANTS.MAX_CONTENT_LENGTH - 1).join("") + "…"
        : message;

    try {
      const r = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ content, username: DISCORD_CONSTANTS.USERNAME }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!r.ok) {
        Logger.warn(`Discord webhook rejected message: HTTP ${r.status}`, {
          status: r.status,
        });
        return false;
      }
      return true;
    } catch (e) {
      Logger.warn(`Discord webhook request failed`, { error: errorMessage(e) });
      return false;
    }
  }
}

/**
 * Card name from a `/product/<id>/<slug>` URL, e.g.
 * `.../product/123/pokemon-charizard-base-set` → `Pokemon Charizard Base Set`
 */
export function cardNameFromUrl(url: string): string {
  const m = url.match(/\/product\/\d+\/([^/?#]+)/);
  if (!m) return "Unknown Card";
  return m[1]
    .split("-")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function buildStartupMessage(
  urls: readonly string[],
  intervalSeconds: number,
): string {
  const minutes = Math.floor(intervalSeconds / 60);
  const cards = urls.map((u) => `• ${cardNameFromUrl(u)}`);
  return [
    "🚀 **TCGPlayer Monitor Started!**",
    "",
    `📋 Monitoring ${urls.length} cards:`,
    ...cards,
    "",
    `⏰ Check interval: Every ${minutes} minutes`,
  ].join("\n");
}
