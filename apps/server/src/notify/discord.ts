import { request, type Dispatcher } from "undici";

import { NotifierError } from "@shared/errors";

import { logger } from "../logger";

import { ACCENT_COLORS, type Accent, type Notifier } from "./types";

const log = logger.child({ component: "discord" });

// Discord caps embed titles at 256 and descriptions at 4096 characters
const MAX_TITLE = 256;
const MAX_DESCRIPTION = 4096;

export interface DiscordNotifierOptions {
  token: string;
  apiUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class DiscordNotifier implements Notifier {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: DiscordNotifierOptions) {
    this.token = options.token;
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.dispatcher = options.dispatcher;
  }

  async send(destination: string, title: string, body: string, accent: Accent): Promise<void> {
    const url = `${this.apiUrl}/channels/${encodeURIComponent(destination)}/messages`;
    const payload = {
      embeds: [
        {
          title: title.slice(0, MAX_TITLE),
          description: body.slice(0, MAX_DESCRIPTION),
          color: ACCENT_COLORS[accent],
        },
      ],
    };

    let statusCode: number;
    let raw: string;
    try {
      const response = await request(url, {
        method: "POST",
        headers: {
          authorization: `Bot ${this.token}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      raw = await response.body.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NotifierError(destination, `Delivery to ${destination} failed: ${reason}`, {
        cause: err,
      });
    }

    if (statusCode === 404) {
      throw new NotifierError(destination, `Channel ${destination} not found`);
    }
    if (statusCode < 200 || statusCode >= 300) {
      throw new NotifierError(
        destination,
        `Delivery to ${destination} rejected with ${statusCode}: ${raw.slice(0, 200)}`,
      );
    }

    log.debug({ destination, accent }, "Message delivered");
  }
}
