import { z } from "zod";
import type { ConnectorConfigFor } from "../../domain/connectorConfig.js";
import { ConnectorFetchError } from "../../domain/errors.js";
import { DEFAULT_CHUNKING, groupLinesIntoChunks } from "../../pipelines/chunking.js";
import type { IndexingWindow } from "../../pipelines/indexingWindow.js";
import type { FetchLike } from "../ai/types.js";
import { MAX_PAGES, fetchJson, pageLimitExceeded, withQuery } from "./http.js";
import { failedItem } from "./types.js";
import type { ConnectorDocument, ConnectorSource, PendingItem } from "./types.js";

const SLACK_API = "https://slack.com/api";

const slackEnvelope = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

const channelListSchema = slackEnvelope.extend({
  channels: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        is_member: z.boolean().optional(),
      }),
    )
    .default([]),
});

const slackMessageSchema = z.object({
  ts: z.string(),
  text: z.string().default(""),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  subtype: z.string().optional(),
});

const historySchema = slackEnvelope.extend({
  messages: z.array(slackMessageSchema).default([]),
});

export type SlackMessage = z.infer<typeof slackMessageSchema>;

export interface SlackChannel {
  id: string;
  name: string;
}

// Membership notices carry no conversation content.
const SKIPPED_SUBTYPES = new Set(["channel_join", "channel_leave", "bot_add", "bot_remove"]);

interface SlackSourceOptions {
  fetchImpl?: FetchLike;
  maxChunkChars?: number;
}

/** Reads channel history through the Slack Web API; one item per channel. */
export class SlackSource implements ConnectorSource {
  readonly label = "Slack";

  private readonly fetchImpl: FetchLike;

  private readonly maxChunkChars: number;

  constructor(
    private readonly config: ConnectorConfigFor<"SLACK_CONNECTOR">,
    options: SlackSourceOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxChunkChars = options.maxChunkChars ?? DEFAULT_CHUNKING.maxChars;
  }

  async fetchItems(window: IndexingWindow): Promise<PendingItem[]> {
    const channels = await this.listChannels();
    const items: PendingItem[] = [];

    for (const channel of channels) {
      let messages: SlackMessage[];
      try {
        messages = await this.readHistory(channel.id, window);
      } catch (error) {
        items.push(failedItem(channel.id, error));
        continue;
      }
      if (messages.length === 0) {
        continue;
      }
      items.push({
        itemId: channel.id,
        build: async () => buildSlackDocument(channel, messages, this.maxChunkChars),
      });
    }
    return items;
  }

  private async listChannels(): Promise<SlackChannel[]> {
    const channels: SlackChannel[] = [];
    let cursor: string | undefined;

    for (let page = 0; ; page += 1) {
      if (page === MAX_PAGES) {
        throw pageLimitExceeded("Slack", "channels");
      }
      const body = await this.call(
        withQuery(`${SLACK_API}/conversations.list`, {
          types: "public_channel,private_channel",
          exclude_archived: "true",
          limit: 200,
          cursor,
        }),
        channelListSchema,
      );
      for (const channel of body.channels) {
        if (channel.is_member !== false) {
          channels.push({ id: channel.id, name: channel.name });
        }
      }
      cursor = body.response_metadata?.next_cursor;
      if (!cursor) {
        break;
      }
    }
    return channels;
  }

  private async readHistory(channelId: string, window: IndexingWindow): Promise<SlackMessage[]> {
    const messages: SlackMessage[] = [];
    let cursor: string | undefined;

    for (let page = 0; ; page += 1) {
      if (page === MAX_PAGES) {
        throw pageLimitExceeded("Slack", `history of channel ${channelId}`);
      }
      const body = await this.call(
        withQuery(`${SLACK_API}/conversations.history`, {
          channel: channelId,
          oldest: toSlackTimestamp(window.since),
          latest: toSlackTimestamp(window.until),
          inclusive: "true",
          limit: 200,
          cursor,
        }),
        historySchema,
      );
      for (const message of body.messages) {
        if (!message.subtype || !SKIPPED_SUBTYPES.has(message.subtype)) {
          if (message.text.trim()) {
            messages.push(message);
          }
        }
      }
      cursor = body.response_metadata?.next_cursor;
      if (!cursor) {
        break;
      }
    }
    return messages;
  }

  private async call<T extends { ok: boolean; error?: string }>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const body = await fetchJson(
      this.fetchImpl,
      "Slack",
      url,
      { headers: { Authorization: `Bearer ${this.config.SLACK_BOT_TOKEN}` } },
      schema,
    );
    if (!body.ok) {
      throw new ConnectorFetchError(`Slack API error: ${body.error ?? "unknown_error"}`);
    }
    return body;
  }
}

/**
 * One document per channel: a line per message in chronological order,
 * chunked on line boundaries so a message is never split across chunks.
 */
export function buildSlackDocument(
  channel: SlackChannel,
  messages: SlackMessage[],
  maxChunkChars: number = DEFAULT_CHUNKING.maxChars,
): ConnectorDocument {
  const ordered = [...messages].sort((a, b) => Number(a.ts) - Number(b.ts));
  const lines = ordered.map(
    (message) =>
      `[${formatSlackTimestamp(message.ts)}] <${message.user ?? message.bot_id ?? "unknown"}>: ${message.text.trim()}`,
  );

  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  if (!first || !last) {
    throw new Error(`Slack channel ${channel.id} has no messages to index.`);
  }

  return {
    documentType: "SLACK_CONNECTOR",
    title: `Slack - ${channel.name}`,
    content: lines.join("\n"),
    metadata: {
      channel_id: channel.id,
      channel_name: channel.name,
      message_count: ordered.length,
      start_date: formatSlackTimestamp(first.ts).slice(0, 10),
      end_date: formatSlackTimestamp(last.ts).slice(0, 10),
    },
    chunkTexts: groupLinesIntoChunks(lines, maxChunkChars),
  };
}

/** `1718000000.000100` → `2024-06-10 06:13:20` (UTC). */
export function formatSlackTimestamp(ts: string): string {
  const seconds = Number(ts);
  if (!Number.isFinite(seconds)) {
    throw new Error(`Invalid Slack timestamp: ${ts}`);
  }
  const iso = new Date(seconds * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

function toSlackTimestamp(date: Date): string {
  return (date.getTime() / 1000).toFixed(6);
}
