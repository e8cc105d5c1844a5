import { z } from "zod";
import type { ConnectorConfigFor } from "../../domain/connectorConfig.js";
import { DEFAULT_CHUNKING, splitIntoChunks } from "../../pipelines/chunking.js";
import type { IndexingWindow } from "../../pipelines/indexingWindow.js";
import type { FetchLike } from "../ai/types.js";
import { MAX_PAGES, fetchJson, pageLimitExceeded, withQuery } from "./http.js";
import type { ConnectorDocument, ConnectorSource, PendingItem } from "./types.js";

const NOTION_API = "https://api.notion.com/v1";
const NOTION_VERSION = "2022-06-28";
const MAX_BLOCK_DEPTH = 3;

const richTextSchema = z.array(z.object({ plain_text: z.string() }));

const pageSchema = z.object({
  id: z.string(),
  url: z.string().default(""),
  last_edited_time: z.string(),
  properties: z
    .record(
      z.object({
        type: z.string(),
        title: richTextSchema.optional(),
      }),
    )
    .default({}),
});

const searchResponseSchema = z.object({
  results: z.array(pageSchema),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().default(null),
});

const blockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().default(false),
  })
  .catchall(z.unknown());

const blockChildrenSchema = z.object({
  results: z.array(blockSchema),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().default(null),
});

const blockBodySchema = z.object({
  rich_text: richTextSchema.default([]),
  checked: z.boolean().optional(),
});

export type NotionPage = z.infer<typeof pageSchema>;

export interface NotionBlock {
  type: string;
  body: unknown;
  children: NotionBlock[];
}

const LINE_PREFIXES: Record<string, string> = {
  heading_1: "# ",
  heading_2: "## ",
  heading_3: "### ",
  bulleted_list_item: "- ",
  numbered_list_item: "1. ",
  quote: "> ",
  callout: "> ",
  paragraph: "",
  toggle: "",
};

interface NotionSourceOptions {
  fetchImpl?: FetchLike;
}

/**
 * Pages shared with the integration, newest edits first; one item per page.
 * A page's blocks are read when its item is built.
 */
export class NotionSource implements ConnectorSource {
  readonly label = "Notion";

  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: ConnectorConfigFor<"NOTION_CONNECTOR">,
    options: NotionSourceOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchItems(window: IndexingWindow): Promise<PendingItem[]> {
    const pages = await this.listEditedPages(window);
    return pages.map((page) => ({
      itemId: page.id,
      build: async () => buildNotionDocument(page, await this.readBlocks(page.id, 0)),
    }));
  }

  private async listEditedPages(window: IndexingWindow): Promise<NotionPage[]> {
    const pages: NotionPage[] = [];
    let cursor: string | null = null;

    for (let page = 0; ; page += 1) {
      if (page === MAX_PAGES) {
        throw pageLimitExceeded("Notion", "search results");
      }
      const body: z.infer<typeof searchResponseSchema> = await fetchJson(
        this.fetchImpl,
        "Notion",
        `${NOTION_API}/search`,
        {
          method: "POST",
          headers: this.headers(),
          body: JSON.stringify({
            filter: { property: "object", value: "page" },
            sort: { direction: "descending", timestamp: "last_edited_time" },
            page_size: 100,
            ...(cursor ? { start_cursor: cursor } : {}),
          }),
        },
        searchResponseSchema,
      );

      let reachedOlderPages = false;
      for (const result of body.results) {
        const editedAt = Date.parse(result.last_edited_time);
        if (editedAt < window.since.getTime()) {
          reachedOlderPages = true;
          continue;
        }
        if (editedAt <= window.until.getTime()) {
          pages.push(result);
        }
      }

      // Results are sorted by edit time, so older pages mean the window is exhausted.
      if (reachedOlderPages || !body.has_more || !body.next_cursor) {
        break;
      }
      cursor = body.next_cursor;
    }
    return pages;
  }

  private async readBlocks(blockId: string, depth: number): Promise<NotionBlock[]> {
    const blocks: NotionBlock[] = [];
    let cursor: string | null = null;

    for (let page = 0; ; page += 1) {
      if (page === MAX_PAGES) {
        throw pageLimitExceeded("Notion", `children of block ${blockId}`);
      }
      const body: z.infer<typeof blockChildrenSchema> = await fetchJson(
        this.fetchImpl,
        "Notion",
        withQuery(`${NOTION_API}/blocks/${blockId}/children`, {
          page_size: 100,
          start_cursor: cursor ?? undefined,
        }),
        { headers: this.headers() },
        blockChildrenSchema,
      );

      for (const block of body.results) {
        const children =
          block.has_children && block.type !== "child_page" && depth + 1 < MAX_BLOCK_DEPTH
            ? await this.readBlocks(block.id, depth + 1)
            : [];
        blocks.push({ type: block.type, body: block[block.type], children });
      }

      if (!body.has_more || !body.next_cursor) {
        break;
      }
      cursor = body.next_cursor;
    }
    return blocks;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.NOTION_INTEGRATION_TOKEN}`,
      "Notion-Version": NOTION_VERSION,
      "Content-Type": "application/json",
    };
  }
}

export function buildNotionDocument(page: NotionPage, blocks: NotionBlock[]): ConnectorDocument {
  const title = pageTitle(page);
  const content = renderBlocks(blocks, 0).join("\n");
  if (!content.trim()) {
    throw new Error(`Notion page ${page.id} has no text content.`);
  }

  return {
    documentType: "NOTION_CONNECTOR",
    title: `Notion - ${title}`,
    content,
    metadata: {
      page_id: page.id,
      page_title: title,
      url: page.url,
      last_edited_time: page.last_edited_time,
    },
    chunkTexts: splitIntoChunks(content, DEFAULT_CHUNKING),
  };
}

export function pageTitle(page: NotionPage): string {
  for (const property of Object.values(page.properties)) {
    if (property.type === "title" && property.title) {
      const text = property.title.map((part) => part.plain_text).join("").trim();
      if (text) {
        return text;
      }
    }
  }
  return "Untitled";
}

function renderBlocks(blocks: NotionBlock[], depth: number): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];

  for (const block of blocks) {
    const parsed = blockBodySchema.safeParse(block.body);
    const text = parsed.success
      ? parsed.data.rich_text.map((part) => part.plain_text).join("").trim()
      : "";

    if (text) {
      if (block.type === "to_do") {
        const mark = parsed.success && parsed.data.checked ? "x" : " ";
        lines.push(`${indent}- [${mark}] ${text}`);
      } else if (block.type === "code") {
        lines.push("```", text, "```");
      } else {
        const prefix = LINE_PREFIXES[block.type];
        if (prefix !== undefined) {
          lines.push(`${indent}${prefix}${text}`);
        }
      }
    }

    lines.push(...renderBlocks(block.children, depth + 1));
  }
  return lines;
}
