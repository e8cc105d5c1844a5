import { z } from "zod";
import type { ConnectorConfigFor } from "../../domain/connectorConfig.js";
import { DEFAULT_CHUNKING, splitIntoChunks } from "../../pipelines/chunking.js";
import type { IndexingWindow } from "../../pipelines/indexingWindow.js";
import type { FetchLike } from "../ai/types.js";
import { MAX_PAGES, fetchJson, pageLimitExceeded, withQuery } from "./http.js";
import { failedItem } from "./types.js";
import type { ConnectorDocument, ConnectorSource, PendingItem } from "./types.js";

const GITHUB_API = "https://api.github.com";
const PER_PAGE = 100;

const issueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().default(null),
  state: z.string(),
  html_url: z.string(),
  updated_at: z.string(),
  user: z.object({ login: z.string() }).nullable().default(null),
  pull_request: z.object({}).passthrough().optional(),
});

const issueListSchema = z.array(issueSchema);

export type GithubIssue = z.infer<typeof issueSchema>;

interface GithubSourceOptions {
  fetchImpl?: FetchLike;
}

/**
 * Issues and pull requests updated inside the window, across every configured
 * repository. The issues endpoint lists both; `pull_request` tells them apart.
 */
export class GithubSource implements ConnectorSource {
  readonly label = "GitHub";

  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: ConnectorConfigFor<"GITHUB_CONNECTOR">,
    options: GithubSourceOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchItems(window: IndexingWindow): Promise<PendingItem[]> {
    const items: PendingItem[] = [];
    for (const repository of this.config.repo_full_names) {
      let issues: GithubIssue[];
      try {
        issues = await this.listUpdatedIssues(repository, window);
      } catch (error) {
        items.push(failedItem(repository, error));
        continue;
      }
      for (const issue of issues) {
        items.push({
          itemId: `${repository}#${issue.number}`,
          build: async () => buildGithubDocument(repository, issue),
        });
      }
    }
    return items;
  }

  private async listUpdatedIssues(
    repository: string,
    window: IndexingWindow,
  ): Promise<GithubIssue[]> {
    const issues: GithubIssue[] = [];

    for (let page = 1; ; page += 1) {
      if (page > MAX_PAGES) {
        throw pageLimitExceeded("GitHub", `issues for ${repository}`);
      }
      const batch = await fetchJson(
        this.fetchImpl,
        "GitHub",
        withQuery(`${GITHUB_API}/repos/${repository}/issues`, {
          state: "all",
          sort: "updated",
          direction: "asc",
          since: window.since.toISOString(),
          per_page: PER_PAGE,
          page,
        }),
        {
          headers: {
            Authorization: `Bearer ${this.config.GITHUB_PAT}`,
            Accept: "application/vnd.github+json",
            "X-GitHub-Api-Version": "2022-11-28",
          },
        },
        issueListSchema,
      );

      for (const issue of batch) {
        if (Date.parse(issue.updated_at) <= window.until.getTime()) {
          issues.push(issue);
        }
      }
      if (batch.length < PER_PAGE) {
        break;
      }
    }
    return issues;
  }
}

export function buildGithubDocument(repository: string, issue: GithubIssue): ConnectorDocument {
  const kind = issue.pull_request ? "pull_request" : "issue";
  const author = issue.user?.login ?? "unknown";
  const body = issue.body?.trim() ?? "";
  const content = [
    `# ${issue.title}`,
    "",
    `State: ${issue.state}`,
    `Author: ${author}`,
    ...(body ? ["", body] : []),
  ].join("\n");

  return {
    documentType: "GITHUB_CONNECTOR",
    title: `${repository}#${issue.number}: ${issue.title}`,
    content,
    metadata: {
      repository,
      number: issue.number,
      url: issue.html_url,
      state: issue.state,
      kind,
      updated_at: issue.updated_at,
    },
    chunkTexts: splitIntoChunks(content, DEFAULT_CHUNKING),
  };
}
