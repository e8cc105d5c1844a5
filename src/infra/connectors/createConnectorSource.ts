import type { ConnectorSettings } from "../../domain/connectorConfig.js";
import { ValidationError } from "../../domain/errors.js";
import type { FetchLike } from "../ai/types.js";
import { GithubSource } from "./githubSource.js";
import { NotionSource } from "./notionSource.js";
import { SlackSource } from "./slackSource.js";
import type { ConnectorSource } from "./types.js";

export type ConnectorSourceFactory = (settings: ConnectorSettings) => ConnectorSource;

export function createConnectorSource(
  settings: ConnectorSettings,
  fetchImpl?: FetchLike,
): ConnectorSource {
  switch (settings.connectorType) {
    case "SLACK_CONNECTOR":
      return new SlackSource(settings.config, { fetchImpl });
    case "NOTION_CONNECTOR":
      return new NotionSource(settings.config, { fetchImpl });
    case "GITHUB_CONNECTOR":
      return new GithubSource(settings.config, { fetchImpl });
    case "SERPER_API":
    case "TAVILY_API":
      throw new ValidationError(
        `Connector type ${settings.connectorType} is a live search source and cannot be indexed.`,
      );
  }
}
