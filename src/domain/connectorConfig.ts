import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { ConnectorType } from "./types.js";

const secret = z.string().trim().min(1);

const repoFullName = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, "Expected owner/name");

export const connectorSettingsSchema = z.discriminatedUnion("connectorType", [
  z.object({
    connectorType: z.literal("SERPER_API"),
    config: z.object({ SERPER_API_KEY: secret }).strict(),
  }),
  z.object({
    connectorType: z.literal("TAVILY_API"),
    config: z.object({ TAVILY_API_KEY: secret }).strict(),
  }),
  z.object({
    connectorType: z.literal("SLACK_CONNECTOR"),
    config: z.object({ SLACK_BOT_TOKEN: secret }).strict(),
  }),
  z.object({
    connectorType: z.literal("NOTION_CONNECTOR"),
    config: z.object({ NOTION_INTEGRATION_TOKEN: secret }).strict(),
  }),
  z.object({
    connectorType: z.literal("GITHUB_CONNECTOR"),
    config: z
      .object({
        GITHUB_PAT: secret,
        repo_full_names: z.array(repoFullName).min(1),
      })
      .strict(),
  }),
]);

export type ConnectorSettings = z.infer<typeof connectorSettingsSchema>;

export type ConnectorConfigFor<T extends ConnectorType> = Extract<
  ConnectorSettings,
  { connectorType: T }
>["config"];

const INDEXABLE_TYPES: ReadonlySet<ConnectorType> = new Set<ConnectorType>([
  "SLACK_CONNECTOR",
  "NOTION_CONNECTOR",
  "GITHUB_CONNECTOR",
]);

export function isIndexableConnectorType(type: ConnectorType): boolean {
  return INDEXABLE_TYPES.has(type);
}

export function parseConnectorSettings(
  connectorType: unknown,
  config: unknown,
): ConnectorSettings {
  const result = connectorSettingsSchema.safeParse({ connectorType, config });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "connector"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid connector config: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

const SECRET_KEY_PATTERN = /(_KEY|_TOKEN|_PAT)$/;

export function redactConfig(config: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    redacted[key] = SECRET_KEY_PATTERN.test(key) ? "***" : value;
  }
  return redacted;
}
