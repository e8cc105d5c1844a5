import winston from "winston";

const LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

// stdout carries the stdio MCP transport, so every level goes to stderr.
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.LOG_SILENT === "true",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "search-space-mcp" },
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
});
