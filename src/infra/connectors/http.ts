import type { z } from "zod";
import { ConnectorFetchError, describeError } from "../../domain/errors.js";
import type { FetchLike } from "../ai/types.js";

/** Largest number of result pages read from one listing endpoint per run. */
export const MAX_PAGES = 50;

/** Raised when a listing still has pages left after MAX_PAGES reads. */
export function pageLimitExceeded(service: string, listing: string): ConnectorFetchError {
  return new ConnectorFetchError(
    `Stopped reading ${listing} after ${MAX_PAGES} ${service} result pages; more remain.`,
  );
}

/**
 * Sends one request and validates the JSON body against `schema`. Network
 * errors, non-2xx statuses and unexpected payloads all become
 * ConnectorFetchError.
 */
export async function fetchJson<T>(
  fetchImpl: FetchLike,
  service: string,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    throw new ConnectorFetchError(`${service} request failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new ConnectorFetchError(
      `${service} API request failed (${response.status}): ${await response.text()}`,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ConnectorFetchError(`${service} returned invalid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new ConnectorFetchError(`Unexpected ${service} API response: ${details}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function withQuery(
  base: string,
  params: Record<string, string | number | undefined>,
): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== "") {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}
