/**
 * REST client for the local daemon.
 */

import { getDaemonUrl } from "@capture-session/core";

export class DaemonRequestError extends Error {
  constructor(
    message: string,
    /** HTTP status, or null when the daemon could not be reached */
    readonly status: number | null,
    readonly code?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "DaemonRequestError";
  }
}

interface ErrorBody {
  error?: string;
  code?: string;
}

function isErrorBody(value: unknown): value is ErrorBody {
  return typeof value === "object" && value !== null && "error" in value;
}

/**
 * Send a JSON request to the daemon.
 * Non-2xx responses become DaemonRequestError carrying the daemon's code.
 */
export async function daemonRequest<T>(
  method: "GET" | "POST" | "PATCH",
  path: string,
  body?: unknown
): Promise<T> {
  const baseUrl = getDaemonUrl();

  let response: Response;
  try {
    response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: method === "GET" ? undefined : { "content-type": "application/json" },
      // Fastify rejects an empty JSON body, so writes always send one
      body: method === "GET" ? undefined : JSON.stringify(body ?? {}),
      signal: AbortSignal.timeout(5000),
    });
  } catch (error) {
    throw new DaemonRequestError(
      `Cannot reach the daemon at ${baseUrl}. Is it running?`,
      null,
      undefined,
      { cause: error }
    );
  }

  const payload: unknown = await response.json().catch(() => null);
  if (!response.ok) {
    const message = isErrorBody(payload) && payload.error
      ? payload.error
      : `HTTP ${response.status}`;
    throw new DaemonRequestError(
      message,
      response.status,
      isErrorBody(payload) ? payload.code : undefined
    );
  }
  return payload as T;
}

/**
 * Print a failed command's error and exit with status 1.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof DaemonRequestError) {
    console.error(error.code ? `${error.message} (${error.code})` : error.message);
  } else if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error(String(error));
  }
  process.exit(1);
}
