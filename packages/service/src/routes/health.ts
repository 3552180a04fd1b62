/**
 * Health check endpoint.
 */

import type { FastifyInstance } from "fastify";
import type { RecordingSessionManager } from "@capture-session/core";

interface HealthRoutesOptions {
  manager: RecordingSessionManager;
}

export interface HealthResponse {
  status: "ok";
  pid: number;
  uptime: number;
  sessionActive: boolean;
  sessionTimestamp: string | null;
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  options: HealthRoutesOptions
): Promise<void> {
  const { manager } = options;

  app.get("/api/health", async (): Promise<HealthResponse> => {
    const session = manager.getCurrentSessionInfo();
    return {
      status: "ok",
      pid: process.pid,
      uptime: process.uptime(),
      sessionActive: session !== null,
      sessionTimestamp: session?.timestamp ?? null,
    };
  });
}
