/**
 * Fastify server factory.
 * Creates and configures the daemon server.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import type { RecordingSessionManager } from "@capture-session/core";
import { errorHandler } from "./error-handler.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerSessionRoutes } from "./routes/session.js";
import { registerSessionsRoutes } from "./routes/sessions.js";
import { registerConfigRoutes } from "./routes/config.js";

export interface CreateServerOptions {
  manager: RecordingSessionManager;
  db: Database.Database;
  recordingConfigPath: string;
  /** Fastify request logging (default: true) */
  logger?: boolean;
}

/**
 * Create a configured Fastify server instance.
 */
export async function createServer(
  options: CreateServerOptions
): Promise<FastifyInstance> {
  const { manager, db, recordingConfigPath } = options;

  const app = Fastify({
    logger: options.logger ?? true,
  });

  app.setErrorHandler(errorHandler);

  await registerHealthRoutes(app, { manager });
  await registerSessionRoutes(app, { manager });
  await registerSessionsRoutes(app, { db });
  await registerConfigRoutes(app, { manager, recordingConfigPath });

  return app;
}

/**
 * Start the server on localhost only.
 */
export async function startServer(
  app: FastifyInstance,
  port: number
): Promise<void> {
  await app.listen({
    port,
    host: "127.0.0.1",
  });
  console.log(`Capture session daemon listening on http://127.0.0.1:${port}`);
}
