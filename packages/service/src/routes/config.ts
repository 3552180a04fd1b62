/**
 * Configuration reload endpoint.
 * A reload only affects sessions created afterwards.
 */

import type { FastifyInstance } from "fastify";
import {
  loadRecordingConfig,
  type RecordingSessionManager,
} from "@capture-session/core";

interface ConfigRoutesOptions {
  manager: RecordingSessionManager;
  recordingConfigPath: string;
}

export async function registerConfigRoutes(
  app: FastifyInstance,
  options: ConfigRoutesOptions
): Promise<void> {
  const { manager, recordingConfigPath } = options;

  app.get("/api/config", async () => {
    return { path: recordingConfigPath, config: manager.getConfiguration() };
  });

  app.post("/api/config/reload", async () => {
    const config = loadRecordingConfig(recordingConfigPath);
    manager.setConfiguration(config);
    app.log.info(`Reloaded recording configuration from ${recordingConfigPath}`);
    return {
      path: recordingConfigPath,
      appliesToActiveSession: false,
      config,
    };
  });
}
