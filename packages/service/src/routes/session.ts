/**
 * Active session endpoints.
 *
 * Orchestrators create and end sessions here; capture processes ask for
 * their canonical filename before recording and report the file when done.
 * Errors propagate to the error handler (see error-handler.ts).
 */

import type { FastifyInstance } from "fastify";
import {
  CAMERA_ROLES,
  RECORDING_MODES,
  type CameraRole,
  type RecordingMode,
  type RecordingSessionManager,
  type SessionMetadata,
} from "@capture-session/core";

interface SessionRoutesOptions {
  manager: RecordingSessionManager;
}

const deviceIndexSchema = { type: "integer", minimum: 0 } as const;

export async function registerSessionRoutes(
  app: FastifyInstance,
  options: SessionRoutesOptions
): Promise<void> {
  const { manager } = options;

  // Current session (null when idle, never an error)
  app.get("/api/session", async () => {
    return { session: manager.getCurrentSessionInfo() };
  });

  app.post<{ Body: { timestamp?: string; mode?: RecordingMode } }>(
    "/api/session",
    {
      schema: {
        body: {
          type: "object",
          properties: {
            timestamp: { type: "string", minLength: 1 },
            mode: { type: "string", enum: [...RECORDING_MODES] },
          },
          additionalProperties: false,
        },
      },
    },
    async (request, reply) => {
      const { timestamp, mode } = request.body;
      const session = manager.createSession({ timestamp, mode });
      return reply.code(201).send(session);
    }
  );

  app.patch<{ Body: SessionMetadata }>(
    "/api/session/metadata",
    { schema: { body: { type: "object" } } },
    async (request) => {
      return manager.updateMetadata(request.body);
    }
  );

  app.get("/api/session/plan", async () => {
    return { devices: manager.planRecording() };
  });

  app.post<{ Body: { role: CameraRole; host: string; index: number } }>(
    "/api/session/filenames/camera",
    {
      schema: {
        body: {
          type: "object",
          required: ["role", "host", "index"],
          properties: {
            role: { type: "string", enum: [...CAMERA_ROLES] },
            host: { type: "string" },
            index: deviceIndexSchema,
          },
        },
      },
    },
    async (request) => {
      const { role, host, index } = request.body;
      return { filename: manager.generateCameraFilename(role, host, index) };
    }
  );

  app.post<{ Body: { index: number } }>(
    "/api/session/filenames/audio",
    {
      schema: {
        body: {
          type: "object",
          required: ["index"],
          properties: { index: deviceIndexSchema },
        },
      },
    },
    async (request) => {
      return { filename: manager.generateAudioFilename(request.body.index) };
    }
  );

  // Capture process finished writing a file
  app.post<{ Body: { filename: string } }>(
    "/api/session/files",
    {
      schema: {
        body: {
          type: "object",
          required: ["filename"],
          properties: { filename: { type: "string", minLength: 1 } },
        },
      },
    },
    async (request) => {
      manager.registerFile(request.body.filename);
      return manager.getCurrentSessionInfo();
    }
  );

  app.post<{ Body: { metadata?: SessionMetadata } }>(
    "/api/session/finalize",
    {
      schema: {
        body: {
          type: "object",
          properties: { metadata: { type: "object" } },
        },
      },
    },
    async (request) => {
      return manager.finalize(request.body.metadata ?? {});
    }
  );

  // Best-effort, never fails; safe to call from any failure path
  app.post("/api/session/cleanup", async () => {
    return manager.cleanupFailedSession();
  });
}
