/**
 * Session history endpoints.
 */

import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import {
  getSessionById,
  listSessions,
  readManifest,
  type SessionHistoryStatus,
} from "@capture-session/core";

interface SessionsRoutesOptions {
  db: Database.Database;
}

export async function registerSessionsRoutes(
  app: FastifyInstance,
  options: SessionsRoutesOptions
): Promise<void> {
  const { db } = options;

  app.get<{ Querystring: { status?: SessionHistoryStatus } }>(
    "/api/sessions",
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            status: { type: "string", enum: ["active", "finalized", "aborted"] },
          },
        },
      },
    },
    async (request) => {
      return listSessions(db, request.query.status);
    }
  );

  // History entry plus its manifest, once finalized
  app.get<{ Params: { id: string } }>(
    "/api/sessions/:id",
    async (request, reply) => {
      const session = getSessionById(db, request.params.id);
      if (!session) {
        return reply.code(404).send({ error: "Session not found" });
      }

      const manifest =
        session.status === "finalized"
          ? readManifest(session.sessionDirectory)
          : null;
      return { ...session, manifest };
    }
  );
}
