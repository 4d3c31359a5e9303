import { randomUUID } from "node:crypto";
import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import { z } from "zod";
import { heldArtifacts, sessionStateSchema } from "../../orchestrator/session-state";

const sessionParamsSchema = z.object({
  sessionId: z.string().min(1)
});

const sessionRoutes: FastifyPluginCallback = (app, _opts, done) => {
  app.post("/api/session/init", async (_request, reply) => {
    const sessionId = randomUUID();
    await app.workflow.sessions.set(sessionId, { stage: 1 });
    return reply.code(201).send({ session_id: sessionId, stage: 1 });
  });

  app.get("/api/session/:sessionId", async (request, reply) => {
    const params = sessionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "INVALID_REQUEST", issues: params.error.issues });
    }

    const state = await app.workflow.sessions.get(params.data.sessionId);
    return reply.send({
      session_id: params.data.sessionId,
      stage: state.stage,
      artifacts: heldArtifacts(state)
    });
  });

  app.put("/api/session/:sessionId", async (request, reply) => {
    const params = sessionParamsSchema.safeParse(request.params);
    const state = sessionStateSchema.safeParse(request.body ?? {});
    if (!params.success || !state.success) {
      const issues = [...(params.error?.issues ?? []), ...(state.error?.issues ?? [])];
      return reply.code(400).send({ error: "INVALID_REQUEST", issues });
    }

    await app.workflow.sessions.set(params.data.sessionId, state.data);
    request.log.info({ sessionId: params.data.sessionId, stage: state.data.stage }, "Session state replaced");
    return reply.send({ ok: true });
  });

  done();
};

export default fp(sessionRoutes, { name: "session-routes", dependencies: ["workflow"] });
