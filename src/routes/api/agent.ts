import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import { agentRequestSchema, toAgentRequest } from "../../validators/agent-request";

const agentRoutes: FastifyPluginCallback = (app, _opts, done) => {
  app.post("/agent/invoke", async (request, reply) => {
    const parsed = agentRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_REQUEST", issues: parsed.error.issues });
    }

    const response = await app.workflow.runStage(toAgentRequest(parsed.data), request.log);
    return reply.send(response);
  });

  done();
};

export default fp(agentRoutes, { name: "agent-routes", dependencies: ["workflow"] });
