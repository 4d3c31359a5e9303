import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, PUT, OPTIONS",
  "Access-Control-Allow-Headers": "*",
  "X-Content-Type-Options": "nosniff"
};

const corsPlugin: FastifyPluginCallback = (app, _opts, done) => {
  app.addHook("onRequest", (_request, reply, hookDone) => {
    for (const [header, value] of Object.entries(CORS_HEADERS)) {
      reply.header(header, value);
    }
    hookDone();
  });

  // Preflight for every route.
  app.options("*", async (_request, reply) => {
    return reply.code(204).send();
  });

  done();
};

export default fp(corsPlugin, { name: "cors" });
