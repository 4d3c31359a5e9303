import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";
import type { Orchestrator } from "../services/orchestrator";

declare module "fastify" {
  interface FastifyInstance {
    workflow: Orchestrator;
  }
}

export type WorkflowPluginOptions = {
  orchestrator: Orchestrator;
};

const workflowPlugin: FastifyPluginCallback<WorkflowPluginOptions> = (app, opts, done) => {
  app.decorate("workflow", opts.orchestrator);
  done();
};

export default fp(workflowPlugin, { name: "workflow" });
