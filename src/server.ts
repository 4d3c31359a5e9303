import fastify, { type FastifyInstance } from "fastify";
import { createDatabase, ensureSchema, type Database } from "./db/client";
import { env, type AppEnv } from "./env";
import { OpenAIAgentInvoker } from "./libs/openai";
import corsPlugin from "./plugins/cors";
import errorHandlerPlugin from "./plugins/error-handler";
import workflowPlugin from "./plugins/workflow";
import agentRoutes from "./routes/api/agent";
import sessionRoutes from "./routes/api/session";
import { HttpContentFetcher } from "./services/content-fetcher";
import { createOrchestrator, type Orchestrator } from "./services/orchestrator";
import { createDrizzleWorkflowStore } from "./services/workflow-store";

type CreateAppOptions = {
  workflow: Orchestrator;
  logLevel?: AppEnv["LOG_LEVEL"];
};

export function createApp({ workflow, logLevel = env.LOG_LEVEL }: CreateAppOptions): FastifyInstance {
  const app = fastify({
    logger: {
      level: logLevel
    }
  });

  app.register(corsPlugin);
  app.register(errorHandlerPlugin);
  app.register(workflowPlugin, { orchestrator: workflow });
  app.register(sessionRoutes);
  app.register(agentRoutes);

  app.get("/", async (_, reply) => {
    return reply.send({ message: "Hello World" });
  });

  return app;
}

export type BuiltServer = {
  app: FastifyInstance;
  database: Database;
};

export async function buildServer(config: AppEnv = env): Promise<BuiltServer> {
  const database = createDatabase({
    url: config.TURSO_DATABASE_URL,
    authToken: config.TURSO_AUTH_TOKEN
  });
  await ensureSchema(database.libsql);

  const fetcher = new HttpContentFetcher({ githubToken: config.GITHUB_TOKEN });
  const workflow = createOrchestrator({
    store: createDrizzleWorkflowStore(database.db, {
      defaultStage: config.DEFAULT_SESSION_STAGE,
      sessionsInMemory: config.SESSION_STORE === "memory"
    }),
    invoker: new OpenAIAgentInvoker(fetcher),
    fetcher,
    webSearch: config.OPENAI_WEB_SEARCH
  });

  const app = createApp({ workflow, logLevel: config.LOG_LEVEL });
  return { app, database };
}

export async function start() {
  const { app, database } = await buildServer();
  const port = env.PORT;
  const host = env.HOST ?? "0.0.0.0";

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info({ signal }, "Shutting down server...");
    try {
      await app.close();
      database.libsql.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await app.listen({ port, host });
    app.log.info(`Server ready on http://${host}:${port}`);
  } catch (error) {
    app.log.error({ err: error }, "Failed to start server");
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
