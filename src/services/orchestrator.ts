import { getStageInstruction } from "../../lib/stage-instructions";
import { SessionCompleteError } from "../orchestrator/errors";
import { createWorkflowGraph } from "../orchestrator/graph";
import { COMPLETE_STAGE, heldArtifacts } from "../orchestrator/session-state";
import type { AgentInvoker, AgentRequest, StageLogger, StageResponse } from "../orchestrator/types";
import type { ContentFetcher } from "./content-fetcher";
import type { SessionStore } from "./session-store";
import type { WorkflowStore } from "./workflow-store";

export type OrchestratorDeps = {
  store: WorkflowStore;
  invoker: AgentInvoker;
  fetcher: ContentFetcher;
  webSearch?: boolean;
  now?: () => Date;
};

export type Orchestrator = {
  readonly sessions: SessionStore;
  runStage(request: AgentRequest, logger: StageLogger): Promise<StageResponse>;
};

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const graph = createWorkflowGraph({
    store: deps.store,
    invoker: deps.invoker,
    fetcher: deps.fetcher,
    webSearch: deps.webSearch ?? false,
    now: deps.now ?? (() => new Date())
  });

  return {
    sessions: deps.store.sessions,

    async runStage(request, logger) {
      const session = await deps.store.sessions.get(request.sessionId);
      if (session.stage === COMPLETE_STAGE) {
        throw new SessionCompleteError(request.sessionId);
      }

      logger.info(
        {
          sessionId: request.sessionId,
          stage: session.stage,
          title: getStageInstruction(session.stage).title,
          artifacts: heldArtifacts(session)
        },
        "Running workflow stage"
      );

      const result = await graph.invoke({
        sessionId: request.sessionId,
        request,
        session,
        logger
      });

      if (!result.outcome) {
        throw new Error(`Stage ${session.stage} produced no outcome for session ${request.sessionId}`);
      }
      return result.outcome.response;
    }
  };
}
