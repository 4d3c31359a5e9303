import { Annotation, StateGraph, START, END } from "@langchain/langgraph";

import type { ContentFetcher } from "../services/content-fetcher";
import type { WorkflowStore } from "../services/workflow-store";
import { buildStageContext } from "./context";
import { COMPLETE_STAGE, isAtStage, type ActiveStage, type SessionState } from "./session-state";
import type {
  AgentInvoker,
  AgentRequest,
  StageContext,
  StageLogger,
  StageOutcome,
  StageWriter
} from "./types";
import { stageWriters } from "./writers";

const WorkflowState = Annotation.Root({
  sessionId: Annotation<string>(),
  request: Annotation<AgentRequest>(),
  session: Annotation<SessionState>(),
  logger: Annotation<StageLogger>(),
  context: Annotation<StageContext | undefined>(),
  outcome: Annotation<StageOutcome | undefined>()
});

export type WorkflowGraphState = typeof WorkflowState.State;

export const STAGE_NODES = {
  1: "doc_review",
  2: "backend_proxy",
  3: "ui_elements",
  4: "request_handler",
  5: "integration_tests",
  6: "code_review",
  7: "styling",
  8: "documentation",
  9: "api_key_steps"
} as const satisfies Record<ActiveStage, string>;

export type WorkflowGraphDeps = {
  store: WorkflowStore;
  invoker: AgentInvoker;
  fetcher: ContentFetcher;
  webSearch: boolean;
  now: () => Date;
};

function requireContext(state: WorkflowGraphState): StageContext {
  if (!state.context) {
    throw new Error(`Stage context missing for session ${state.sessionId}`);
  }
  return state.context;
}

export function routeStage(state: WorkflowGraphState) {
  return state.session.stage === COMPLETE_STAGE ? END : STAGE_NODES[state.session.stage];
}

export function createWorkflowGraph(deps: WorkflowGraphDeps) {
  const gatherContext = async (state: WorkflowGraphState) => {
    const context = await buildStageContext(
      { documents: deps.store.documents, fetcher: deps.fetcher, webSearch: deps.webSearch },
      state.request,
      state.logger
    );
    return { context };
  };

  const stageNode =
    <S extends ActiveStage>(stage: S, writer: StageWriter<S>) =>
    async (state: WorkflowGraphState) => {
      const { session } = state;
      if (!isAtStage(session, stage)) {
        throw new Error(`Session ${state.sessionId} is at stage ${session.stage}, not ${stage}`);
      }
      const outcome = await writer({
        state: session,
        request: state.request,
        context: requireContext(state),
        invoker: deps.invoker,
        documents: deps.store.documents,
        logger: state.logger,
        now: deps.now
      });
      return { outcome };
    };

  const commit = async (state: WorkflowGraphState) => {
    const { outcome } = state;
    if (!outcome) {
      throw new Error(`No stage outcome to commit for session ${state.sessionId}`);
    }
    await deps.store.commitStage(state.sessionId, outcome.writes, outcome.next);
    state.logger.info(
      {
        sessionId: state.sessionId,
        files: outcome.writes.map((write) => write.key),
        nextStage: outcome.next.stage
      },
      "Stage artifacts persisted"
    );
    return {};
  };

  const graph = new StateGraph(WorkflowState)
    .addNode("gather_context", gatherContext)
    .addNode(STAGE_NODES[1], stageNode(1, stageWriters[1]))
    .addNode(STAGE_NODES[2], stageNode(2, stageWriters[2]))
    .addNode(STAGE_NODES[3], stageNode(3, stageWriters[3]))
    .addNode(STAGE_NODES[4], stageNode(4, stageWriters[4]))
    .addNode(STAGE_NODES[5], stageNode(5, stageWriters[5]))
    .addNode(STAGE_NODES[6], stageNode(6, stageWriters[6]))
    .addNode(STAGE_NODES[7], stageNode(7, stageWriters[7]))
    .addNode(STAGE_NODES[8], stageNode(8, stageWriters[8]))
    .addNode(STAGE_NODES[9], stageNode(9, stageWriters[9]))
    .addNode("commit", commit);

  const stageNodes = Object.values(STAGE_NODES);

  graph.addEdge(START, "gather_context");
  graph.addConditionalEdges("gather_context", routeStage, [...stageNodes, END]);
  for (const node of stageNodes) {
    graph.addEdge(node, "commit");
  }
  graph.addEdge("commit", END);

  return graph.compile({ name: "integration-workflow" });
}
