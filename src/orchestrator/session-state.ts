import { z } from "zod";

const artifact = z.string();

export const sessionStateSchema = z.discriminatedUnion("stage", [
  z.object({ stage: z.literal(1) }),
  z.object({ stage: z.literal(2), docReview: artifact.optional() }),
  z.object({ stage: z.literal(3), backendCode: artifact }),
  z.object({ stage: z.literal(4), backendCode: artifact, uiCode: artifact }),
  z.object({ stage: z.literal(5), backendCode: artifact, requestHandlerCode: artifact }),
  z.object({ stage: z.literal(6), backendCode: artifact }),
  z.object({ stage: z.literal(7), backendCode: artifact }),
  z.object({ stage: z.literal(8), backendCode: artifact, frontendCode: artifact }),
  z.object({ stage: z.literal(9) }),
  z.object({ stage: z.literal(10) })
]);

export type SessionState = z.infer<typeof sessionStateSchema>;
export type SessionStage = SessionState["stage"];

export const COMPLETE_STAGE = 10;
export type ActiveStage = Exclude<SessionStage, typeof COMPLETE_STAGE>;
export type StateAt<S extends SessionStage> = Extract<SessionState, { stage: S }>;

export type DefaultStage = 1 | 2;

export function initialSessionState(stage: DefaultStage): SessionState {
  return stage === 1 ? { stage: 1 } : { stage: 2 };
}

export function isAtStage<S extends SessionStage>(state: SessionState, stage: S): state is StateAt<S> {
  return state.stage === stage;
}

/** Names of the artifacts a session carries into its current stage. */
export function heldArtifacts(state: SessionState): string[] {
  return Object.keys(state).filter((key) => key !== "stage");
}
