import type { ActiveStage } from "../src/orchestrator/session-state";

export type StageInstruction = {
  title: string;
  /** Sent back to the caller once the stage has run. */
  message: string;
  /** Used as the stage output when the agent returns nothing usable. */
  fallback: string;
};

export const STAGE_INSTRUCTIONS: Record<ActiveStage, StageInstruction> = {
  1: {
    title: "Documentation review",
    message: "Doc review generated",
    fallback: "No doc review action performed."
  },
  2: {
    title: "Backend endpoints",
    message: "Backend endpoints generated",
    fallback: "No backend endpoint action performed."
  },
  3: {
    title: "UI elements",
    message: "UI components created or updated",
    fallback: "No UI update action performed."
  },
  4: {
    title: "API request handler",
    message: "Refactoring performed on suggested files",
    fallback: "No action performed."
  },
  5: {
    title: "Integration tests",
    message: "Integration tests created",
    fallback: "No integration tests action performed."
  },
  6: {
    title: "Code review",
    message: "Code review completed",
    fallback: "No impact analysis action performed."
  },
  7: {
    title: "Branding and styling",
    message: "Styling applied",
    fallback: "No styling action performed."
  },
  8: {
    title: "Documentation",
    message: "Documentation sent",
    fallback: "No documentation action performed."
  },
  9: {
    title: "API key section",
    message: "API Key info sent",
    fallback: "No API key action performed."
  }
};

export function getStageInstruction(stage: ActiveStage): StageInstruction {
  return STAGE_INSTRUCTIONS[stage];
}
