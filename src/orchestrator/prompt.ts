import { PromptTemplate } from "@langchain/core/prompts";

/**
 * System and user instructions for one stage. Values embedded in the text must
 * already have their braces doubled; rendering collapses them back to single
 * literals exactly once.
 */
export type StagePrompt = {
  system: string;
  user: string[];
};

export type RenderedPrompt = {
  system: string;
  user: string;
};

export async function renderTemplate(template: string): Promise<string> {
  return PromptTemplate.fromTemplate(template).format({});
}

export async function renderPrompt(prompt: StagePrompt): Promise<RenderedPrompt> {
  const [system, user] = await Promise.all([
    renderTemplate(prompt.system),
    renderTemplate(prompt.user.join("\n"))
  ]);
  return { system, user };
}

/** Joins a capability sequence for a prompt; `none` stands in for an empty one. */
export function promptList(values: string[], none = "None provided") {
  return values.length > 0 ? values.join("\n") : none;
}
