import { getStageInstruction } from "../../lib/stage-instructions";
import type { DocumentFields } from "../db/schema";
import { PROJECT_FILES_COLLECTION } from "../services/document-store";
import { formatResponse } from "../utils/format-response";
import { escapeBraces } from "./context";
import { FrontendFileMissingError } from "./errors";
import { promptList, renderPrompt, type StagePrompt } from "./prompt";
import { COMPLETE_STAGE, type ActiveStage } from "./session-state";
import type {
  ArtifactWrite,
  CapabilitySequences,
  StageOutcome,
  StageResponse,
  StageWriter,
  StageWriterArgs
} from "./types";

export const DOC_REVIEW_FILE = "integrationStrategy.txt";
export const DEFAULT_BACKEND_FILE = "app.py";
export const INTEGRATION_TESTS_FILE = "integration_tests.py";
export const API_KEY_FILE = "apiKeySetup.txt";
export const MISSING_FRONTEND_CODE = "No code found in the document for the '.js' file.";

const DEVELOPER_ROLE = "You are an expert API integration developer";

export const stageWriters: { [S in ActiveStage]: StageWriter<S> } = {
  1: runDocReviewStage,
  2: runBackendProxyStage,
  3: runUiElementsStage,
  4: runRequestHandlerStage,
  5: runIntegrationTestsStage,
  6: runCodeReviewStage,
  7: runStylingStage,
  8: runDocumentationStage,
  9: runApiKeyStage
};

async function runDocReviewStage(args: StageWriterArgs<1>): Promise<StageOutcome> {
  const { docsLink } = args.context.prompt;
  const output = await generate(args, 1, {
    system: `${DEVELOPER_ROLE} and code specialist.`,
    user: [
      `1. Review the API provider docs here: ${docsLink}.`,
      "2. Return the payload / request body schema object required for the request. Only include the required body parameters and their data structure, and note on each field whether it is required.",
      "3. Also return the response data object and its data structure."
    ]
  });

  return {
    response: respond(1, output),
    writes: [projectFile(args, DOC_REVIEW_FILE, output)],
    next: { stage: 2, docReview: output }
  };
}

async function runBackendProxyStage(args: StageWriterArgs<2>): Promise<StageOutcome> {
  const caps = args.context.prompt.capabilities;
  const output = await generate(args, 2, {
    system: `${DEVELOPER_ROLE}. Your mission is to generate a backend route in Python.`,
    user: [
      "# Start your response with a comment and end your response with a comment.",
      "Create a backend route that acts as an API proxy.",
      "Do not use the provider docs, only use the data provided below for this request:",
      `Route name: ${promptList(caps.routeName)}.`,
      "Do not hardcode the payload.",
      `Headers: ${promptList(caps.headers)}.`,
      `Endpoint url: ${promptList(caps.endPoint)}.`,
      `Consider the error logging if required:\n${promptList(caps.errorBody)}.`,
      "Handle the response.",
      "Ensure you allow CORS from all origins.",
      "Use a Flask app that will host this backend locally on port 5000.",
      "Add print statements for errors and the response.",
      "Be concise, only respond with the code."
    ]
  });

  const fileName = args.request.suggestedFiles.find((name) => name.endsWith(".py")) ?? DEFAULT_BACKEND_FILE;
  return {
    response: respond(2, output),
    writes: [projectFile(args, fileName, output)],
    next: { stage: 3, backendCode: output }
  };
}

async function runUiElementsStage(args: StageWriterArgs<3>): Promise<StageOutcome> {
  const caps = args.context.prompt.capabilities;
  const output = await generate(args, 3, {
    system: `${DEVELOPER_ROLE}. Your mission is to generate the required frontend UI elements in React.`,
    user: [
      "// Start your response with a comment and end your response with a comment.",
      "Create frontend React UI elements such as form fields (buttons, text fields, etc.) and the display areas for the API responses.",
      "Do not use the provider docs, only use the data provided below for this request:",
      ...requestResponseGuidance(caps),
      "Keep all frontend code in a single component.",
      "No dummy data.",
      "Create the required state fields.",
      "Only return React code. Be concise."
    ]
  });

  const { suggestedFiles, suggestedFilePaths } = args.request;
  return {
    response: respond(3, output),
    writes: suggestedFiles.map((name, index) => projectFile(args, name, output, suggestedFilePaths[index])),
    next: { stage: 4, backendCode: args.state.backendCode, uiCode: output }
  };
}

async function runRequestHandlerStage(args: StageWriterArgs<4>): Promise<StageOutcome> {
  const caps = args.context.prompt.capabilities;
  const output = await generate(args, 4, {
    system: `${DEVELOPER_ROLE}. Your mission is to generate a frontend API request handler in React.`,
    user: [
      "// Start your response with a comment (using '//') and also end your response with a comment (using '//').",
      `Generate React code for the frontend API request handler that sends requests to and handles responses from the backend defined here: ${escapeBraces(args.state.backendCode)}.`,
      "Do not use the provider docs, only use the data provided below for this request:",
      `See the UI fields here and write the API request handler to handle them: ${escapeBraces(args.state.uiCode)}.`,
      ...requestResponseGuidance(caps),
      "Return the code updated with the frontend API request handler component.",
      "Do not hardcode the request fields, expect to receive them from the input fields.",
      "Keep all frontend code in a single component.",
      `Route name: ${promptList(caps.routeName)}.`,
      "Assume the backend is hosted on http://localhost:5000/.",
      "Only return React code. Use fetch instead of axios. Be concise."
    ]
  });

  // Overwrites the UI files written by stage 3; each must already exist.
  return {
    response: respond(4, output),
    writes: args.request.suggestedFiles.map((name) => codeUpdate(name, output)),
    next: { stage: 9 }
  };
}

async function runIntegrationTestsStage(args: StageWriterArgs<5>): Promise<StageOutcome> {
  const output = await generate(args, 5, {
    system: "You are an expert API integrator focusing on quality assurance.",
    user: [
      "Create integration tests for the API provider, written in the same language as the backend code below, covering the integration built in the previous steps.",
      "Consider the functionality proposed for integration and ensure the tests cover it effectively.",
      "Write the code for the integration tests and nothing else.",
      "",
      `Frontend request handler:\n${escapeBraces(args.state.requestHandlerCode)}`,
      "",
      `Backend endpoint:\n${escapeBraces(args.state.backendCode)}`,
      "",
      `Documentation link: ${args.context.prompt.docsLink}`
    ]
  });

  return {
    response: respond(5, output),
    writes: [projectFile(args, INTEGRATION_TESTS_FILE, output)],
    next: { stage: 8, backendCode: args.state.backendCode, frontendCode: args.state.requestHandlerCode }
  };
}

async function runCodeReviewStage(args: StageWriterArgs<6>): Promise<StageOutcome> {
  const frontend = await loadFrontendFile(args, 6);
  const caps = args.context.prompt.capabilities;
  const output = await generate(args, 6, {
    system: `${DEVELOPER_ROLE}. Your mission is to produce a working React file.`,
    user: [
      `Review the code at ${escapeBraces(frontend.code)}.`,
      "Do not remove any existing code.",
      "No dummy data.",
      `Add field validation and error logging where possible: ${promptList(caps.errorBody)}.`,
      "Do not change anything besides field validation.",
      "Ensure the code is ready for production use with all required React boilerplate and no hardcoding."
    ]
  });

  const unchanged = output === getStageInstruction(6).fallback;
  return {
    response: respond(6, output),
    writes: unchanged ? [] : [frontendWrite(args, frontend, output)],
    next: { stage: 7, backendCode: args.state.backendCode }
  };
}

async function runStylingStage(args: StageWriterArgs<7>): Promise<StageOutcome> {
  const frontend = await loadFrontendFile(args, 7);
  const output = await generate(args, 7, {
    system: `${DEVELOPER_ROLE}. Your mission is to style the frontend code.`,
    user: [
      `Review the new code at ${escapeBraces(frontend.code)}.`,
      `Review the existing page ${args.context.prompt.referencePage}.`,
      "Add inline styling to the new code to match the styling patterns of the existing page.",
      "Do not remove any code.",
      "No dummy data."
    ]
  });

  const unchanged = output === getStageInstruction(7).fallback;
  return {
    response: respond(7, output),
    writes: unchanged ? [] : [frontendWrite(args, frontend, output)],
    next: {
      stage: 8,
      backendCode: args.state.backendCode,
      frontendCode: unchanged ? frontend.code : output
    }
  };
}

async function runDocumentationStage(args: StageWriterArgs<8>): Promise<StageOutcome> {
  const output = await generate(args, 8, {
    system: "You are an API integration documentation expert.",
    user: [
      "Write documentation for the following integration.",
      `1. Backend endpoint: ${escapeBraces(args.state.backendCode)}.`,
      `2. Frontend component: ${escapeBraces(args.state.frontendCode)}.`,
      `3. API provider docs: ${args.context.prompt.docsLink}.`,
      `It should contain the following sections: quick start guide, testing options (note that the tests are written in ${INTEGRATION_TESTS_FILE}), troubleshooting guide, support contact info, links to the API provider docs.`
    ]
  });

  return {
    response: respond(8, output),
    writes: [projectFile(args, documentationFileName(args.context.capabilities.endPoint), output)],
    next: { stage: 9 }
  };
}

async function runApiKeyStage(args: StageWriterArgs<9>): Promise<StageOutcome> {
  const instructions = [
    `1. Search the API provider's docs at ${args.context.prompt.docsLink} and learn their process for getting and using the API key.`,
    "2. Provide the steps for me to get and add the API key in my project in a list format. I'm only concerned about the actual API key, nothing else."
  ];
  const output = await generate(args, 9, {
    system: [`${DEVELOPER_ROLE}.`, ...instructions].join("\n"),
    user: [...instructions, "Include full URLs for the steps if they are available."]
  });

  return {
    response: { ...respond(9, output), output: output.split("\n") },
    writes: [projectFile(args, API_KEY_FILE, output)],
    next: { stage: COMPLETE_STAGE }
  };
}

export function documentationFileName(endpoints: string[]) {
  const endpoint = endpoints[0];
  const fileName =
    endpoint === undefined ? "TechnicalDocumentation.txt" : `TechnicalDocumentation_${endpoint.replace(/\//g, "_")}.txt`;
  return fileName.replace(/[:?]/g, "_");
}

function requestResponseGuidance(caps: CapabilitySequences) {
  return [
    `See the required request payload object parameters to know which input fields are needed: ${promptList(caps.requestBody)}.`,
    `Follow this guidance on how to use the request fields: ${promptList(caps.requestGuidance)}.`,
    `Structure the response according to the response data object: ${promptList(caps.responseBody)}.`,
    `Follow this advice to structure the response properly: ${promptList(caps.responseGuidance)}.`
  ];
}

type AgentArgs = Pick<StageWriterArgs<ActiveStage>, "request" | "context" | "invoker">;

async function generate(args: AgentArgs, stage: ActiveStage, prompt: StagePrompt) {
  const { input } = args.context.prompt;
  const user = input.trim() ? [...prompt.user, `Additional instructions from the user: ${input}`] : prompt.user;
  const rendered = await renderPrompt({ system: prompt.system, user });

  const reply = await args.invoker.invoke({
    systemPrompt: rendered.system,
    userPrompt: rendered.user,
    chatHistory: args.request.chatHistory,
    tools: args.context.tools
  });

  const text = reply.output ?? "";
  return formatResponse(text.trim() ? text : getStageInstruction(stage).fallback);
}

type FrontendFile = {
  name: string;
  code: string;
  exists: boolean;
};

async function loadFrontendFile(args: StageWriterArgs<6> | StageWriterArgs<7>, stage: 6 | 7): Promise<FrontendFile> {
  const name = args.context.frontendFile;
  if (!name) {
    throw new FrontendFileMissingError(stage);
  }

  const existing = await args.documents.get(PROJECT_FILES_COLLECTION, name);
  if (!existing) {
    args.logger.warn({ file: name }, "Frontend file not stored yet");
    return { name, code: MISSING_FRONTEND_CODE, exists: false };
  }
  return { name, code: typeof existing.code === "string" ? existing.code : "", exists: true };
}

function frontendWrite(args: StageWriterArgs<6> | StageWriterArgs<7>, frontend: FrontendFile, code: string): ArtifactWrite {
  return frontend.exists ? codeUpdate(frontend.name, code) : projectFile(args, frontend.name, code);
}

function respond(stage: ActiveStage, output: string): StageResponse {
  return { stage, message: getStageInstruction(stage).message, output };
}

function projectFile(
  args: Pick<StageWriterArgs<ActiveStage>, "request" | "now">,
  name: string,
  code: string,
  repoPath?: string
): ArtifactWrite {
  const fields: DocumentFields = {
    name,
    code,
    project: args.request.projectId,
    createdAt: args.now().toISOString()
  };
  if (repoPath !== undefined) {
    fields.repoPath = repoPath;
  }
  return { mode: "set", collection: PROJECT_FILES_COLLECTION, key: name, fields };
}

function codeUpdate(name: string, code: string): ArtifactWrite {
  return { mode: "update", collection: PROJECT_FILES_COLLECTION, key: name, fields: { code } };
}
