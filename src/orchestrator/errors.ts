export class StageError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = "StageError";
  }
}

export class SessionCompleteError extends StageError {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} has completed every stage`, 409, "SESSION_COMPLETE");
    this.name = "SessionCompleteError";
  }
}

export class FrontendFileMissingError extends StageError {
  constructor(public readonly stage: number) {
    super(`Stage ${stage} needs a suggested file ending in .js`, 422, "FRONTEND_FILE_MISSING");
    this.name = "FrontendFileMissingError";
  }
}
