export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
  ) {
    super(detail);
    this.name = "HttpError";
  }
}

export class InvalidPdfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPdfError";
  }
}

export class InvalidPasswordError extends Error {
  constructor() {
    super("Invalid password");
    this.name = "InvalidPasswordError";
  }
}

export class PdfToolError extends Error {
  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    const reason = exitCode === null ? "timed out" : `exited with code ${exitCode}`;
    const detail = stderr.trim();
    super(detail === "" ? `${tool} ${reason}` : `${tool} ${reason}: ${detail}`);
    this.name = "PdfToolError";
  }
}

export class ToolUnavailableError extends Error {
  constructor(
    readonly tool: string,
    cause: Error,
  ) {
    super(`Failed to start ${tool}: ${cause.message}`);
    this.name = "ToolUnavailableError";
  }
}

export class QueueFullError extends Error {
  constructor(readonly queued: number) {
    super(`Job queue is full (${queued} waiting)`);
    this.name = "QueueFullError";
  }
}
