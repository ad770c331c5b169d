export type ClaudeSDKErrorCode =
  | "cli_not_found"
  | "cli_connection"
  | "process"
  | "cli_json_decode"
  | "io"
  | "invalid_options";

export const CLI_INSTALL_HINT = "Install it with: npm install -g @anthropic-ai/claude-code";

const MAX_LINE_PREVIEW = 200;

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Cuts after `max` code points, so a surrogate pair is never split. */
export function truncateLine(line: string, max = MAX_LINE_PREVIEW): string {
  if (line.length <= max) {
    return line;
  }
  const chars = Array.from(line);
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : line;
}

export class ClaudeSDKError extends Error {
  readonly code: ClaudeSDKErrorCode;

  constructor(message: string, params: { code: ClaudeSDKErrorCode; cause?: unknown }) {
    super(message, { cause: params.cause });
    this.name = "ClaudeSDKError";
    this.code = params.code;
  }
}

export class CLINotFoundError extends ClaudeSDKError {
  readonly cliPath?: string;

  constructor(params: { cliPath?: string; cause?: unknown } = {}) {
    const where = params.cliPath ? ` at ${params.cliPath}` : "";
    super(`Claude Code CLI not found${where}. ${CLI_INSTALL_HINT}`, {
      code: "cli_not_found",
      cause: params.cause,
    });
    this.name = "CLINotFoundError";
    this.cliPath = params.cliPath;
  }
}

export class CLIConnectionError extends ClaudeSDKError {
  constructor(message: string, params: { cause?: unknown } = {}) {
    super(`CLI connection error: ${message}`, { code: "cli_connection", cause: params.cause });
    this.name = "CLIConnectionError";
  }
}

export class ProcessError extends ClaudeSDKError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(params: { exitCode: number | null; signal?: NodeJS.Signals | null; stderr: string }) {
    const status =
      params.exitCode !== null
        ? `exit code ${params.exitCode}`
        : `signal ${params.signal ?? "unknown"}`;
    const detail = params.stderr.trim();
    super(`Process failed with ${status}${detail ? `: ${detail}` : ""}`, { code: "process" });
    this.name = "ProcessError";
    this.exitCode = params.exitCode;
    this.signal = params.signal ?? null;
    this.stderr = params.stderr;
  }
}

/**
 * One stdout line that could not be decoded into a known message shape.
 * `line` holds the offending input, truncated for very long lines.
 */
export class CLIJSONDecodeError extends ClaudeSDKError {
  readonly line: string;

  constructor(message: string, params: { line: string; cause?: unknown }) {
    super(`Failed to decode JSON response: ${message}`, {
      code: "cli_json_decode",
      cause: params.cause,
    });
    this.name = "CLIJSONDecodeError";
    this.line = truncateLine(params.line);
  }
}

export class IoError extends ClaudeSDKError {
  constructor(message: string, params: { cause?: unknown } = {}) {
    super(`I/O error: ${message}`, { code: "io", cause: params.cause });
    this.name = "IoError";
  }
}

export class InvalidOptionsError extends ClaudeSDKError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`, { code: "invalid_options" });
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}

export function isClaudeSDKError(err: unknown): err is ClaudeSDKError {
  return err instanceof ClaudeSDKError;
}
