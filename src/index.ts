export { query, SDK_ENTRYPOINT } from "./query.js";
export type { QueryOptions } from "./query.js";

export { QueryStream } from "./stream/query-stream.js";
export type { QueryItem, QueryStreamOptions, QueryStreamState } from "./stream/query-stream.js";
export { LineDecoder, decodeLines } from "./stream/line-decoder.js";
export {
  formatMessageLine,
  parseContentBlock,
  parseMessage,
  parseMessageLine,
} from "./stream/message-parser.js";
export type { ParseResult } from "./stream/message-parser.js";

export {
  ClaudeCodeOptionsSchema,
  DEFAULT_KILL_GRACE_MS,
  PERMISSION_MODES,
  resolveClaudeCodeOptions,
} from "./config/options.js";
export type {
  ClaudeCodeOptions,
  ClaudeCodeOptionsInput,
  DecodeErrorPolicy,
  PermissionMode,
} from "./config/options.js";

export { BASE_CLI_ARGS, buildCliArgs } from "./cli/cli-args.js";
export { findClaudeCli } from "./cli/cli-path.js";
export { launchCli } from "./process/launch.js";
export type { CliExitStatus, CliProcessHandle, LaunchCliParams } from "./process/launch.js";

export {
  CLIConnectionError,
  CLIJSONDecodeError,
  CLINotFoundError,
  ClaudeSDKError,
  InvalidOptionsError,
  IoError,
  ProcessError,
  describeError,
  isClaudeSDKError,
} from "./errors.js";
export type { ClaudeSDKErrorCode } from "./errors.js";

export { createSubsystemLogger, setRootLogger } from "./logging/subsystem.js";
export type { SubsystemLogger } from "./logging/subsystem.js";

export { MESSAGE_TYPES } from "./types.js";
export type {
  AssistantMessage,
  ContentBlock,
  JsonObject,
  JsonValue,
  Message,
  MessageType,
  ResultMessage,
  ResultUsage,
  SystemMessage,
  TextBlock,
  ToolResultBlock,
  ToolUseBlock,
  UnknownBlock,
  UserMessage,
} from "./types.js";
