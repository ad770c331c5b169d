/**
 * Messages read from `claude --output-format stream-json`.
 * Field names mirror the wire format so a message can be written back unchanged.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Content blocks
// ============================================================================

export type TextBlock = {
  type: "text";
  text: string;
};

export type ToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  input: JsonValue;
};

export type ToolResultBlock = {
  type: "tool_result";
  /** Id of the `tool_use` block this result answers, kept verbatim. */
  tool_use_id: string;
  content?: JsonValue;
  is_error?: boolean;
};

/** A block kind this package does not model; the raw object is kept in `data`. */
export type UnknownBlock = {
  type: "unknown";
  block_type: string;
  data: JsonObject;
};

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | UnknownBlock;

// ============================================================================
// Messages
// ============================================================================

export type UserMessage = {
  type: "user";
  content: ContentBlock[];
  session_id?: string;
  parent_tool_use_id?: string;
};

export type AssistantMessage = {
  type: "assistant";
  content: ContentBlock[];
  model?: string;
  session_id?: string;
  parent_tool_use_id?: string;
};

export type SystemMessage = {
  type: "system";
  subtype?: string;
  data: JsonObject;
};

export type ResultUsage = {
  input_tokens?: number;
  output_tokens?: number;
  reasoning_tokens?: number;
  cache_read_input_tokens?: number;
  cache_creation_input_tokens?: number;
};

export type ResultMessage = {
  type: "result";
  subtype?: string;
  id?: string;
  session_id?: string;
  exit_code?: number;
  is_error?: boolean;
  error?: string;
  result?: string;
  cost_usd?: number;
  duration_ms?: number;
  num_turns?: number;
  canceled?: boolean;
  usage?: ResultUsage;
};

export type Message = UserMessage | AssistantMessage | SystemMessage | ResultMessage;

export type MessageType = Message["type"];

export const MESSAGE_TYPES: readonly MessageType[] = ["user", "assistant", "system", "result"];
