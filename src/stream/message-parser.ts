import { z } from "zod";
import { CLIJSONDecodeError, describeError } from "../errors.js";
import type {
  ContentBlock,
  JsonValue,
  Message,
  ResultMessage,
  ResultUsage,
  SystemMessage,
} from "../types.js";

export type ParseResult =
  | { ok: true; message: Message }
  | { ok: false; error: CLIJSONDecodeError };

type Decoded<T> = { ok: true; value: T } | { ok: false; reason: string };

type IssuePath = Array<string | number>;

// ============================================================================
// Schemas
// ============================================================================

const JsonLiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonLiteralSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

const JsonObjectSchema = z.record(JsonValueSchema);

const DiscriminatedSchema = z.object({ type: z.string() });

const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: JsonValueSchema.optional(),
});

const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string(),
  content: JsonValueSchema.optional(),
  is_error: z.boolean().nullish(),
});

const RawContentSchema = z.union([z.string(), z.array(z.unknown())]);

/**
 * `user` and `assistant` lines. Content sits at the top level, or inside
 * `message.content` for CLI releases that forward the raw API message.
 */
const ConversationMessageSchema = z.object({
  type: z.enum(["user", "assistant"]),
  content: RawContentSchema.optional(),
  message: z
    .object({
      content: RawContentSchema.optional(),
      model: z.string().nullish(),
    })
    .optional(),
  model: z.string().nullish(),
  session_id: z.string().nullish(),
  parent_tool_use_id: z.string().nullish(),
});

const UsageSchema = z.object({
  input_tokens: z.number().nullish(),
  output_tokens: z.number().nullish(),
  reasoning_tokens: z.number().nullish(),
  cache_read_input_tokens: z.number().nullish(),
  cache_creation_input_tokens: z.number().nullish(),
});

const ResultMessageSchema = z.object({
  type: z.literal("result"),
  subtype: z.string().nullish(),
  id: z.string().nullish(),
  session_id: z.string().nullish(),
  exit_code: z.number().int().nullish(),
  is_error: z.boolean().nullish(),
  error: z.string().nullish(),
  result: z.string().nullish(),
  content: z.string().nullish(),
  cost_usd: z.number().nullish(),
  total_cost_usd: z.number().nullish(),
  duration_ms: z.number().nullish(),
  num_turns: z.number().int().nullish(),
  canceled: z.boolean().nullish(),
  usage: UsageSchema.nullish(),
  tokens_input: z.number().nullish(),
  tokens_output: z.number().nullish(),
  reasoning_tokens: z.number().nullish(),
});

type ResultMessageData = z.infer<typeof ResultMessageSchema>;

// ============================================================================
// Decoding
// ============================================================================

function formatIssue(error: z.ZodError, prefix: IssuePath = []): string {
  const issue = error.issues[0];
  const path = [...prefix, ...(issue?.path ?? [])];
  const where = path.length > 0 ? path.join(".") : "(root)";
  return `${where}: ${issue?.message ?? "invalid value"}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseContentBlock(value: unknown, path: IssuePath = []): Decoded<ContentBlock> {
  const envelope = DiscriminatedSchema.safeParse(value);
  if (!envelope.success) {
    return { ok: false, reason: formatIssue(envelope.error, path) };
  }

  switch (envelope.data.type) {
    case "text": {
      const parsed = TextBlockSchema.safeParse(value);
      if (!parsed.success) {
        return { ok: false, reason: formatIssue(parsed.error, path) };
      }
      return { ok: true, value: { type: "text", text: parsed.data.text } };
    }

    case "tool_use": {
      const parsed = ToolUseBlockSchema.safeParse(value);
      if (!parsed.success) {
        return { ok: false, reason: formatIssue(parsed.error, path) };
      }
      const { id, name, input } = parsed.data;
      return {
        ok: true,
        value: { type: "tool_use", id, name, input: input === undefined ? {} : input },
      };
    }

    case "tool_result": {
      const parsed = ToolResultBlockSchema.safeParse(value);
      if (!parsed.success) {
        return { ok: false, reason: formatIssue(parsed.error, path) };
      }
      const { tool_use_id, content, is_error } = parsed.data;
      return {
        ok: true,
        value: {
          type: "tool_result",
          tool_use_id,
          ...(content !== undefined && { content }),
          ...(is_error != null && { is_error }),
        },
      };
    }

    default: {
      // Newer CLI releases add block kinds; keep them instead of failing the message.
      const raw = JsonObjectSchema.safeParse(value);
      if (!raw.success) {
        return { ok: false, reason: formatIssue(raw.error, path) };
      }
      return {
        ok: true,
        value: { type: "unknown", block_type: envelope.data.type, data: raw.data },
      };
    }
  }
}

function parseContent(raw: string | unknown[], path: IssuePath): Decoded<ContentBlock[]> {
  if (typeof raw === "string") {
    return { ok: true, value: [{ type: "text", text: raw }] };
  }
  const blocks: ContentBlock[] = [];
  for (const [index, entry] of raw.entries()) {
    const block = parseContentBlock(entry, [...path, index]);
    if (!block.ok) {
      return block;
    }
    blocks.push(block.value);
  }
  return { ok: true, value: blocks };
}

function parseConversationMessage(value: unknown): Decoded<Message> {
  const parsed = ConversationMessageSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: formatIssue(parsed.error) };
  }
  const data = parsed.data;

  let content: Decoded<ContentBlock[]>;
  if (data.content !== undefined) {
    content = parseContent(data.content, ["content"]);
  } else if (data.message?.content !== undefined) {
    content = parseContent(data.message.content, ["message", "content"]);
  } else {
    return { ok: false, reason: "content: Required" };
  }
  if (!content.ok) {
    return content;
  }

  const shared = {
    content: content.value,
    ...(data.session_id != null && { session_id: data.session_id }),
    ...(data.parent_tool_use_id != null && { parent_tool_use_id: data.parent_tool_use_id }),
  };

  if (data.type === "user") {
    return { ok: true, value: { type: "user", ...shared } };
  }
  const model = data.model ?? data.message?.model;
  return {
    ok: true,
    value: { type: "assistant", ...shared, ...(model != null && { model }) },
  };
}

function parseSystemMessage(value: unknown): Decoded<SystemMessage> {
  const parsed = JsonObjectSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: formatIssue(parsed.error) };
  }
  const { type: _type, ...data } = parsed.data;
  const subtype = data.subtype;
  return {
    ok: true,
    value: { type: "system", ...(typeof subtype === "string" && { subtype }), data },
  };
}

function buildUsage(data: ResultMessageData): ResultUsage | undefined {
  const input = data.usage?.input_tokens ?? data.tokens_input;
  const output = data.usage?.output_tokens ?? data.tokens_output;
  const reasoning = data.usage?.reasoning_tokens ?? data.reasoning_tokens;
  const cacheRead = data.usage?.cache_read_input_tokens;
  const cacheWrite = data.usage?.cache_creation_input_tokens;
  const usage: ResultUsage = {
    ...(input != null && { input_tokens: input }),
    ...(output != null && { output_tokens: output }),
    ...(reasoning != null && { reasoning_tokens: reasoning }),
    ...(cacheRead != null && { cache_read_input_tokens: cacheRead }),
    ...(cacheWrite != null && { cache_creation_input_tokens: cacheWrite }),
  };
  return Object.keys(usage).length > 0 ? usage : undefined;
}

function parseResultMessage(value: unknown): Decoded<ResultMessage> {
  const parsed = ResultMessageSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: formatIssue(parsed.error) };
  }
  const data = parsed.data;
  const cost = data.cost_usd ?? data.total_cost_usd;
  const text = data.result ?? data.content;
  const usage = buildUsage(data);
  return {
    ok: true,
    value: {
      type: "result",
      ...(data.subtype != null && { subtype: data.subtype }),
      ...(data.id != null && { id: data.id }),
      ...(data.session_id != null && { session_id: data.session_id }),
      ...(data.exit_code != null && { exit_code: data.exit_code }),
      ...(data.is_error != null && { is_error: data.is_error }),
      ...(data.error != null && { error: data.error }),
      ...(text != null && { result: text }),
      ...(cost != null && { cost_usd: cost }),
      ...(data.duration_ms != null && { duration_ms: data.duration_ms }),
      ...(data.num_turns != null && { num_turns: data.num_turns }),
      ...(data.canceled != null && { canceled: data.canceled }),
      ...(usage && { usage }),
    },
  };
}

/**
 * Reconstruct a typed message from an already decoded JSON value.
 * `line` is the source text, attached to the error on failure.
 */
export function parseMessage(value: unknown, line: string): ParseResult {
  const fail = (message: string): ParseResult => ({
    ok: false,
    error: new CLIJSONDecodeError(message, { line }),
  });

  if (!isRecord(value)) {
    return fail("expected a JSON object");
  }
  const type = value.type;
  if (typeof type !== "string") {
    return fail("missing message type");
  }

  let decoded: Decoded<Message>;
  switch (type) {
    case "user":
    case "assistant":
      decoded = parseConversationMessage(value);
      break;
    case "system":
      decoded = parseSystemMessage(value);
      break;
    case "result":
      decoded = parseResultMessage(value);
      break;
    default:
      return fail(`unknown message type: ${type}`);
  }

  if (!decoded.ok) {
    return fail(`invalid ${type} message: ${decoded.reason}`);
  }
  return { ok: true, message: decoded.value };
}

export function parseMessageLine(line: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    return {
      ok: false,
      error: new CLIJSONDecodeError(`Failed to parse JSON: ${describeError(err)}`, {
        line,
        cause: err,
      }),
    };
  }
  return parseMessage(value, line);
}

// ============================================================================
// Encoding
// ============================================================================

function encodeContentBlock(block: ContentBlock) {
  return block.type === "unknown" ? block.data : block;
}

/** Encode a message as the single JSON line the CLI would write for it. */
export function formatMessageLine(message: Message): string {
  switch (message.type) {
    case "system":
      return JSON.stringify({ type: "system", ...message.data });
    case "user":
    case "assistant":
      return JSON.stringify({ ...message, content: message.content.map(encodeContentBlock) });
    case "result":
      return JSON.stringify(message);
  }
}
