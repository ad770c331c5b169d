import { z } from "zod";
import { InvalidOptionsError } from "../errors.js";

export const PERMISSION_MODES = ["default", "acceptEdits", "bypassPermissions"] as const;

export type PermissionMode = (typeof PERMISSION_MODES)[number];

export const DEFAULT_KILL_GRACE_MS = 2_000;

const ToolNameSchema = z.string().trim().min(1);

export const ClaudeCodeOptionsSchema = z.object({
  /** Working directory for the CLI process. */
  cwd: z.string().min(1).optional(),
  /** Tools the CLI may use without asking, in order. */
  allowedTools: z.array(ToolNameSchema).default([]),
  disallowedTools: z.array(ToolNameSchema).default([]),
  permissionMode: z.enum(PERMISSION_MODES).default("default"),
  systemPrompt: z.string().optional(),
  appendSystemPrompt: z.string().optional(),
  /** Turn cap; unset means no cap. */
  maxTurns: z.number().int().positive().optional(),
  model: z.string().trim().min(1).optional(),
  /** Extra environment variables layered over the parent environment. */
  env: z.record(z.string()).default({}),
  /** Explicit CLI executable; searched on PATH when unset. */
  cliPath: z.string().min(1).optional(),
  /** Pass the prompt as the last argument or write it to stdin. */
  promptInput: z.enum(["arg", "stdin"]).default("arg"),
  /** Arguments appended verbatim before the prompt. */
  extraArgs: z.array(z.string()).default([]),
  /** What to do with a stdout line that does not decode into a message. */
  decodeErrors: z.enum(["yield", "skip", "abort"]).default("yield"),
  /** Delay between SIGTERM and SIGKILL when a query is torn down. */
  killGraceMs: z.number().int().nonnegative().default(DEFAULT_KILL_GRACE_MS),
});

export type ClaudeCodeOptionsInput = z.input<typeof ClaudeCodeOptionsSchema>;

type ParsedOptions = z.output<typeof ClaudeCodeOptionsSchema>;

export type ClaudeCodeOptions = Readonly<
  Omit<ParsedOptions, "allowedTools" | "disallowedTools" | "env" | "extraArgs">
> & {
  readonly allowedTools: readonly string[];
  readonly disallowedTools: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly extraArgs: readonly string[];
};

export type DecodeErrorPolicy = ClaudeCodeOptions["decodeErrors"];

/**
 * Validate caller options and capture them as a frozen snapshot.
 * Unknown keys are ignored; absent keys take their defaults.
 */
export function resolveClaudeCodeOptions(input: ClaudeCodeOptionsInput = {}): ClaudeCodeOptions {
  const parsed = ClaudeCodeOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  const options = parsed.data;
  return Object.freeze({
    ...options,
    allowedTools: Object.freeze([...options.allowedTools]),
    disallowedTools: Object.freeze([...options.disallowedTools]),
    env: Object.freeze({ ...options.env }),
    extraArgs: Object.freeze([...options.extraArgs]),
  });
}
