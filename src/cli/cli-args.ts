import type { ClaudeCodeOptions } from "../config/options.js";

export const BASE_CLI_ARGS = [
  "--print",
  "--output-format",
  "stream-json",
  "--verbose", // Required when using --print with stream-json
] as const;

export function resolvePromptInput(params: { prompt: string; options: ClaudeCodeOptions }): {
  argsPrompt?: string;
  stdin?: string;
} {
  return params.options.promptInput === "stdin"
    ? { stdin: params.prompt }
    : { argsPrompt: params.prompt };
}

export function buildCliArgs(params: { prompt: string; options: ClaudeCodeOptions }): {
  args: string[];
  stdin?: string;
} {
  const { options } = params;
  const args: string[] = [...BASE_CLI_ARGS];

  if (options.model) {
    args.push("--model", options.model);
  }
  if (options.systemPrompt !== undefined) {
    args.push("--system-prompt", options.systemPrompt);
  }
  if (options.appendSystemPrompt !== undefined) {
    args.push("--append-system-prompt", options.appendSystemPrompt);
  }
  if (options.maxTurns !== undefined) {
    args.push("--max-turns", String(options.maxTurns));
  }
  // "default" is the CLI's own behavior: prompt before dangerous tools.
  if (options.permissionMode !== "default") {
    args.push("--permission-mode", options.permissionMode);
  }
  if (options.allowedTools.length > 0) {
    args.push("--allowedTools", options.allowedTools.join(","));
  }
  if (options.disallowedTools.length > 0) {
    args.push("--disallowedTools", options.disallowedTools.join(","));
  }
  args.push(...options.extraArgs);

  const { argsPrompt, stdin } = resolvePromptInput(params);
  if (argsPrompt !== undefined) {
    // Keeps a prompt such as "--help me" from being read as a flag.
    if (argsPrompt.startsWith("-")) {
      args.push("--");
    }
    args.push(argsPrompt);
  }
  return stdin !== undefined ? { args, stdin } : { args };
}
