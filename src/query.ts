import { buildCliArgs } from "./cli/cli-args.js";
import { findClaudeCli } from "./cli/cli-path.js";
import { type ClaudeCodeOptionsInput, resolveClaudeCodeOptions } from "./config/options.js";
import { createSubsystemLogger } from "./logging/subsystem.js";
import { launchCli } from "./process/launch.js";
import { QueryStream } from "./stream/query-stream.js";

const log = createSubsystemLogger("query");

export const SDK_ENTRYPOINT = "sdk-ts";

export type QueryOptions = ClaudeCodeOptionsInput & {
  /** Called with every stderr chunk the CLI writes. */
  onStderr?: (chunk: string) => void;
  /** Aborting cancels the query and terminates the CLI process. */
  signal?: AbortSignal;
};

/**
 * Run one prompt through the Claude Code CLI and stream its messages.
 *
 * Resolves once the process is running. Invalid options, a missing CLI or a failed
 * spawn reject here; everything after that arrives as items of the returned stream.
 *
 * @example
 * const stream = await query("List the files in src", { maxTurns: 2 });
 * for await (const item of stream) {
 *   if (!item.ok) throw item.error;
 *   console.log(item.message.type);
 * }
 */
export async function query(prompt: string, options: QueryOptions = {}): Promise<QueryStream> {
  const { onStderr, signal, ...input } = options;
  const resolved = resolveClaudeCodeOptions(input);
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    ...resolved.env,
    CLAUDE_CODE_ENTRYPOINT: SDK_ENTRYPOINT,
  };
  const command = await findClaudeCli({ cliPath: resolved.cliPath, env });
  const { args, stdin } = buildCliArgs({ prompt, options: resolved });

  log.info(
    `cli exec: command=${command} model=${resolved.model ?? "default"} promptChars=${prompt.length} promptInput=${resolved.promptInput}`,
  );

  const stream = new QueryStream({ decodeErrors: resolved.decodeErrors, onStderr, signal });
  return stream.start(() =>
    launchCli({
      command,
      args,
      cwd: resolved.cwd,
      env,
      stdin,
      killGraceMs: resolved.killGraceMs,
    }),
  );
}
