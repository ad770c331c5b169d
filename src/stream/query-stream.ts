import type { DecodeErrorPolicy } from "../config/options.js";
import { type ClaudeSDKError, IoError, ProcessError, describeError } from "../errors.js";
import { isTruthyEnvValue } from "../infra/env.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { CliProcessHandle } from "../process/launch.js";
import type { Message, ResultMessage } from "../types.js";
import { decodeLines } from "./line-decoder.js";
import { parseMessageLine } from "./message-parser.js";

const log = createSubsystemLogger("stream/query");

export type QueryStreamState = "starting" | "streaming" | "draining" | "closed" | "failed";

export type QueryItem = { ok: true; message: Message } | { ok: false; error: ClaudeSDKError };

export type QueryStreamOptions = {
  decodeErrors?: DecodeErrorPolicy;
  /** Called with every stderr chunk as it arrives. */
  onStderr?: (chunk: string) => void;
  /** Aborting cancels the query and terminates the process. */
  signal?: AbortSignal;
};

/**
 * The messages of one CLI invocation, pulled lazily from the process stdout.
 *
 * Mid-stream failures arrive as `{ ok: false }` items; the process is terminated and its
 * pipes closed on every way out of the iteration (completion, failure, `break`, `close()`
 * or an aborted signal). A stream can be iterated once.
 */
export class QueryStream implements AsyncIterable<QueryItem> {
  private currentState: QueryStreamState = "starting";
  private handle: CliProcessHandle | undefined;
  private readonly stderrChunks: string[] = [];
  private lastResult: ResultMessage | undefined;
  private iterated = false;
  private isCancelled = false;
  private releasing: Promise<void> | undefined;
  private readonly decodeErrors: DecodeErrorPolicy;
  private readonly logOutput = isTruthyEnvValue(process.env.CLAUDE_SDK_LOG_OUTPUT);
  private readonly onAbort = () => {
    log.debug(`query aborted: pid=${this.pid ?? "none"}`);
    this.close().catch((err: unknown) => {
      log.warn(`query abort failed: error=${describeError(err)}`);
    });
  };

  constructor(private readonly options: QueryStreamOptions = {}) {
    this.decodeErrors = options.decodeErrors ?? "yield";
  }

  get state(): QueryStreamState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.handle?.pid;
  }

  /** Everything the process wrote to stderr so far. */
  get stderr(): string {
    return this.stderrChunks.join("");
  }

  /** The last result message seen, if any. */
  get result(): ResultMessage | undefined {
    return this.lastResult;
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  /** Launches the process. A launch failure moves the stream to `failed` and is rethrown. */
  async start(launch: () => Promise<CliProcessHandle>): Promise<this> {
    if (this.currentState !== "starting" || this.handle) {
      throw new Error("QueryStream has already been started");
    }
    const { signal } = this.options;
    if (signal?.aborted) {
      this.isCancelled = true;
      this.currentState = "closed";
      return this;
    }

    let handle: CliProcessHandle;
    try {
      handle = await launch();
    } catch (err) {
      this.currentState = "failed";
      throw err;
    }
    this.handle = handle;
    this.currentState = "streaming";
    this.captureStderr(handle);
    // Read failures before the first pull surface through the iterator as an IoError.
    handle.stdout.on("error", (err) => {
      log.debug(`cli stdout error: pid=${handle.pid} error=${describeError(err)}`);
    });

    if (signal) {
      signal.addEventListener("abort", this.onAbort, { once: true });
      if (signal.aborted) {
        this.onAbort();
      }
    }
    return this;
  }

  /** Cancels the query. Safe to call more than once and after the stream ended. */
  async close(): Promise<void> {
    if (this.currentState !== "closed" && this.currentState !== "failed") {
      this.isCancelled = true;
    }
    await this.release();
  }

  [Symbol.asyncIterator](): AsyncIterator<QueryItem> {
    if (this.iterated) {
      throw new Error("QueryStream can only be iterated once");
    }
    this.iterated = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<QueryItem, void, undefined> {
    const handle = this.handle;
    if (!handle) {
      if (this.isCancelled) {
        return;
      }
      throw new Error("QueryStream has not been started");
    }

    try {
      if (this.isCancelled) {
        return;
      }
      for await (const line of decodeLines(handle.stdout)) {
        if (this.isCancelled) {
          return;
        }
        if (line.trim() === "") {
          continue;
        }
        if (this.logOutput) {
          log.debug(`cli stdout: ${line}`);
        }

        const parsed = parseMessageLine(line);
        if (parsed.ok) {
          this.track(parsed.message);
          yield parsed;
          continue;
        }

        if (this.decodeErrors === "skip") {
          log.warn(`skipping undecodable line: ${parsed.error.message}`);
          continue;
        }
        if (this.decodeErrors === "abort") {
          log.warn(`aborting on undecodable line: pid=${handle.pid}`);
          this.currentState = "failed";
          yield parsed;
          return;
        }
        yield parsed;
      }

      if (this.isCancelled) {
        return;
      }
      this.currentState = "draining";
      const status = await handle.waitForExit();
      if (this.isCancelled) {
        return;
      }
      this.currentState = "closed";
      log.debug(`cli exit: pid=${handle.pid} code=${status.code} signal=${status.signal}`);
      if (status.code !== 0) {
        yield {
          ok: false,
          error: new ProcessError({
            exitCode: status.code,
            signal: status.signal,
            stderr: this.stderr,
          }),
        };
      }
    } catch (err) {
      if (this.isCancelled) {
        return;
      }
      this.currentState = "failed";
      log.warn(`cli stdout read failed: pid=${handle.pid} error=${describeError(err)}`);
      yield { ok: false, error: new IoError(describeError(err), { cause: err }) };
    } finally {
      if (this.currentState === "streaming" || this.currentState === "draining") {
        this.isCancelled = true;
      }
      await this.release();
    }
  }

  private track(message: Message): void {
    if (this.lastResult) {
      log.warn(`message after result: type=${message.type}`);
    }
    if (message.type === "result") {
      this.lastResult = message;
    }
  }

  private captureStderr(handle: CliProcessHandle): void {
    handle.stderr.setEncoding("utf8");
    handle.stderr.on("data", (chunk: string) => {
      this.stderrChunks.push(chunk);
      this.options.onStderr?.(chunk);
    });
    handle.stderr.on("error", (err) => {
      log.debug(`cli stderr error: pid=${handle.pid} error=${describeError(err)}`);
    });
  }

  private release(): Promise<void> {
    this.releasing ??= this.terminateProcess();
    return this.releasing;
  }

  private async terminateProcess(): Promise<void> {
    this.options.signal?.removeEventListener("abort", this.onAbort);
    const handle = this.handle;
    if (handle) {
      if (handle.isRunning()) {
        log.debug(`query release: pid=${handle.pid} cancelled=${this.isCancelled}`);
      }
      await handle.terminate();
    }
    if (this.currentState !== "failed") {
      this.currentState = "closed";
    }
  }
}
