import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { finished } from "node:stream/promises";

/**
 * In-process stand-in for the `ChildProcess` returned by `spawn`.
 * Tests drive stdout/stderr and the exit explicitly.
 */
export class FakeChildProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin = new PassThrough();
  readonly pid = 4242;
  readonly killSignals: string[] = [];
  killed = false;
  private done = false;

  /** With `ignoreSigterm`, only SIGKILL stops the child. */
  constructor(private readonly behavior: { ignoreSigterm?: boolean } = {}) {
    super();
  }

  /** A child that reports a successful spawn on the next turn of the event loop. */
  static spawned(behavior: { ignoreSigterm?: boolean } = {}): FakeChildProcess {
    const child = new FakeChildProcess(behavior);
    setImmediate(() => child.emit("spawn"));
    return child;
  }

  /** A child whose spawn fails with the given errno code. */
  static failing(code: string): FakeChildProcess {
    const child = new FakeChildProcess();
    const error = Object.assign(new Error(`spawn claude ${code}`), { code });
    setImmediate(() => child.emit("error", error));
    return child;
  }

  emitLines(...lines: string[]): void {
    for (const line of lines) {
      this.stdout.write(`${line}\n`);
    }
  }

  writeStdout(chunk: string | Buffer): void {
    this.stdout.write(chunk);
  }

  writeStderr(text: string): void {
    this.stderr.write(text);
  }

  /** Close the pipes, then report the exit once stderr has drained. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    this.stderr.resume();
    finished(this.stderr).then(
      () => setImmediate(() => this.finish(code, signal)),
      () => setImmediate(() => this.finish(code, signal)),
    );
  }

  /**
   * Report the exit while stderr stays open, as when a background process the CLI
   * started inherited the pipe. No `close` event follows.
   */
  exitHoldingStderr(code: number | null): void {
    this.stdout.end();
    setImmediate(() => {
      this.done = true;
      this.emit("exit", code, null);
    });
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.killSignals.push(signal);
    if (signal === "SIGTERM" && this.behavior.ignoreSigterm) {
      return true;
    }
    this.killed = true;
    this.stdout.destroy();
    this.stderr.destroy();
    setImmediate(() => this.finish(null, signal));
    return true;
  }

  private finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.done) {
      return;
    }
    this.done = true;
    this.emit("exit", code, signal);
    this.emit("close", code, signal);
  }
}
