import { PassThrough } from "node:stream";
import { finished } from "node:stream/promises";
import type { CliExitStatus, CliProcessHandle } from "../process/launch.js";

/** A `CliProcessHandle` driven by the test instead of a real process. */
export class FakeCliProcess implements CliProcessHandle {
  readonly pid = 1234;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  terminateCalls = 0;

  private status: CliExitStatus | undefined;
  private settle: (status: CliExitStatus) => void = () => {};
  private readonly exited = new Promise<CliExitStatus>((resolve) => {
    this.settle = resolve;
  });

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

  /** Ends both pipes and settles the exit once stderr has been consumed. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    finished(this.stderr).then(
      () => this.finish({ code, signal }),
      () => this.finish({ code, signal }),
    );
  }

  exitStatus(): CliExitStatus | undefined {
    return this.status;
  }

  isRunning(): boolean {
    return this.status === undefined;
  }

  waitForExit(): Promise<CliExitStatus> {
    return this.exited;
  }

  terminate(): Promise<CliExitStatus> {
    this.terminateCalls += 1;
    this.stdout.destroy();
    this.stderr.destroy();
    this.finish({ code: null, signal: "SIGTERM" });
    return this.exited;
  }

  private finish(status: CliExitStatus): void {
    if (this.status) {
      return;
    }
    this.status = status;
    this.settle(status);
  }
}
