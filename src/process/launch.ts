import { spawn, type ChildProcess } from "node:child_process";
import { once } from "node:events";
import fs from "node:fs/promises";
import type { Readable } from "node:stream";
import { DEFAULT_KILL_GRACE_MS } from "../config/options.js";
import { CLIConnectionError, CLINotFoundError, describeError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("process/launch");

/** How long to wait for the pipes to close once the process has exited. */
export const STDIO_SETTLE_MS = 250;

export type CliExitStatus = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * A spawned CLI process. Owned by one query; the pipes are closed once the
 * process has exited or been terminated.
 */
export interface CliProcessHandle {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Exit status once the process has exited, `undefined` while it runs. */
  exitStatus(): CliExitStatus | undefined;
  isRunning(): boolean;
  /**
   * Resolves after the process exited and its pipes closed, or `STDIO_SETTLE_MS`
   * after the exit when something else still holds them open.
   */
  waitForExit(): Promise<CliExitStatus>;
  /** Closes the pipes and stops the process (SIGTERM, then SIGKILL). Idempotent. */
  terminate(): Promise<CliExitStatus>;
}

export type LaunchCliParams = {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to stdin, which is then closed; stdin is ignored when unset. */
  stdin?: string;
  killGraceMs?: number;
};

function resolveErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function toLaunchError(command: string, err: unknown): Error {
  if (resolveErrorCode(err) === "ENOENT") {
    return new CLINotFoundError({ cliPath: command, cause: err });
  }
  return new CLIConnectionError(`Failed to spawn CLI process: ${describeError(err)}`, {
    cause: err,
  });
}

async function assertDirectory(cwd: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(cwd)).isDirectory();
  } catch (err) {
    throw new CLIConnectionError(`working directory does not exist: ${cwd}`, { cause: err });
  }
  if (!isDirectory) {
    throw new CLIConnectionError(`working directory is not a directory: ${cwd}`);
  }
}

class ChildProcessHandle implements CliProcessHandle {
  private status: CliExitStatus | undefined;
  private termination: Promise<CliExitStatus> | undefined;
  private readonly exited: Promise<CliExitStatus>;
  private readonly closed: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    readonly stdout: Readable,
    readonly stderr: Readable,
    private readonly killGraceMs: number,
  ) {
    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        const status = { code, signal };
        this.status = status;
        log.debug(`cli exited: pid=${child.pid} code=${code} signal=${signal}`);
        resolve(status);
      });
    });
    this.closed = new Promise((resolve) => {
      child.once("close", () => resolve());
    });
    child.on("error", (err) => {
      log.warn(`cli process error: pid=${child.pid} error=${describeError(err)}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  exitStatus(): CliExitStatus | undefined {
    return this.status;
  }

  isRunning(): boolean {
    return this.status === undefined;
  }

  async waitForExit(): Promise<CliExitStatus> {
    const status = await this.exited;
    await this.settleStdio();
    return status;
  }

  terminate(): Promise<CliExitStatus> {
    this.termination ??= this.killAndReap();
    return this.termination;
  }

  // A descendant that inherited the pipes can hold them open after the CLI itself exited.
  private async settleStdio(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), STDIO_SETTLE_MS);
    });
    try {
      const stillOpen = await Promise.race([this.closed.then(() => false), timedOut]);
      if (stillOpen) {
        log.debug(`cli stdio still open ${STDIO_SETTLE_MS}ms after exit: pid=${this.child.pid}`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async killAndReap(): Promise<CliExitStatus> {
    this.child.stdin?.destroy();
    this.stdout.destroy();
    this.stderr.destroy();
    if (this.status) {
      return this.status;
    }

    log.debug(`cli terminate: pid=${this.child.pid} signal=SIGTERM`);
    this.child.kill("SIGTERM");
    const escalation = setTimeout(() => {
      if (!this.status) {
        log.warn(`cli terminate: pid=${this.child.pid} still running after ${this.killGraceMs}ms`);
        this.child.kill("SIGKILL");
      }
    }, this.killGraceMs);
    escalation.unref();
    try {
      return await this.exited;
    } finally {
      clearTimeout(escalation);
    }
  }
}

export async function launchCli(params: LaunchCliParams): Promise<CliProcessHandle> {
  if (params.cwd) {
    await assertDirectory(params.cwd);
  }

  let child: ChildProcess;
  try {
    child = spawn(params.command, params.args, {
      cwd: params.cwd,
      env: params.env,
      stdio: [params.stdin !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
      windowsHide: true,
    });
  } catch (err) {
    throw toLaunchError(params.command, err);
  }

  try {
    await once(child, "spawn");
  } catch (err) {
    log.warn(`cli spawn failed: command=${params.command} error=${describeError(err)}`);
    throw toLaunchError(params.command, err);
  }

  const { stdout, stderr, stdin } = child;
  if (!stdout || !stderr) {
    child.kill("SIGKILL");
    throw new CLIConnectionError("CLI process did not expose stdout/stderr pipes");
  }
  if (params.stdin !== undefined) {
    if (!stdin) {
      child.kill("SIGKILL");
      throw new CLIConnectionError("CLI process did not expose a stdin pipe");
    }
    stdin.on("error", (err) => {
      log.debug(`cli stdin error: pid=${child.pid} error=${describeError(err)}`);
    });
    stdin.end(params.stdin);
  }

  log.info(`cli spawn: pid=${child.pid} command=${params.command} args=${params.args.length}`);
  return new ChildProcessHandle(
    child,
    stdout,
    stderr,
    params.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
  );
}
