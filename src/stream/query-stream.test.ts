import { describe, expect, it, vi } from "vitest";

import { CLIJSONDecodeError, CLINotFoundError, IoError, ProcessError } from "../errors.js";
import { FakeCliProcess } from "../test-utils/fake-cli-process.js";
import type { Message } from "../types.js";
import { type QueryItem, QueryStream, type QueryStreamOptions } from "./query-stream.js";

const INIT_LINE = JSON.stringify({ type: "system", subtype: "init", session_id: "sess-1" });
const ASSISTANT_LINE = JSON.stringify({
  type: "assistant",
  content: [{ type: "text", text: "hi" }],
});
const RESULT_LINE = JSON.stringify({
  type: "result",
  subtype: "success",
  session_id: "sess-1",
  result: "hi",
  total_cost_usd: 0.0012,
});

async function startStream(options?: QueryStreamOptions) {
  const proc = new FakeCliProcess();
  const stream = await new QueryStream(options).start(async () => proc);
  return { proc, stream };
}

async function collect(stream: QueryStream): Promise<QueryItem[]> {
  const items: QueryItem[] = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}

function messagesOf(items: QueryItem[]): Message[] {
  return items.flatMap((item) => (item.ok ? [item.message] : []));
}

function errorsOf(items: QueryItem[]) {
  return items.flatMap((item) => (item.ok ? [] : [item.error]));
}

describe("QueryStream", () => {
  it("yields every message and ends cleanly on exit 0", async () => {
    const { proc, stream } = await startStream();
    expect(stream.state).toBe("streaming");
    expect(stream.pid).toBe(1234);

    proc.emitLines(INIT_LINE, ASSISTANT_LINE, RESULT_LINE);
    proc.exit(0);
    const items = await collect(stream);

    expect(items).toHaveLength(3);
    expect(messagesOf(items).map((message) => message.type)).toEqual([
      "system",
      "assistant",
      "result",
    ]);
    expect(messagesOf(items)[1]).toEqual({
      type: "assistant",
      content: [{ type: "text", text: "hi" }],
    });
    expect(stream.result).toEqual({
      type: "result",
      subtype: "success",
      session_id: "sess-1",
      result: "hi",
      cost_usd: 0.0012,
    });
    expect(stream.state).toBe("closed");
    expect(stream.cancelled).toBe(false);
    expect(proc.exitStatus()).toEqual({ code: 0, signal: null });
  });

  it("ends with a ProcessError carrying stderr on a non-zero exit", async () => {
    const chunks: string[] = [];
    const { proc, stream } = await startStream({ onStderr: (chunk) => chunks.push(chunk) });

    proc.emitLines(ASSISTANT_LINE);
    proc.writeStderr("rate limited\n");
    proc.exit(1);
    const items = await collect(stream);

    expect(items).toHaveLength(2);
    expect(items[0]?.ok).toBe(true);
    const [error] = errorsOf(items);
    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({ exitCode: 1, signal: null, stderr: "rate limited\n" });
    expect(error?.message).toBe("Process failed with exit code 1: rate limited");
    expect(stream.stderr).toBe("rate limited\n");
    expect(chunks.join("")).toBe("rate limited\n");
    expect(stream.state).toBe("closed");
  });

  it("reports a missing or unknown type as one decode error each and keeps going", async () => {
    const { proc, stream } = await startStream();

    proc.emitLines('{"content":"orphan"}', '{"type":"telemetry"}', ASSISTANT_LINE);
    proc.exit(0);
    const items = await collect(stream);

    expect(items).toHaveLength(3);
    const errors = errorsOf(items);
    expect(errors.map((error) => error.message)).toEqual([
      "Failed to decode JSON response: missing message type",
      "Failed to decode JSON response: unknown message type: telemetry",
    ]);
    expect(errors.every((error) => error instanceof CLIJSONDecodeError)).toBe(true);
    expect(items[2]?.ok).toBe(true);
  });

  it("reports a trailing partial line as a decode error", async () => {
    const { proc, stream } = await startStream();

    proc.writeStdout('{"type":"result","exit_code":0');
    proc.exit(0);
    const items = await collect(stream);

    expect(items).toHaveLength(1);
    const [error] = errorsOf(items);
    expect(error).toBeInstanceOf(CLIJSONDecodeError);
    expect(error).toHaveProperty("line", '{"type":"result","exit_code":0');
  });

  it("skips blank lines", async () => {
    const { proc, stream } = await startStream();

    proc.emitLines("", "   ", ASSISTANT_LINE, "\r");
    proc.exit(0);
    const items = await collect(stream);

    expect(messagesOf(items).map((message) => message.type)).toEqual(["assistant"]);
    expect(errorsOf(items)).toEqual([]);
  });

  it("reassembles multi-byte characters split across chunks", async () => {
    const { proc, stream } = await startStream();

    const bytes = Buffer.from(`${JSON.stringify({ type: "user", content: "héllo 🙂" })}\n`);
    for (let i = 0; i < bytes.length; i += 1) {
      proc.writeStdout(bytes.subarray(i, i + 1));
    }
    proc.exit(0);
    const items = await collect(stream);

    expect(messagesOf(items)).toEqual([
      { type: "user", content: [{ type: "text", text: "héllo 🙂" }] },
    ]);
  });

  it("drops undecodable lines under the skip policy", async () => {
    const { proc, stream } = await startStream({ decodeErrors: "skip" });

    proc.emitLines("not json", ASSISTANT_LINE);
    proc.exit(0);
    const items = await collect(stream);

    expect(items).toHaveLength(1);
    expect(items[0]?.ok).toBe(true);
  });

  it("ends on the first undecodable line under the abort policy", async () => {
    const { proc, stream } = await startStream({ decodeErrors: "abort" });

    proc.emitLines("not json", ASSISTANT_LINE);
    const items = await collect(stream);

    expect(items).toHaveLength(1);
    expect(errorsOf(items)[0]).toBeInstanceOf(CLIJSONDecodeError);
    expect(stream.state).toBe("failed");
    expect(proc.terminateCalls).toBe(1);
    expect(proc.exitStatus()).toEqual({ code: null, signal: "SIGTERM" });
  });

  it("terminates the process when the consumer breaks early", async () => {
    const { proc, stream } = await startStream();

    proc.emitLines(INIT_LINE, ASSISTANT_LINE);
    const seen: QueryItem[] = [];
    for await (const item of stream) {
      seen.push(item);
      break;
    }

    expect(seen).toHaveLength(1);
    expect(proc.terminateCalls).toBe(1);
    expect(proc.exitStatus()).toEqual({ code: null, signal: "SIGTERM" });
    expect(stream.state).toBe("closed");
    expect(stream.cancelled).toBe(true);
  });

  it("ends without an error item after close()", async () => {
    const { proc, stream } = await startStream();
    proc.emitLines(INIT_LINE, ASSISTANT_LINE);

    const iterator = stream[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(first.done).toBe(false);

    await stream.close();
    await stream.close();

    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(proc.terminateCalls).toBe(1);
    expect(stream.cancelled).toBe(true);
    expect(stream.state).toBe("closed");
  });

  it("cancels through an AbortSignal", async () => {
    const controller = new AbortController();
    const { proc, stream } = await startStream({ signal: controller.signal });
    proc.emitLines(INIT_LINE, ASSISTANT_LINE);

    const items: QueryItem[] = [];
    for await (const item of stream) {
      items.push(item);
      controller.abort();
    }

    expect(items).toHaveLength(1);
    expect(proc.terminateCalls).toBe(1);
    expect(stream.cancelled).toBe(true);
  });

  it("does not launch when the signal is already aborted", async () => {
    const launch = vi.fn(async () => new FakeCliProcess());
    const stream = await new QueryStream({ signal: AbortSignal.abort() }).start(launch);

    expect(launch).not.toHaveBeenCalled();
    expect(stream.state).toBe("closed");
    expect(await collect(stream)).toEqual([]);
  });

  it("yields an IoError when reading stdout fails", async () => {
    const { proc, stream } = await startStream();
    proc.emitLines(ASSISTANT_LINE);

    const iterator = stream[Symbol.asyncIterator]();
    await iterator.next();
    proc.stdout.destroy(new Error("read EIO"));

    const failed = await iterator.next();
    expect(failed.done).toBe(false);
    const item = failed.value;
    expect(item?.ok).toBe(false);
    if (item && !item.ok) {
      expect(item.error).toBeInstanceOf(IoError);
      expect(item.error.message).toBe("I/O error: read EIO");
    }
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(stream.state).toBe("failed");
    expect(proc.terminateCalls).toBe(1);
  });

  it("surfaces a stdout failure that happens before iteration starts", async () => {
    const { proc, stream } = await startStream();

    proc.stdout.destroy(new Error("read EPIPE"));
    await new Promise((resolve) => setImmediate(resolve));
    const items = await collect(stream);

    expect(items).toHaveLength(1);
    const [error] = errorsOf(items);
    expect(error).toBeInstanceOf(IoError);
    expect(error?.message).toBe("I/O error: read EPIPE");
    expect(stream.state).toBe("failed");
  });

  it("keeps yielding messages that arrive after the result", async () => {
    const { proc, stream } = await startStream();

    proc.emitLines(RESULT_LINE, ASSISTANT_LINE);
    proc.exit(0);
    const items = await collect(stream);

    expect(messagesOf(items).map((message) => message.type)).toEqual(["result", "assistant"]);
  });

  it("can only be iterated once", async () => {
    const { proc, stream } = await startStream();
    proc.exit(0);
    await collect(stream);

    expect(() => stream[Symbol.asyncIterator]()).toThrow("QueryStream can only be iterated once");
  });

  it("rethrows launch failures and moves to failed", async () => {
    const stream = new QueryStream();

    const err = await stream
      .start(async () => {
        throw new CLINotFoundError();
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CLINotFoundError);
    expect(stream.state).toBe("failed");
  });
});
