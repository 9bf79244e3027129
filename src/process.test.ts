import { ChildProcess, type SpawnOptions } from "node:child_process";
import { PassThrough } from "node:stream";
import { describe, expect, test } from "vitest";
import { ChildProcessInvoker, LineChannel, type ProcessLine } from "./process";

function fakeChild() {
  const child = new ChildProcess();
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  child.stdin = stdin;
  child.stdout = stdout;
  child.stderr = stderr;
  return { child, stdin, stdout, stderr };
}

async function collect(
  lines: AsyncIterable<ProcessLine>,
): Promise<ProcessLine[]> {
  const collected: ProcessLine[] = [];
  for await (const line of lines) {
    collected.push(line);
  }
  return collected;
}

const request = {
  fileName: "/opt/bin/plugin-host",
  args: ["task", "plugins:checkout"],
  workingDirectory: "/opt/work",
  environment: { TEST_VALUE: "1" },
  input: '{"inputs":{}}',
};

describe("ChildProcessInvoker.start", () => {
  test("spawns the helper with the request's arguments", () => {
    const { child } = fakeChild();
    const calls: Array<{
      command: string;
      args: readonly string[];
      options: SpawnOptions;
    }> = [];
    const invoker = new ChildProcessInvoker((command, args, options) => {
      calls.push({ command, args, options });
      return child;
    });
    invoker.start(request);
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("/opt/bin/plugin-host");
    expect(calls[0].args).toEqual(["task", "plugins:checkout"]);
    expect(calls[0].options).toMatchObject({
      cwd: "/opt/work",
      env: { TEST_VALUE: "1" },
      shell: false,
      stdio: "pipe",
    });
  });

  test("writes the input document to standard input", async () => {
    const { child, stdin } = fakeChild();
    const run = new ChildProcessInvoker(() => child).start(request);
    let input = "";
    stdin.on("data", (chunk) => {
      input += chunk.toString();
    });
    await new Promise((resolve) => stdin.on("end", resolve));
    expect(input).toBe('{"inputs":{}}');
    child.emit("close", 0, null);
    expect(await run.exit).toBe(0);
  });

  test("yields the lines of both streams", async () => {
    const { child, stdout, stderr } = fakeChild();
    const run = new ChildProcessInvoker(() => child).start(request);
    stdout.end("first\r\nsecond\n");
    stderr.end("oops\n");
    child.emit("close", 0, null);
    const lines = await collect(run.lines);
    const dataOf = (stream: string) =>
      lines.filter((line) => line.stream === stream).map((line) => line.data);
    expect(dataOf("stdout")).toEqual(["first", "second"]);
    expect(dataOf("stderr")).toEqual(["oops"]);
    expect(await run.exit).toBe(0);
  });

  test("reports the exit code of the helper", async () => {
    const { child, stdout, stderr } = fakeChild();
    const run = new ChildProcessInvoker(() => child).start(request);
    stdout.end();
    stderr.end();
    child.emit("close", 7, null);
    expect(await run.exit).toBe(7);
    expect(await collect(run.lines)).toEqual([]);
  });

  test("reports -1 when the helper is ended by a signal", async () => {
    const { child, stdout, stderr } = fakeChild();
    const run = new ChildProcessInvoker(() => child).start(request);
    stdout.end();
    stderr.end();
    child.emit("close", null, "SIGTERM");
    expect(await run.exit).toBe(-1);
  });

  test("rejects when the helper cannot be spawned", async () => {
    const { child } = fakeChild();
    const run = new ChildProcessInvoker(() => child).start(request);
    child.emit("error", new Error("spawn plugin-host ENOENT"));
    await expect(run.exit).rejects.toThrow("spawn plugin-host ENOENT");
    await expect(collect(run.lines)).rejects.toThrow(
      "spawn plugin-host ENOENT",
    );
  });
});

describe("LineChannel", () => {
  test("delivers items pushed before and after waiting", async () => {
    const channel = new LineChannel<string>();
    channel.push("a");
    const collected = (async () => {
      const items: string[] = [];
      for await (const item of channel) {
        items.push(item);
      }
      return items;
    })();
    channel.push("b");
    channel.close();
    channel.push("c");
    expect(await collected).toEqual(["a", "b"]);
  });

  test("delivers buffered items before a failure", async () => {
    const channel = new LineChannel<string>();
    channel.push("a");
    channel.close(new Error("broken pipe"));
    const iterator = channel[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: "a", done: false });
    await expect(iterator.next()).rejects.toThrow("broken pipe");
  });
});
