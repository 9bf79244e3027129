import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  LineChannel,
  type ProcessInvoker,
  type ProcessLine,
  type ProcessRequest,
  type ProcessRun,
} from "./process";

export interface FakeProcessScript {
  lines?: ProcessLine[];
  exitCode?: number | Promise<number>;
}

/**
 * Stands in for the helper process. Every start call is recorded and
 * answered by `script`; output lines are delivered before the exit code.
 */
export class FakeProcessInvoker implements ProcessInvoker {
  requests: ProcessRequest[];
  script: (request: ProcessRequest) => FakeProcessScript;

  constructor({
    requests = [],
    script = () => ({}),
  }: {
    requests?: ProcessRequest[];
    script?: (request: ProcessRequest) => FakeProcessScript;
  } = {}) {
    this.requests = requests;
    this.script = script;
  }

  start(request: ProcessRequest): ProcessRun {
    this.requests.push(request);
    const { lines = [], exitCode = 0 } = this.script(request);
    const channel = new LineChannel<ProcessLine>();
    for (const line of lines) {
      channel.push(line);
    }
    const exit = Promise.resolve(exitCode).then((code) => {
      channel.close();
      return code;
    });
    return { lines: channel, exit };
  }
}

export function stdout(data: string): ProcessLine {
  return { stream: "stdout", data };
}

export function stderr(data: string): ProcessLine {
  return { stream: "stderr", data };
}

/** The parsed execution-context document a request sent to the helper. */
export function inputOf(request: ProcessRequest): Record<string, unknown> {
  const parsed: unknown = JSON.parse(request.input);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`unexpected input document: ${request.input}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {};

  constructor() {
    this.promise = new Promise((resolve) => {
      this.resolve = resolve;
    });
  }
}

export interface HostDirectories {
  root: string;
  binDirectory: string;
  workDirectory: string;
  helperName: string;
}

/**
 * A temporary bin directory holding an (empty) helper executable and plugin
 * module, plus an existing work directory.
 */
export async function createHostDirectories({
  helper = true,
  pluginModule = true,
}: {
  helper?: boolean;
  pluginModule?: boolean;
} = {}): Promise<HostDirectories> {
  const root = await mkdtemp(path.join(os.tmpdir(), "plugin-host-"));
  const binDirectory = path.join(root, "bin");
  const workDirectory = path.join(root, "_work");
  const helperName = "plugin-host";
  await mkdir(binDirectory);
  await mkdir(workDirectory);
  if (helper) {
    const suffix = process.platform === "win32" ? ".exe" : "";
    await writeFile(path.join(binDirectory, `${helperName}${suffix}`), "");
  }
  if (pluginModule) {
    await writeFile(path.join(binDirectory, "pipeline-plugins.js"), "");
  }
  return { root, binDirectory, workDirectory, helperName };
}

export async function flush(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}
