import {
  type ChildProcess,
  type SpawnOptions,
  spawn,
} from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import config from "~/config";

export type OutputStream = "stdout" | "stderr";

export interface ProcessLine {
  stream: OutputStream;
  data: string;
}

export interface ProcessRequest {
  fileName: string;
  args: readonly string[];
  workingDirectory: string;
  environment: NodeJS.ProcessEnv;
  input: string;
}

export interface ProcessRun {
  /**
   * Output lines of both streams, in arrival order. Ends once both streams
   * close.
   */
  lines: AsyncIterable<ProcessLine>;
  /** Exit code, -1 when the process was ended by a signal. */
  exit: Promise<number>;
}

export interface ProcessInvoker {
  start(request: ProcessRequest): ProcessRun;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

/**
 * Unbounded single-consumer queue exposed as an async iterable. Producers
 * push without waiting; the consumer receives items in push order.
 */
export class LineChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (err: unknown) => void;
  }> = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  push(item: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  close(error?: unknown): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (error !== undefined) {
      this.failure = { error };
    }
    for (const waiter of this.waiting.splice(0)) {
      if (this.failure) {
        waiter.reject(this.failure.error);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.buffer.length > 0) {
          const [value] = this.buffer.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }
        if (this.failure) {
          return Promise.reject(this.failure.error);
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve, reject) => {
          this.waiting.push({ resolve, reject });
        });
      },
    };
  }
}

export class ChildProcessInvoker implements ProcessInvoker {
  constructor(private spawnFn: SpawnFn = spawn) {}

  start(request: ProcessRequest): ProcessRun {
    const lines = new LineChannel<ProcessLine>();
    const child = this.spawnFn(request.fileName, request.args, {
      cwd: request.workingDirectory,
      env: request.environment,
      shell: false,
      stdio: "pipe",
      windowsHide: true,
    });

    let openReaders = 0;
    const read = (stream: OutputStream, input: Readable | null): void => {
      if (!input) {
        return;
      }
      openReaders += 1;
      const reader = createInterface({ input, crlfDelay: Infinity });
      reader.on("line", (data) => lines.push({ stream, data }));
      reader.on("close", () => {
        openReaders -= 1;
        if (openReaders === 0) {
          lines.close();
        }
      });
    };
    read("stdout", child.stdout);
    read("stderr", child.stderr);
    if (openReaders === 0) {
      lines.close();
    }

    const exit = new Promise<number>((resolve, reject) => {
      child.on("error", (err) => {
        lines.close(err);
        reject(err);
      });
      child.on("close", (code) => {
        resolve(typeof code === "number" ? code : -1);
      });
    });

    if (child.stdin) {
      child.stdin.on("error", (err) => {
        config.logger.warn(
          { err, fileName: request.fileName },
          "plugin host standard input error",
        );
      });
      child.stdin.end(request.input, "utf8");
    }

    config.logger.debug(
      { fileName: request.fileName, args: request.args, pid: child.pid },
      "started plugin host process",
    );
    return { lines, exit };
  }
}
