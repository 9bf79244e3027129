import { stat } from "node:fs/promises";
import path from "node:path";
import config from "~/config";
import {
  HelperMissingError,
  InvocationCancelledError,
  LogicalFailureError,
  ProcessExitCodeError,
} from "./errors";
import {
  ChildProcessInvoker,
  type ProcessInvoker,
  type ProcessLine,
} from "./process";
import type {
  CommandPluginContext,
  InvocationMode,
  OutputObserver,
  TaskPluginContext,
} from "./types";

export interface TaskInvocation {
  mode: "task";
  typeReference: string;
  context: TaskPluginContext;
  environment: Record<string, string>;
  signal: AbortSignal;
  onOutput: OutputObserver;
}

export interface CommandInvocation {
  mode: "command";
  typeReference: string;
  context: CommandPluginContext;
  signal: AbortSignal;
  onOutput: OutputObserver;
}

export type InvocationRequest = TaskInvocation | CommandInvocation;

export interface InvocationOutcome {
  mode: InvocationMode;
  typeReference: string;
  exitCode: number;
}

export interface PluginExecutorOptions {
  binDirectory: string;
  workDirectory: string;
  helperName: string;
  invoker?: ProcessInvoker;
  platform?: NodeJS.Platform;
}

/**
 * Runs plugins through the helper executable and classifies the outcome.
 *
 * Task mode requires exit code 0; anything else is an infrastructure fault
 * of the helper, since task results are reported on standard output through
 * command markers. Command mode cannot use markers (it is already handling
 * one), so standard error is buffered: a non-zero exit is a process fault,
 * a zero exit with error output is a logical failure of the plugin.
 */
export class PluginExecutor {
  private constructor(
    readonly fileName: string,
    private workDirectory: string,
    private invoker: ProcessInvoker,
  ) {}

  static async create(options: PluginExecutorOptions): Promise<PluginExecutor> {
    const platform = options.platform ?? process.platform;
    const suffix = platform === "win32" ? ".exe" : "";
    const fileName = path.join(
      options.binDirectory,
      `${options.helperName}${suffix}`,
    );
    if (!(await isFile(fileName))) {
      throw new HelperMissingError(fileName, "helper executable");
    }
    return new PluginExecutor(
      fileName,
      options.workDirectory,
      options.invoker ?? new ChildProcessInvoker(),
    );
  }

  async invoke(request: InvocationRequest): Promise<InvocationOutcome> {
    const { mode, typeReference, signal } = request;
    if (signal.aborted) {
      throw new InvocationCancelledError(typeReference);
    }
    if (!(await isDirectory(this.workDirectory))) {
      throw new HelperMissingError(this.workDirectory, "working directory");
    }
    if (signal.aborted) {
      throw new InvocationCancelledError(typeReference);
    }

    const args = [mode, typeReference];
    const environment =
      request.mode === "task"
        ? { ...process.env, ...request.environment }
        : { ...process.env };

    config.logger.info(
      { mode, typeReference, fileName: this.fileName },
      "starting plugin host",
    );
    const run = this.invoker.start({
      fileName: this.fileName,
      args,
      workingDirectory: this.workDirectory,
      environment,
      input: JSON.stringify(request.context),
    });

    const state: DrainState = { canceled: false, stderr: [] };
    const completion = Promise.all([
      this.drain(request, run.lines, state),
      run.exit,
    ]).then(([, exitCode]) => exitCode);

    let exitCode: number;
    try {
      exitCode = await untilAborted(completion, signal);
    } catch (err) {
      if (err === ABORTED) {
        state.canceled = true;
        config.logger.warn(
          { mode, typeReference },
          "stopped waiting for canceled plugin host",
        );
        void completion.then(
          (code) =>
            config.logger.info(
              { mode, typeReference, exitCode: code },
              "canceled plugin host exited",
            ),
          (lateErr) =>
            config.logger.warn(
              { err: lateErr, mode, typeReference },
              "canceled plugin host error",
            ),
        );
        throw new InvocationCancelledError(typeReference);
      }
      config.logger.error({ err, mode, typeReference }, "plugin host error");
      throw err;
    }

    if (exitCode !== 0) {
      const stderr = state.stderr.join("\n");
      // Command mode always reports its buffered error output, even none.
      if (request.mode === "command") {
        request.onOutput(stderr);
      }
      const err = new ProcessExitCodeError(
        exitCode,
        this.fileName,
        args,
        stderr,
      );
      config.logger.error(
        { err, mode, typeReference, exitCode },
        "plugin host error",
      );
      throw err;
    }
    if (state.stderr.length > 0) {
      const err = new LogicalFailureError(state.stderr.join("\n"));
      config.logger.error(
        { err, mode, typeReference, exitCode },
        "plugin command reported errors",
      );
      throw err;
    }

    config.logger.info(
      { mode, typeReference, exitCode },
      "finished plugin host",
    );
    return { mode, typeReference, exitCode };
  }

  private async drain(
    request: InvocationRequest,
    lines: AsyncIterable<ProcessLine>,
    state: DrainState,
  ): Promise<void> {
    // The only writer of state.stderr; it is read once the loop has ended.
    for await (const line of lines) {
      if (request.mode === "command" && line.stream === "stderr") {
        state.stderr.push(line.data);
      } else if (state.canceled) {
        config.logger.debug(
          { typeReference: request.typeReference, line: line.data },
          "plugin host output",
        );
      } else {
        request.onOutput(line.data);
      }
    }
  }
}

interface DrainState {
  canceled: boolean;
  stderr: string[];
}

const ABORTED = Symbol("aborted");

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const abort = () => reject(ABORTED);
    if (signal.aborted) {
      abort();
      return;
    }
    signal.addEventListener("abort", abort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (err) => {
        signal.removeEventListener("abort", abort);
        reject(err);
      },
    );
  });
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(directory: string): Promise<boolean> {
  try {
    return (await stat(directory)).isDirectory();
  } catch {
    return false;
  }
}
