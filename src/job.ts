import { setMaxListeners } from "node:events";
import { v4 as uuidv4 } from "uuid";
import config from "~/config";
import {
  type AsyncCommandHandle,
  AsyncCommandLedger,
  type JoinedLedger,
} from "./ledger";
import type {
  ExecutionTarget,
  RepositoryResource,
  ServiceEndpoint,
} from "./types";
import { Variables } from "./variables";

export enum JobResult {
  Succeeded = "succeeded",
  Failed = "failed",
  Canceled = "canceled",
}

export type JobOutput = (line: string, command?: AsyncCommandHandle) => void;

export interface JobContext {
  readonly id: string;
  readonly endpoints: ServiceEndpoint[];
  readonly repositories: RepositoryResource[];
  readonly jobSettings: Record<string, string>;
  readonly variables: Variables;
  readonly taskVariables: Variables;
  readonly signal: AbortSignal;
  readonly asyncCommands: AsyncCommandLedger;
  stepTarget(): ExecutionTarget | null;
  output(line: string, command?: AsyncCommandHandle): void;
  debug(message: string): void;
}

export interface JobOptions {
  id?: string;
  endpoints?: ServiceEndpoint[];
  repositories?: RepositoryResource[];
  jobSettings?: Record<string, string>;
  variables?: Variables;
  taskVariables?: Variables;
  container?: ExecutionTarget | null;
  signal?: AbortSignal;
  output?: JobOutput;
}

export class Job implements JobContext {
  readonly id: string;
  readonly endpoints: ServiceEndpoint[];
  readonly repositories: RepositoryResource[];
  readonly jobSettings: Record<string, string>;
  readonly variables: Variables;
  readonly taskVariables: Variables;
  readonly signal: AbortSignal;
  readonly asyncCommands: AsyncCommandLedger;
  private container: ExecutionTarget | null;
  private sink: JobOutput | undefined;
  private failures: unknown[] = [];

  constructor({
    id = uuidv4(),
    endpoints = [],
    repositories = [],
    jobSettings = {},
    variables = new Variables(),
    taskVariables = new Variables(),
    container = null,
    signal = new AbortController().signal,
    output,
  }: JobOptions = {}) {
    this.id = id;
    this.endpoints = endpoints;
    this.repositories = repositories;
    this.jobSettings = jobSettings;
    this.variables = variables;
    this.taskVariables = taskVariables;
    this.container = container;
    // Every in-flight plugin invocation of the job listens for cancellation.
    setMaxListeners(0, signal);
    this.signal = signal;
    this.sink = output;
    this.asyncCommands = new AsyncCommandLedger((handle, line) =>
      this.output(line, handle),
    );
  }

  stepTarget(): ExecutionTarget | null {
    return this.container;
  }

  setStepTarget(container: ExecutionTarget | null): void {
    this.container = container;
  }

  output(line: string, command?: AsyncCommandHandle): void {
    if (this.sink) {
      this.sink(line, command);
      return;
    }
    config.logger.info(
      { jobId: this.id, command: command?.displayName },
      line,
    );
  }

  debug(message: string): void {
    config.logger.debug({ jobId: this.id }, message);
  }

  fail(reason: unknown): void {
    this.failures.push(reason);
  }

  /**
   * Finishes the job. Requires the joined async-command ledger, so every
   * background command has settled before a result exists.
   */
  complete(joined: JoinedLedger): JobResult {
    if (joined.ledger !== this.asyncCommands) {
      throw new Error(
        `job ${this.id} was completed with another job's async commands`,
      );
    }
    const commandFailures = joined.results.filter(
      (result) => result.status === "failed",
    ).length;
    let result = JobResult.Succeeded;
    if (this.signal.aborted) {
      result = JobResult.Canceled;
    } else if (this.failures.length > 0 || commandFailures > 0) {
      result = JobResult.Failed;
    }
    config.logger.info(
      {
        jobId: this.id,
        result,
        asyncCommands: joined.results.length,
        commandFailures,
        stepFailures: this.failures.length,
      },
      "finished job",
    );
    return result;
  }
}
