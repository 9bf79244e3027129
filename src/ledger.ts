import { v4 as uuidv4 } from "uuid";
import config from "~/config";

export type AsyncCommandResult =
  | { handle: AsyncCommandHandle; status: "succeeded" }
  | { handle: AsyncCommandHandle; status: "failed"; error: unknown };

export type AsyncCommandOutput = (
  handle: AsyncCommandHandle,
  line: string,
) => void;

export type AsyncCommandOperation = (
  handle: AsyncCommandHandle,
) => Promise<unknown>;

/** A background command invocation, started on construction. */
export class AsyncCommandHandle {
  readonly id = uuidv4();
  /** Never rejects; failures are reported in the result. */
  readonly settled: Promise<AsyncCommandResult>;
  private done = false;

  constructor(
    readonly displayName: string,
    private sink: AsyncCommandOutput,
    operation: AsyncCommandOperation,
  ) {
    this.settled = (async (): Promise<AsyncCommandResult> => {
      try {
        await operation(this);
        return { handle: this, status: "succeeded" };
      } catch (error) {
        return { handle: this, status: "failed", error };
      } finally {
        this.done = true;
      }
    })();
  }

  get completed(): boolean {
    return this.done;
  }

  output(line: string): void {
    this.sink(this, line);
  }

  async wait(): Promise<void> {
    const result = await this.settled;
    if (result.status === "failed") {
      throw result.error;
    }
  }
}

const JOINED = Symbol("joined");

/**
 * Proof that every entry of a ledger has settled. Only
 * AsyncCommandLedger.joinAll can produce one.
 */
export interface JoinedLedger {
  readonly [JOINED]: true;
  readonly ledger: AsyncCommandLedger;
  readonly results: readonly AsyncCommandResult[];
}

export class AsyncCommandLedger {
  private handles: AsyncCommandHandle[] = [];
  private sealed = false;

  constructor(private sink: AsyncCommandOutput) {}

  get size(): number {
    return this.handles.length;
  }

  get pending(): number {
    return this.handles.filter((handle) => !handle.completed).length;
  }

  entries(): readonly AsyncCommandHandle[] {
    return [...this.handles];
  }

  start(
    displayName: string,
    operation: AsyncCommandOperation,
  ): AsyncCommandHandle {
    if (this.sealed) {
      throw new Error(
        `cannot start '${displayName}': async commands were already joined`,
      );
    }
    const handle = new AsyncCommandHandle(displayName, this.sink, operation);
    this.handles.push(handle);
    config.logger.debug(
      { commandId: handle.id, displayName },
      "started async command",
    );
    return handle;
  }

  async joinAll(): Promise<JoinedLedger> {
    const results: AsyncCommandResult[] = [];
    // Entries started while joining are picked up as well.
    for (let i = 0; i < this.handles.length; i++) {
      const result = await this.handles[i].settled;
      if (result.status === "failed") {
        config.logger.error(
          {
            err: result.error,
            commandId: result.handle.id,
            displayName: result.handle.displayName,
          },
          "async command error",
        );
      }
      results.push(result);
    }
    this.sealed = true;
    return { [JOINED]: true, ledger: this, results };
  }
}
