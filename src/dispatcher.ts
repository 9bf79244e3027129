import type { Command } from "./command";
import { UnsupportedPluginError } from "./errors";
import type { PluginExecutor } from "./executor";
import type { JobContext } from "./job";
import type { AsyncCommandHandle } from "./ledger";
import type { PluginRegistry } from "./registry";
import type { CommandPluginContext } from "./types";

export class CommandDispatcher {
  constructor(
    private registry: PluginRegistry,
    private executor: Pick<PluginExecutor, "invoke">,
  ) {}

  /**
   * Starts the command plugin for `command` in the background and records it
   * on the job's async-command ledger. Returns as soon as the handle is
   * recorded; plugin failures surface when the handle is joined.
   */
  dispatch(job: JobContext, command: Command): AsyncCommandHandle {
    const { area, event } = command;
    job.debug(
      `Process ${area}.${event} command through plugin host in background.`,
    );
    const plugin = this.registry.lookupCommandPlugin(area, event);
    if (!plugin) {
      throw new UnsupportedPluginError(command.toString());
    }

    const context: CommandPluginContext = {
      data: command.data,
      properties: { ...command.properties },
      endpoints: job.endpoints,
      variables: job.variables.snapshot(),
    };

    return job.asyncCommands.start(plugin.displayName, (handle) =>
      this.executor.invoke({
        mode: "command",
        typeReference: plugin.typeReference,
        context,
        signal: job.signal,
        onOutput: (line) => handle.output(line),
      }),
    );
  }
}
