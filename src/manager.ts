import config from "~/config";
import { BUILTIN_CATALOG, BUILTIN_FACTORIES } from "./catalog";
import { type Command, parseCommand } from "./command";
import { CommandDispatcher } from "./dispatcher";
import { UnsupportedPluginError } from "./errors";
import { type InvocationOutcome, PluginExecutor } from "./executor";
import type { JobContext } from "./job";
import type { AsyncCommandHandle } from "./ledger";
import type { ProcessInvoker } from "./process";
import {
  type PluginCatalog,
  type PluginRegistry,
  populateRegistry,
} from "./registry";
import { type PluginFactory, TypeResolver } from "./resolver";
import type {
  CommandPluginDescriptor,
  OutputObserver,
  TaskPluginContext,
} from "./types";
import type { Variables } from "./variables";

export interface PluginManagerOptions {
  binDirectory?: string;
  workDirectory?: string;
  helperName?: string;
  catalog?: PluginCatalog;
  factories?: ReadonlyMap<string, PluginFactory>;
  invoker?: ProcessInvoker;
  platform?: NodeJS.Platform;
}

export class PluginManager {
  private dispatcher: CommandDispatcher;

  constructor(
    private registry: PluginRegistry,
    private executor: Pick<PluginExecutor, "invoke">,
  ) {
    this.dispatcher = new CommandDispatcher(registry, executor);
  }

  /**
   * Populates the registry from the catalog and locates the helper
   * executable. Fails if either step fails.
   */
  static async create(
    options: PluginManagerOptions = {},
  ): Promise<PluginManager> {
    const binDirectory = options.binDirectory ?? config.binDirectory;
    const registry = populateRegistry(
      options.catalog ?? BUILTIN_CATALOG,
      new TypeResolver(options.factories ?? BUILTIN_FACTORIES, binDirectory),
    );
    const executor = await PluginExecutor.create({
      binDirectory,
      workDirectory: options.workDirectory ?? config.workDirectory,
      helperName: options.helperName ?? config.helperName,
      invoker: options.invoker,
      platform: options.platform,
    });
    return new PluginManager(registry, executor);
  }

  getTaskPlugins(id: string): readonly string[] | undefined {
    return this.registry.lookupTaskPlugins(id);
  }

  getTaskStage(typeReference: string): string | undefined {
    return this.registry.lookupTaskStage(typeReference);
  }

  getCommandPlugin(
    area: string,
    event: string,
  ): CommandPluginDescriptor | undefined {
    return this.registry.lookupCommandPlugin(area, event);
  }

  async runTask(
    job: JobContext,
    typeReference: string,
    inputs: Record<string, string>,
    environment: Record<string, string>,
    runtimeVariables: Variables,
    onOutput: OutputObserver,
  ): Promise<InvocationOutcome> {
    // Only plugins from the registry may run.
    if (!this.registry.hasTaskPlugin(typeReference)) {
      throw new UnsupportedPluginError(typeReference);
    }

    const context: TaskPluginContext = {
      inputs: { ...inputs },
      repositories: job.repositories,
      endpoints: job.endpoints,
      container: job.stepTarget(),
      jobSettings: job.jobSettings,
      variables: runtimeVariables.snapshot(),
      taskVariables: job.taskVariables.snapshot(),
    };

    return await this.executor.invoke({
      mode: "task",
      typeReference,
      context,
      environment,
      signal: job.signal,
      onOutput,
    });
  }

  processCommand(job: JobContext, command: Command): AsyncCommandHandle {
    return this.dispatcher.dispatch(job, command);
  }

  /**
   * Dispatches the command marker carried by `line` if a command plugin
   * handles it. Returns undefined for plain output and for markers no
   * plugin handles.
   */
  processLine(job: JobContext, line: string): AsyncCommandHandle | undefined {
    const command = parseCommand(line);
    if (!command) {
      return undefined;
    }
    if (!this.registry.lookupCommandPlugin(command.area, command.event)) {
      return undefined;
    }
    return this.dispatcher.dispatch(job, command);
  }
}
