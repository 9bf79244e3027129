import config from "~/config";
import { RegistrationError } from "./errors";
import type { TypeResolver } from "./resolver";
import type { CommandPluginDescriptor, TaskPluginDescriptor } from "./types";

export interface PluginCatalog {
  tasks: readonly string[];
  commands: readonly string[];
}

export class PluginRegistry {
  private tasks = new Map<string, string[]>();
  // typeReference -> stage
  private taskStages = new Map<string, string>();
  // area -> event -> descriptor, both keys lower-cased
  private commands = new Map<string, Map<string, CommandPluginDescriptor>>();

  registerTask(descriptor: TaskPluginDescriptor): void {
    const { id, stage, typeReference } = descriptor;
    requireValue(typeReference, typeReference, "typeReference");
    requireValue(typeReference, id, "id");
    requireValue(typeReference, stage, "stage");

    const references = this.tasks.get(id) ?? [];
    references.push(typeReference);
    this.tasks.set(id, references);
    this.taskStages.set(typeReference, stage);
  }

  registerCommand(descriptor: CommandPluginDescriptor): void {
    const { area, event, displayName, typeReference } = descriptor;
    requireValue(typeReference, typeReference, "typeReference");
    requireValue(typeReference, area, "area");
    requireValue(typeReference, event, "event");
    requireValue(typeReference, displayName, "displayName");

    const key = area.toLowerCase();
    const events =
      this.commands.get(key) ?? new Map<string, CommandPluginDescriptor>();
    events.set(event.toLowerCase(), { ...descriptor });
    this.commands.set(key, events);
  }

  /**
   * Every type reference registered for a task id, oldest first. Unknown ids
   * return undefined rather than an empty list.
   */
  lookupTaskPlugins(id: string): readonly string[] | undefined {
    const references = this.tasks.get(id);
    return references ? [...references] : undefined;
  }

  lookupTaskStage(typeReference: string): string | undefined {
    return this.taskStages.get(typeReference);
  }

  lookupCommandPlugin(
    area: string,
    event: string,
  ): CommandPluginDescriptor | undefined {
    const descriptor = this.commands
      .get(area.toLowerCase())
      ?.get(event.toLowerCase());
    return descriptor ? { ...descriptor } : undefined;
  }

  hasTaskPlugin(typeReference: string): boolean {
    return this.taskStages.has(typeReference);
  }
}

/**
 * Builds a registry from a catalog of type references. Any resolution or
 * validation failure aborts population; no partially filled registry is
 * ever handed out.
 */
export function populateRegistry(
  catalog: PluginCatalog,
  resolver: TypeResolver,
): PluginRegistry {
  const registry = new PluginRegistry();

  for (const typeReference of catalog.tasks) {
    config.logger.debug({ typeReference }, "loading task plugin");
    const plugin = resolver.resolve(typeReference);
    if (plugin.kind !== "task") {
      throw new RegistrationError(typeReference, "not a task plugin");
    }
    registry.registerTask({
      id: plugin.id,
      stage: plugin.stage,
      typeReference,
    });
    config.logger.info(
      { typeReference, id: plugin.id, stage: plugin.stage },
      "loaded task plugin",
    );
  }

  for (const typeReference of catalog.commands) {
    config.logger.debug({ typeReference }, "loading command plugin");
    const plugin = resolver.resolve(typeReference);
    if (plugin.kind !== "command") {
      throw new RegistrationError(typeReference, "not a command plugin");
    }
    registry.registerCommand({
      area: plugin.area,
      event: plugin.event,
      displayName: plugin.displayName,
      typeReference,
    });
    config.logger.info(
      {
        typeReference,
        area: plugin.area,
        event: plugin.event,
        displayName: plugin.displayName,
      },
      "loaded command plugin",
    );
  }

  return registry;
}

function requireValue(typeReference: string, value: string, field: string) {
  if (!value) {
    throw new RegistrationError(
      typeReference || "<unnamed>",
      `${field} must not be empty`,
    );
  }
}
