import { existsSync } from "node:fs";
import path from "node:path";
import { RegistrationError } from "./errors";
import type { CommandPlugin, PluginInstance, TaskPlugin } from "./types";

/**
 * Handed to a plugin factory for the duration of one resolve call. Required
 * modules are only searched for in the binary directory.
 */
export interface ResolutionContext {
  readonly binDirectory: string;
  locate(moduleName: string): string;
}

export type PluginFactory = (context: ResolutionContext) => unknown;

class DirectoryResolutionContext implements ResolutionContext {
  private open = true;

  constructor(
    readonly binDirectory: string,
    private exists: (file: string) => boolean,
  ) {}

  locate(moduleName: string): string {
    if (!this.open) {
      throw new Error(
        `resolution context closed, cannot locate '${moduleName}'`,
      );
    }
    const file = path.join(this.binDirectory, `${moduleName}.js`);
    if (!this.exists(file)) {
      throw new Error(
        `required module '${moduleName}' not found in ${this.binDirectory}`,
      );
    }
    return file;
  }

  close(): void {
    this.open = false;
  }
}

export class TypeResolver {
  constructor(
    private factories: ReadonlyMap<string, PluginFactory>,
    private binDirectory: string,
    private exists: (file: string) => boolean = existsSync,
  ) {}

  resolve(typeReference: string): PluginInstance {
    const factory = this.factories.get(typeReference);
    if (!factory) {
      throw new RegistrationError(typeReference, "unknown type reference");
    }

    const context = new DirectoryResolutionContext(
      this.binDirectory,
      this.exists,
    );
    let instance: unknown;
    try {
      instance = factory(context);
    } catch (err) {
      throw new RegistrationError(typeReference, "instantiation failed", {
        cause: err,
      });
    } finally {
      context.close();
    }

    if (isTaskPlugin(instance) || isCommandPlugin(instance)) {
      return instance;
    }
    throw new RegistrationError(typeReference, "not a task or command plugin");
  }
}

export function isTaskPlugin(value: unknown): value is TaskPlugin {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "task" &&
    "id" in value &&
    typeof value.id === "string" &&
    "stage" in value &&
    typeof value.stage === "string"
  );
}

export function isCommandPlugin(value: unknown): value is CommandPlugin {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "command" &&
    "area" in value &&
    typeof value.area === "string" &&
    "event" in value &&
    typeof value.event === "string" &&
    "displayName" in value &&
    typeof value.displayName === "string"
  );
}
