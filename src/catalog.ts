import { v5 as uuidv5 } from "uuid";
import type { PluginCatalog } from "./registry";
import type { PluginFactory } from "./resolver";
import type { CommandPlugin, TaskPlugin } from "./types";

const PLUGIN_MODULE = "pipeline-plugins";

export function taskId(name: string): string {
  // The hard-coded namespace UUID here must never be changed.
  //
  // Task ids are v5 UUIDs of the task name so that every version of a task
  // registers under the same, stable id.
  return uuidv5(name, "0c7a3bb5-6f0e-4b8f-9d2a-3a1f6a2c41de");
}

function task(name: string, stage: string): PluginFactory {
  return (context): TaskPlugin => {
    context.locate(PLUGIN_MODULE);
    return { kind: "task", id: taskId(name), stage };
  };
}

function command(
  area: string,
  event: string,
  displayName: string,
): PluginFactory {
  return (context): CommandPlugin => {
    context.locate(PLUGIN_MODULE);
    return { kind: "command", area, event, displayName };
  };
}

const DOWNLOAD = "download-pipeline-artifact";
const PUBLISH = "publish-pipeline-artifact";

function ref(name: string): string {
  return `${PLUGIN_MODULE}:${name}`;
}

const TASKS: Array<[string, PluginFactory]> = [
  [ref("repository/checkout"), task("checkout", "main")],
  [ref("repository/cleanup"), task("checkout", "post")],
  [ref("artifact/download"), task(DOWNLOAD, "main")],
  [ref("artifact/download@1"), task(DOWNLOAD, "main")],
  [ref("artifact/download@1.1.0"), task(DOWNLOAD, "main")],
  [ref("artifact/download@1.1.1"), task(DOWNLOAD, "main")],
  [ref("artifact/download@1.1.2"), task(DOWNLOAD, "main")],
  [ref("artifact/download@1.1.3"), task(DOWNLOAD, "main")],
  [ref("artifact/download@2.0.0"), task(DOWNLOAD, "main")],
  [ref("artifact/publish"), task(PUBLISH, "main")],
  [ref("artifact/publish@1"), task(PUBLISH, "main")],
  [ref("artifact/publish@0.140.0"), task(PUBLISH, "main")],
  [ref("cache/restore"), task("pipeline-cache", "main")],
  [ref("cache/save"), task("pipeline-cache", "post")],
];

const COMMANDS: Array<[string, PluginFactory]> = [
  [
    ref("build/upload-log"),
    command("build", "uploadlog", "Upload build log"),
  ],
  [
    ref("artifact/associate"),
    command("artifact", "associate", "Associate artifact"),
  ],
];

export const BUILTIN_FACTORIES: ReadonlyMap<string, PluginFactory> = new Map([
  ...TASKS,
  ...COMMANDS,
]);

export const BUILTIN_CATALOG: PluginCatalog = {
  tasks: TASKS.map(([typeReference]) => typeReference),
  commands: COMMANDS.map(([typeReference]) => typeReference),
};
