import type { VariableMap } from "./variables";

export interface TaskPlugin {
  kind: "task";
  id: string;
  stage: string;
}

export interface CommandPlugin {
  kind: "command";
  area: string;
  event: string;
  displayName: string;
}

export type PluginInstance = TaskPlugin | CommandPlugin;

export interface TaskPluginDescriptor {
  readonly id: string;
  readonly stage: string;
  readonly typeReference: string;
}

export interface CommandPluginDescriptor {
  readonly area: string;
  readonly event: string;
  readonly typeReference: string;
  readonly displayName: string;
}

export interface EndpointAuthorization {
  scheme: string;
  parameters: Record<string, string>;
}

export interface ServiceEndpoint {
  id: string;
  name: string;
  type: string;
  url: string;
  authorization: EndpointAuthorization | null;
  data: Record<string, string>;
}

export interface RepositoryResource {
  alias: string;
  type: string;
  url: string | null;
  version: string | null;
  properties: Record<string, string>;
}

/** The container (or host) the current step executes in. */
export interface ExecutionTarget {
  name: string;
  image: string | null;
  options: string | null;
}

/** Document written to the helper's standard input in `task` mode. */
export interface TaskPluginContext {
  inputs: Record<string, string>;
  repositories: RepositoryResource[];
  endpoints: ServiceEndpoint[];
  container: ExecutionTarget | null;
  jobSettings: Record<string, string>;
  variables: VariableMap;
  taskVariables: VariableMap;
}

/** Document written to the helper's standard input in `command` mode. */
export interface CommandPluginContext {
  data: string;
  properties: Record<string, string>;
  endpoints: ServiceEndpoint[];
  variables: VariableMap;
}

export type InvocationMode = "task" | "command";

export type OutputObserver = (line: string) => void;
