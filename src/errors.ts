/** The requested task or command plugin has no registry entry. */
export class UnsupportedPluginError extends Error {
  readonly name = "UnsupportedPluginError";

  constructor(readonly subject: string) {
    super(`unsupported plugin: ${subject}`);
  }
}

/**
 * A plugin could not be resolved or described itself incompletely at startup.
 */
export class RegistrationError extends Error {
  readonly name = "RegistrationError";

  constructor(
    readonly typeReference: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`cannot register plugin '${typeReference}': ${message}`, options);
  }
}

/** The helper executable or the directory it has to run in is missing. */
export class HelperMissingError extends Error {
  readonly name = "HelperMissingError";

  constructor(
    readonly path: string,
    readonly what: "helper executable" | "working directory",
  ) {
    super(`${what} not found: ${path}`);
  }
}

export class ProcessExitCodeError extends Error {
  readonly name = "ProcessExitCodeError";

  constructor(
    readonly exitCode: number,
    readonly fileName: string,
    readonly args: readonly string[],
    readonly stderr: string = "",
  ) {
    super(
      `exit code ${exitCode} returned from process: ` +
        `file name '${fileName}', arguments '${formatArguments(args)}'` +
        (stderr ? `\n${stderr}` : ""),
    );
  }
}

/**
 * A command plugin exited cleanly but reported errors on standard error.
 */
export class LogicalFailureError extends Error {
  readonly name = "LogicalFailureError";

  constructor(readonly stderr: string) {
    super(stderr);
  }
}

export class InvocationCancelledError extends Error {
  readonly name = "InvocationCancelledError";

  constructor(readonly typeReference: string) {
    super(`plugin invocation canceled: ${typeReference}`);
  }
}

/** Renders arguments the way they would be typed: `task "<reference>"`. */
export function formatArguments(args: readonly string[]): string {
  return args.map((arg, i) => (i === 0 ? arg : `"${arg}"`)).join(" ");
}
