import path from "node:path";
import { describe, expect, test } from "vitest";
import { RegistrationError } from "./errors";
import { type ResolutionContext, TypeResolver } from "./resolver";

describe("TypeResolver.resolve", () => {
  test("instantiates the plugin registered for a type reference", () => {
    const located: string[] = [];
    const resolver = new TypeResolver(
      new Map([
        [
          "plugins:checkout",
          (context: ResolutionContext) => {
            located.push(context.locate("plugins"));
            return { kind: "task", id: "task-id", stage: "main" };
          },
        ],
      ]),
      "/opt/bin",
      () => true,
    );
    expect(resolver.resolve("plugins:checkout")).toEqual({
      kind: "task",
      id: "task-id",
      stage: "main",
    });
    expect(located).toEqual([path.join("/opt/bin", "plugins.js")]);
  });

  test("searches required modules in the binary directory only", () => {
    const checked: string[] = [];
    const resolver = new TypeResolver(
      new Map([
        [
          "plugins:checkout",
          (context: ResolutionContext) => {
            context.locate("plugins");
            return { kind: "task", id: "task-id", stage: "main" };
          },
        ],
      ]),
      "/opt/bin",
      (file) => {
        checked.push(file);
        return false;
      },
    );
    let error: unknown;
    try {
      resolver.resolve("plugins:checkout");
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(RegistrationError);
    expect(error).toMatchObject({ typeReference: "plugins:checkout" });
    expect(checked).toEqual([path.join("/opt/bin", "plugins.js")]);
  });

  test("rejects an unknown type reference", () => {
    const resolver = new TypeResolver(new Map(), "/opt/bin");
    expect(() => resolver.resolve("plugins:unknown")).toThrow(
      "cannot register plugin 'plugins:unknown': unknown type reference",
    );
  });

  test("rejects a factory result without plugin capabilities", () => {
    const resolver = new TypeResolver(
      new Map([["plugins:broken", () => null]]),
      "/opt/bin",
    );
    expect(() => resolver.resolve("plugins:broken")).toThrow(
      "cannot register plugin 'plugins:broken': not a task or command plugin",
    );
  });

  test("closes the resolution context once resolve returns", () => {
    const contexts: ResolutionContext[] = [];
    const resolver = new TypeResolver(
      new Map([
        [
          "plugins:checkout",
          (context: ResolutionContext) => {
            contexts.push(context);
            return { kind: "task", id: "task-id", stage: "main" };
          },
        ],
      ]),
      "/opt/bin",
      () => true,
    );
    resolver.resolve("plugins:checkout");
    expect(() => contexts[0].locate("plugins")).toThrow(
      "resolution context closed, cannot locate 'plugins'",
    );
  });
});
