import { describe, expect, test } from "vitest";
import { Command, parseCommand } from "./command";

describe("parseCommand", () => {
  test("parses area, event, properties and data", () => {
    const command = parseCommand(
      "##cmd[build.uploadlog name=step%3B1;kind=log]/tmp/log.txt",
    );
    expect(command).toBeInstanceOf(Command);
    expect(command).toMatchObject({
      area: "build",
      event: "uploadlog",
      data: "/tmp/log.txt",
      properties: { name: "step;1", kind: "log" },
    });
  });

  test("finds a marker after a prefix", () => {
    const command = parseCommand("12:00:01 ##cmd[artifact.associate]drop");
    expect(command).toMatchObject({
      area: "artifact",
      event: "associate",
      data: "drop",
      properties: {},
    });
  });

  test("unescapes line breaks and percent signs in data", () => {
    const command = parseCommand("##cmd[build.uploadlog]a%0Db%0Ac%25");
    expect(command?.data).toBe("a\rb\nc%");
  });

  const invalid = [
    "plain output",
    "##cmd[build]data",
    "##cmd[build.uploadlog data",
    "##cmd[.uploadlog]data",
    "##cmd[build.]data",
  ];

  for (const line of invalid) {
    test(`ignores '${line}'`, () => {
      expect(parseCommand(line)).toBeUndefined();
    });
  }
});

describe("Command.toString", () => {
  test("escapes property values and data", () => {
    const command = new Command("build", "uploadlog", "line1\nline2]", {
      name: "a;b",
    });
    expect(command.toString()).toBe(
      "##cmd[build.uploadlog name=a%3Bb]line1%0Aline2%5D",
    );
  });

  test("omits the property list when there are none", () => {
    expect(new Command("build", "uploadlog").toString()).toBe(
      "##cmd[build.uploadlog]",
    );
  });
});
