export const COMMAND_PREFIX = "##cmd[";

const ESCAPE_MAPPINGS: Array<[string, string]> = [
  [";", "%3B"],
  ["\r", "%0D"],
  ["\n", "%0A"],
  ["]", "%5D"],
];

export class Command {
  constructor(
    readonly area: string,
    readonly event: string,
    readonly data: string = "",
    readonly properties: Record<string, string> = {},
  ) {}

  toString(): string {
    const props = Object.entries(this.properties)
      .map(([key, value]) => `${key}=${escape(value)}`)
      .join(";");
    const header = `${this.area}.${this.event}${props ? ` ${props}` : ""}`;
    return `${COMMAND_PREFIX}${header}]${escape(this.data)}`;
  }
}

/**
 * Parses an embedded command marker, e.g.
 * `##cmd[build.uploadlog name=step%3B1]/tmp/log.txt`. Returns undefined
 * for anything that is not a well-formed marker.
 */
export function parseCommand(line: string): Command | undefined {
  const start = line.indexOf(COMMAND_PREFIX);
  if (start < 0) {
    return undefined;
  }
  const end = line.indexOf("]", start);
  if (end < 0) {
    return undefined;
  }

  const header = line.slice(start + COMMAND_PREFIX.length, end);
  const data = unescape(line.slice(end + 1));
  const space = header.indexOf(" ");
  const name = space < 0 ? header : header.slice(0, space);
  const dot = name.indexOf(".");
  if (dot <= 0 || dot === name.length - 1) {
    return undefined;
  }

  const properties: Record<string, string> = {};
  if (space >= 0) {
    for (const pair of header.slice(space + 1).split(";")) {
      const eq = pair.indexOf("=");
      if (eq <= 0) {
        continue;
      }
      properties[pair.slice(0, eq).trim()] = unescape(pair.slice(eq + 1));
    }
  }

  return new Command(
    name.slice(0, dot),
    name.slice(dot + 1),
    data,
    properties,
  );
}

function escape(value: string): string {
  let escaped = value.replaceAll("%", "%25");
  for (const [raw, encoded] of ESCAPE_MAPPINGS) {
    escaped = escaped.replaceAll(raw, encoded);
  }
  return escaped;
}

function unescape(value: string): string {
  let unescaped = value;
  for (const [raw, encoded] of ESCAPE_MAPPINGS) {
    unescaped = unescaped.replaceAll(encoded, raw);
  }
  return unescaped.replaceAll("%25", "%");
}
