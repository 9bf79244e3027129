export interface VariableValue {
  value: string;
  isSecret: boolean;
}

export type VariableMap = Record<string, VariableValue>;

/**
 * Job-scoped variables. Names compare case-insensitively but keep the
 * spelling they were first set with.
 */
export class Variables {
  private values = new Map<string, { name: string; variable: VariableValue }>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.set(name, value);
    }
  }

  get size(): number {
    return this.values.size;
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.variable.value;
  }

  set(name: string, value: string, { isSecret = false } = {}): void {
    const key = name.toLowerCase();
    const existing = this.values.get(key);
    const wasSecret = existing?.variable.isSecret ?? false;
    this.values.set(key, {
      name: existing?.name ?? name,
      variable: { value, isSecret: isSecret || wasSecret },
    });
  }

  /** A detached copy; later changes to this instance do not show through. */
  snapshot(): VariableMap {
    const copy: VariableMap = {};
    for (const { name, variable } of this.values.values()) {
      copy[name] = { ...variable };
    }
    return copy;
  }
}
