export type JsonScalar = null | number | boolean | string;
export type JsonValue = JsonScalar | JsonObject | JsonValue[];

/**
 * JSON object that keeps keys in insertion order, including integer-like keys
 * that a plain object would move to the front.
 */
export class JsonObject {
  private readonly fields = new Map<string, JsonValue>();

  get size(): number {
    return this.fields.size;
  }

  get(key: string): JsonValue | undefined {
    return this.fields.get(key);
  }

  set(key: string, value: JsonValue): this {
    this.fields.set(key, value);
    return this;
  }

  entries(): IterableIterator<[string, JsonValue]> {
    return this.fields.entries();
  }
}

export class KeyPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KeyPathError";
  }
}

/**
 * Assigns `value` at `path`, creating intermediate objects as needed. An
 * existing leaf is never turned into a container; the final segment is
 * overwritten.
 */
export function setNestedValue(root: JsonObject, path: string[], value: JsonValue): void {
  if (path.length === 0) {
    throw new KeyPathError("empty key path");
  }

  let current = root;
  for (let i = 0; i < path.length - 1; i++) {
    const segment = path[i];
    if (segment === "") {
      throw new KeyPathError("empty key segment");
    }
    const next = current.get(segment);
    if (next === undefined) {
      const child = new JsonObject();
      current.set(segment, child);
      current = child;
      continue;
    }
    if (!(next instanceof JsonObject)) {
      throw new KeyPathError(`${path.slice(0, i + 1).join(".")} is not an object`);
    }
    current = next;
  }

  const leaf = path[path.length - 1];
  if (leaf === "") {
    throw new KeyPathError("empty key segment");
  }
  current.set(leaf, value);
}

/** Same layout as `JSON.stringify(value, null, indent)`, in insertion order. */
export function stringifyJson(value: JsonValue, indent = 2): string {
  return render(value, " ".repeat(indent), "");
}

function render(value: JsonValue, unit: string, pad: string): string {
  if (value instanceof JsonObject) {
    if (value.size === 0) {
      return "{}";
    }
    const inner = pad + unit;
    const lines: string[] = [];
    for (const [key, child] of value.entries()) {
      lines.push(`${inner}${JSON.stringify(key)}: ${render(child, unit, inner)}`);
    }
    return `{\n${lines.join(",\n")}\n${pad}}`;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return "[]";
    }
    const inner = pad + unit;
    const lines = value.map((item) => `${inner}${render(item, unit, inner)}`);
    return `[\n${lines.join(",\n")}\n${pad}]`;
  }

  return JSON.stringify(value);
}
