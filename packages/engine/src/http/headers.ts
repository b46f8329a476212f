export type HeaderInit =
  | HeaderMap
  | Iterable<readonly [string, string]>
  | Record<string, string>;

interface HeaderEntry {
  name: string;
  value: string;
}

/**
 * Case-insensitive header mapping that remembers insertion order and the
 * spelling each name was last set with. Setting an existing name replaces
 * its value in place, so the last occurrence wins without reordering.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly entries = new Map<string, HeaderEntry>();

  constructor(init?: HeaderInit) {
    if (!init) return;
    if (isIterable(init)) {
      for (const [name, value] of init) {
        this.set(name, value);
      }
      return;
    }
    for (const [name, value] of Object.entries(init)) {
      this.set(name, value);
    }
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entries.get(key);
    if (existing) {
      existing.name = name;
      existing.value = value;
    } else {
      this.entries.set(key, { name, value });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  /** Comma-separated tokens of a list-valued header, lowercased. */
  tokens(name: string): string[] {
    const value = this.get(name);
    if (!value) return [];
    return value
      .split(",")
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0);
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const { name, value } of this.entries.values()) {
      yield [name, value];
    }
  }
}

function isIterable(
  init: HeaderInit,
): init is HeaderMap | Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}
