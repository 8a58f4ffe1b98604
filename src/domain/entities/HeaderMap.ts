/**
 * Header Multimap
 * Layer: Domain
 *
 * An ordered name → values[] map. Lookups are case-insensitive (keys are
 * stored lower-cased) while iteration yields the first spelling a name was
 * added with, so custom tags that dump every header print what the client
 * actually sent.
 */
export type HeaderInput = Record<string, string | number | readonly string[] | undefined>;

interface HeaderEntry {
  name: string;
  values: string[];
}

export class HeaderMap implements Iterable<[string, readonly string[]]> {
  private readonly entries = new Map<string, HeaderEntry>();

  static from(input: HeaderInput): HeaderMap {
    const map = new HeaderMap();
    for (const [name, value] of Object.entries(input)) {
      if (value === undefined) continue;
      if (typeof value === 'string' || typeof value === 'number') {
        map.append(name, String(value));
      } else {
        for (const item of value) map.append(name, item);
      }
    }
    return map;
  }

  append(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entries.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      this.entries.set(key, { name, values: [value] });
    }
    return this;
  }

  get(name: string): readonly string[] | undefined {
    return this.entries.get(name.toLowerCase())?.values;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  *[Symbol.iterator](): Iterator<[string, readonly string[]]> {
    for (const { name, values } of this.entries.values()) {
      yield [name, values];
    }
  }
}
