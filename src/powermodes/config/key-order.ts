/**
 * TOML Key Order
 *
 * The TOML parser hands back plain objects, and plain objects list
 * integer-like keys (`"2"`, `"10"`) before every other key. This scanner walks
 * source text the parser already accepted and records, per table, the keys in
 * the order they were first written.
 */

/** Table path (see `keyOrderPath`) to its keys in source order */
export type KeyOrder = ReadonlyMap<string, readonly string[]>;

export function keyOrderPath(segments: readonly string[]): string {
  return JSON.stringify(segments);
}

const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;
const SCALAR_END = new Set([',', ']', '}', '\n', '\r', '#']);

const ESCAPES: Record<string, string> = {
  b: '\b',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
  e: '\u001b',
  '"': '"',
  '\\': '\\',
};

class KeyOrderScanner {
  private pos = 0;
  private readonly order = new Map<string, string[]>();
  /** Element count of every array of tables seen so far */
  private readonly arrayTables = new Map<string, number>();

  constructor(private readonly text: string) {
    if (text.startsWith('\uFEFF')) {
      this.pos = 1;
    }
  }

  scan(): KeyOrder {
    let table: string[] = [];
    for (;;) {
      this.skipBlank(true);
      if (this.pos >= this.text.length) {
        return this.order;
      }
      const start = this.pos;
      if (this.text.startsWith('[[', this.pos)) {
        this.pos += 2;
        table = this.openTable(this.readKeyPath(), true);
        this.skipBlank(false);
        this.pos += 2;
      } else if (this.peek() === '[') {
        this.pos += 1;
        table = this.openTable(this.readKeyPath(), false);
        this.skipBlank(false);
        this.pos += 1;
      } else {
        this.readKeyValue(table);
      }
      if (this.pos === start) {
        this.pos += 1;
      }
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private note(table: readonly string[], key: string): void {
    const path = keyOrderPath(table);
    const keys = this.order.get(path);
    if (!keys) {
      this.order.set(path, [key]);
    } else if (!keys.includes(key)) {
      keys.push(key);
    }
  }

  /** Records the header's keys and returns the concrete path of the table it opens. */
  private openTable(keys: readonly string[], arrayOfTables: boolean): string[] {
    const segments: string[] = [];
    keys.forEach((key, index) => {
      this.note(segments, key);
      segments.push(key);
      const path = keyOrderPath(segments);
      if (index === keys.length - 1 && arrayOfTables) {
        const count = (this.arrayTables.get(path) ?? 0) + 1;
        this.arrayTables.set(path, count);
        segments.push(String(count - 1));
        return;
      }
      const count = index < keys.length - 1 ? this.arrayTables.get(path) : undefined;
      if (count !== undefined) {
        segments.push(String(count - 1));
      }
    });
    return segments;
  }

  private noteDotted(table: readonly string[], keys: readonly string[]): string[] {
    const segments = [...table];
    for (const key of keys) {
      this.note(segments, key);
      segments.push(key);
    }
    return segments;
  }

  private readKeyValue(table: readonly string[]): void {
    const target = this.noteDotted(table, this.readKeyPath());
    this.skipBlank(false);
    if (this.peek() === '=') {
      this.pos += 1;
    }
    this.skipBlank(false);
    this.skipValue(target);
  }

  private readKeyPath(): string[] {
    const keys: string[] = [];
    for (;;) {
      this.skipBlank(false);
      keys.push(this.readKey());
      this.skipBlank(false);
      if (this.peek() !== '.') {
        return keys;
      }
      this.pos += 1;
    }
  }

  private readKey(): string {
    const char = this.peek();
    if (char === '"') {
      return this.readBasicString();
    }
    if (char === "'") {
      return this.readLiteralString();
    }
    const start = this.pos;
    while (this.pos < this.text.length && BARE_KEY_CHAR.test(this.text.charAt(this.pos))) {
      this.pos += 1;
    }
    return this.text.slice(start, this.pos);
  }

  private readBasicString(): string {
    let out = '';
    this.pos += 1;
    while (this.pos < this.text.length) {
      const char = this.text.charAt(this.pos);
      if (char === '"') {
        this.pos += 1;
        return out;
      }
      if (char !== '\\') {
        out += char;
        this.pos += 1;
        continue;
      }
      const escape = this.text.charAt(this.pos + 1);
      this.pos += 2;
      if (escape === 'u' || escape === 'U') {
        const length = escape === 'u' ? 4 : 8;
        out += String.fromCodePoint(Number.parseInt(this.text.slice(this.pos, this.pos + length), 16));
        this.pos += length;
      } else {
        out += ESCAPES[escape] ?? escape;
      }
    }
    return out;
  }

  private readLiteralString(): string {
    const start = this.pos + 1;
    const end = this.text.indexOf("'", start);
    const stop = end === -1 ? this.text.length : end;
    this.pos = stop + 1;
    return this.text.slice(start, stop);
  }

  private skipMultilineString(delimiter: '"""' | "'''"): void {
    this.pos += 3;
    while (this.pos < this.text.length) {
      if (delimiter === '"""' && this.peek() === '\\') {
        this.pos += 2;
        continue;
      }
      if (this.text.startsWith(delimiter, this.pos)) {
        this.pos += 3;
        // up to two quotes may sit right before the closing delimiter
        for (let extra = 0; extra < 2 && this.peek() === delimiter.charAt(0); extra += 1) {
          this.pos += 1;
        }
        return;
      }
      this.pos += 1;
    }
  }

  private skipValue(path: readonly string[]): void {
    if (this.text.startsWith('"""', this.pos)) {
      this.skipMultilineString('"""');
    } else if (this.text.startsWith("'''", this.pos)) {
      this.skipMultilineString("'''");
    } else if (this.peek() === '"') {
      this.readBasicString();
    } else if (this.peek() === "'") {
      this.readLiteralString();
    } else if (this.peek() === '[') {
      this.skipArray(path);
    } else if (this.peek() === '{') {
      this.skipInlineTable(path);
    } else {
      while (this.pos < this.text.length && !SCALAR_END.has(this.text.charAt(this.pos))) {
        this.pos += 1;
      }
    }
  }

  private skipArray(path: readonly string[]): void {
    this.pos += 1;
    for (let index = 0; this.pos < this.text.length; index += 1) {
      this.skipBlank(true);
      if (this.peek() === ']') {
        this.pos += 1;
        return;
      }
      const start = this.pos;
      this.skipValue([...path, String(index)]);
      this.skipBlank(true);
      if (this.peek() === ',') {
        this.pos += 1;
      } else if (this.pos === start) {
        this.pos += 1;
      }
    }
  }

  private skipInlineTable(path: readonly string[]): void {
    this.pos += 1;
    while (this.pos < this.text.length) {
      this.skipBlank(true);
      if (this.peek() === '}') {
        this.pos += 1;
        return;
      }
      const start = this.pos;
      this.readKeyValue(path);
      this.skipBlank(true);
      if (this.peek() === ',') {
        this.pos += 1;
      } else if (this.pos === start) {
        this.pos += 1;
      }
    }
  }

  private skipBlank(newlines: boolean): void {
    while (this.pos < this.text.length) {
      const char = this.text.charAt(this.pos);
      if (char === ' ' || char === '\t' || (newlines && (char === '\n' || char === '\r'))) {
        this.pos += 1;
      } else if (char === '#') {
        const end = this.text.indexOf('\n', this.pos);
        this.pos = end === -1 ? this.text.length : end;
      } else {
        return;
      }
    }
  }
}

/**
 * Key order of every table in `text`, which must already have parsed as TOML.
 * Array elements are addressed by their index, so `[[laptop.command]]` tables
 * live under `["laptop","command","0"]`, `["laptop","command","1"]`, ...
 */
export function scanKeyOrder(text: string): KeyOrder {
  return new KeyOrderScanner(text).scan();
}
