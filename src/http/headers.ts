/**
 * A header field as it appeared on the wire. Both parts are views into the
 * connection buffer; nothing is copied until a value is read as a string.
 */
export interface HeaderField {
  readonly name: Buffer;
  readonly value: Buffer;
}

const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const CASE_BIT = 0x20;

function lowerAscii(byte: number): number {
  return byte >= UPPER_A && byte <= UPPER_Z ? byte | CASE_BIT : byte;
}

/** `lowerName` must already be lowercase ASCII. */
function nameMatches(name: Buffer, lowerName: string): boolean {
  if (name.length !== lowerName.length) return false;
  for (let i = 0; i < name.length; i += 1) {
    if (lowerAscii(name[i]) !== lowerName.charCodeAt(i)) return false;
  }
  return true;
}

function splitTokens(value: string): string[] {
  return value
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.length > 0);
}

/**
 * Case-insensitive, order-preserving, multi-value header view.
 */
export class HeaderList implements Iterable<[string, string]> {
  private readonly fields: readonly HeaderField[];

  constructor(fields: readonly HeaderField[] = []) {
    this.fields = fields;
  }

  get size(): number {
    return this.fields.length;
  }

  has(name: string): boolean {
    const lower = name.toLowerCase();
    return this.fields.some((field) => nameMatches(field.name, lower));
  }

  count(name: string): number {
    const lower = name.toLowerCase();
    let total = 0;
    for (const field of this.fields) {
      if (nameMatches(field.name, lower)) total += 1;
    }
    return total;
  }

  /** First value for `name`, without copying. */
  raw(name: string): Buffer | undefined {
    const lower = name.toLowerCase();
    return this.fields.find((field) => nameMatches(field.name, lower))?.value;
  }

  get(name: string): string | undefined {
    return this.raw(name)?.toString('latin1');
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.fields
      .filter((field) => nameMatches(field.name, lower))
      .map((field) => field.value.toString('latin1'));
  }

  /** Comma-separated tokens across every `name` field, lowercased. */
  tokens(name: string): string[] {
    return this.getAll(name).flatMap(splitTokens);
  }

  hasToken(name: string, token: string): boolean {
    return this.tokens(name).includes(token.toLowerCase());
  }

  *entries(): IterableIterator<[string, string]> {
    for (const field of this.fields) {
      yield [field.name.toString('latin1'), field.value.toString('latin1')];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  toJSON(): Record<string, string | string[]> {
    const result: Record<string, string | string[]> = {};
    for (const [name, value] of this.entries()) {
      const key = name.toLowerCase();
      const existing = result[key];
      if (existing === undefined) result[key] = value;
      else if (Array.isArray(existing)) existing.push(value);
      else result[key] = [existing, value];
    }
    return result;
  }
}
