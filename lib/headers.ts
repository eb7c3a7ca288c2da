import type { RawHeaders } from './types/Channel';

/**
 * Header collections
 *
 * `Headers` is the mutable collection used on responses. Names are case-insensitive
 * and `_` is accepted in place of `-`. `FrozenHeaders` is the read-only view built
 * from the raw pairs a request arrives with.
 *
 * @module headers
 */

export type HeadersInit = Record<string, string> | Array<[string, string]> | Headers;

const encoder = new TextEncoder();
const decoder = new TextDecoder('latin1');

function normalizeName(name: string): string {
  return name.replace(/_/g, '-').toLowerCase();
}

export class Headers {

  protected readonly fields = new Map<string, string>();

  public constructor(init?: HeadersInit) {
    if (!init) {
      return;
    }

    const entries = init instanceof Headers ? init.entries() : Array.isArray(init) ? init : Object.entries(init);

    for (const [name, value] of entries) {
      this.append(name, value);
    }
  }

  public get(name: string): string | undefined {
    return this.fields.get(normalizeName(name));
  }

  public has(name: string): boolean {
    return this.fields.has(normalizeName(name));
  }

  /**
   * Sets a field, replacing any previous value
   */
  public set(name: string, value: string): this {
    this.fields.set(normalizeName(name), value);
    return this;
  }

  /**
   * Appends to a field; an existing value is kept and joined with the separator
   *
   * @example
   * ```typescript
   * headers.set('content-type', 'text/plain');
   * headers.append('content-type', 'charset=utf-8', '; ');
   * headers.get('content-type'); // 'text/plain; charset=utf-8'
   * ```
   */
  public append(name: string, value: string, separator = ', '): this {
    const key = normalizeName(name);
    const existing = this.fields.get(key);

    this.fields.set(key, existing === undefined ? value : `${existing}${separator}${value}`);
    return this;
  }

  public delete(name: string): boolean {
    return this.fields.delete(normalizeName(name));
  }

  public entries(): Array<[string, string]> {
    return Array.from(this.fields.entries());
  }

  public get size(): number {
    return this.fields.size;
  }

  /**
   * Encodes the collection as wire header pairs
   */
  public raw(): RawHeaders {
    return this.entries().map(([name, value]) => [encoder.encode(name), encoder.encode(value)]);
  }

  public toJSON(): Record<string, string> {
    return Object.fromEntries(this.fields);
  }

}

export class FrozenHeaders extends Headers {

  private frozen = false;

  public constructor(init?: HeadersInit) {
    super(init);
    this.frozen = true;
  }

  /**
   * Builds the read-only view from wire header pairs; repeated names are comma-joined
   */
  public static fromRaw(raw: RawHeaders): FrozenHeaders {
    return new FrozenHeaders(raw.map<[string, string]>(([name, value]) => [decoder.decode(name), decoder.decode(value)]));
  }

  public override set(name: string, value: string): this {
    this.assertMutable();
    return super.set(name, value);
  }

  public override append(name: string, value: string, separator?: string): this {
    this.assertMutable();
    return super.append(name, value, separator);
  }

  public override delete(name: string): boolean {
    this.assertMutable();
    return super.delete(name);
  }

  /**
   * Returns a mutable copy
   */
  public mutableCopy(): Headers {
    return new Headers(this.entries());
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new TypeError('FrozenHeaders cannot be modified');
    }
  }

}
