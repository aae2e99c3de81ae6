/**
 * Ordered, case-insensitive, multi-valued header map
 *
 * Fields are kept as (name, value) pairs in document order with their
 * original casing; a lower-case index maps each name to its positions.
 *
 * @packageDocumentation
 */

import type { ReadonlyMimeHeader } from '../types/part.js';

export class MimeHeader implements ReadonlyMimeHeader {
  private fields: Array<[string, string]> = [];
  private index = new Map<string, number[]>();
  private frozen = false;

  constructor(fields?: Iterable<[string, string]>) {
    if (fields) {
      for (const [name, value] of fields) {
        this.add(name, value);
      }
    }
  }

  get size(): number {
    return this.fields.length;
  }

  /**
   * Appends a field, keeping any existing fields of the same name
   */
  add(name: string, value: string): void {
    this.assertWritable();
    const key = name.toLowerCase();
    const positions = this.index.get(key);
    if (positions) {
      positions.push(this.fields.length);
    } else {
      this.index.set(key, [this.fields.length]);
    }
    this.fields.push([name, value]);
  }

  get(name: string): string | undefined {
    const positions = this.index.get(name.toLowerCase());
    return positions ? this.fields[positions[0]][1] : undefined;
  }

  values(name: string): string[] {
    const positions = this.index.get(name.toLowerCase()) ?? [];
    return positions.map(i => this.fields[i][1]);
  }

  has(name: string): boolean {
    return this.index.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.index.values()].map(positions => this.fields[positions[0]][0]);
  }

  *entries(): IterableIterator<[string, string]> {
    for (const [name, value] of this.fields) {
      yield [name, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /**
   * Rejects further writes; called once the parse that built this header completes
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new TypeError('Cannot modify a frozen MimeHeader');
    }
  }
}
