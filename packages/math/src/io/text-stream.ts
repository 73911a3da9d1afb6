/**
 * Text streams with a cursor and eof/fail state flags
 *
 * An input stream that fails stays failed: every later read returns 0 and
 * consumes nothing until `clear()` is called.
 */

import { parseableBigInt } from "@quotient/std";
import { INT_TRAITS, type IntKind } from "../types/int-kind.js";

const WHITESPACE = /\s/;

export class TextInputStream {
  readonly source: string;
  private pos: number = 0;
  private eofBit: boolean = false;
  private failBit: boolean = false;

  constructor(source: string) {
    this.source = source;
  }

  get position(): number {
    return this.pos;
  }

  /** End of input was reached by a read. */
  get eof(): boolean {
    return this.eofBit;
  }

  /** A read failed. */
  get fail(): boolean {
    return this.failBit;
  }

  get good(): boolean {
    return !this.eofBit && !this.failBit;
  }

  atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  peek(): string | null {
    return this.source[this.pos] ?? null;
  }

  /**
   * Read a signed decimal integer of the given kind, after skipping
   * whitespace.
   *
   * - no digits: sets fail, returns 0n
   * - out of range for the kind: sets fail, returns the kind's min or max
   * - the token ends the input: sets eof
   */
  readInteger(kind: IntKind): bigint {
    if (!this.good) {
      this.failBit = true;
      return 0n;
    }

    while (!this.atEnd() && WHITESPACE.test(this.source[this.pos])) {
      this.pos++;
    }
    if (this.atEnd()) {
      this.eofBit = true;
      this.failBit = true;
      return 0n;
    }

    const parsed = parseableBigInt.parse(this.remaining());
    if (!parsed.ok) {
      this.failBit = true;
      return 0n;
    }

    this.pos = this.source.length - parsed.rest.length;
    if (this.atEnd()) {
      this.eofBit = true;
    }

    const value = parsed.value;
    const { min, max } = INT_TRAITS[kind];
    if (value < min || value > max) {
      this.failBit = true;
      return value < min ? min : max;
    }
    return value;
  }

  /**
   * Skip up to `count` characters, whatever they are. Running out of input
   * sets eof; skipping on a stream that is not good sets fail.
   */
  ignore(count: number = 1): this {
    if (!this.good) {
      this.failBit = true;
      return this;
    }
    const available = this.source.length - this.pos;
    if (count > available) {
      this.pos = this.source.length;
      this.eofBit = true;
    } else {
      this.pos += count;
    }
    return this;
  }

  /** Unread text. */
  remaining(): string {
    return this.source.slice(this.pos);
  }

  /** Put the stream in the failed state. */
  setFail(): void {
    this.failBit = true;
  }

  /** Reset the state flags; the cursor stays where it is. */
  clear(): void {
    this.eofBit = false;
    this.failBit = false;
  }
}

export class TextOutputStream {
  private chunks: string[] = [];

  write(...parts: (string | number | bigint)[]): this {
    for (const part of parts) {
      this.chunks.push(String(part));
    }
    return this;
  }

  toString(): string {
    return this.chunks.join("");
  }
}
