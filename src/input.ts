import { utf8Length } from "./chars.js";
import { Marker, SourceError, marker, span } from "./types.js";

const COMPACT_THRESHOLD = 1024;

/**
 * Code-point lookahead over a character source. Strings and arbitrary
 * character iterables are read through the same buffer, so the scanner never
 * needs the whole input in memory.
 */
export class Input {
  private iterator: Iterator<string>;
  private buffer: string[] = [];
  private head = 0;
  private exhausted = false;

  private index = 0;
  private line = 1;
  private col = 0;

  constructor(source: Iterable<string>) {
    this.iterator = codePoints(source)[Symbol.iterator]();
  }

  get mark(): Marker {
    return marker(this.index, this.line, this.col);
  }

  /** Character `offset` positions ahead, or "" past the end */
  peek(offset = 0): string {
    this.fill(offset + 1);
    return this.buffer[this.head + offset] ?? "";
  }

  /** Skip a byte order mark; it occupies bytes but no column */
  skipBom(): void {
    if (this.peek() === "\uFEFF") {
      this.head++;
      this.index += 3;
    }
  }

  get atEnd(): boolean {
    return this.peek() === "";
  }

  /** Consume one character that is not a line break */
  skip(): string {
    const ch = this.peek();
    if (ch === "") return ch;
    this.head++;
    this.index += utf8Length(ch);
    this.col++;
    this.compact();
    return ch;
  }

  skipN(count: number): void {
    for (let i = 0; i < count; i++) this.skip();
  }

  /** Consume `\r\n`, `\r` or `\n` as a single line break */
  skipLineBreak(): void {
    const ch = this.peek();
    if (ch === "\r" && this.peek(1) === "\n") {
      this.head += 2;
      this.index += 2;
    } else if (ch === "\r" || ch === "\n") {
      this.head++;
      this.index++;
    } else {
      return;
    }
    this.line++;
    this.col = 0;
    this.compact();
  }

  private fill(count: number): void {
    while (!this.exhausted && this.buffer.length - this.head < count) {
      let result: IteratorResult<string>;
      try {
        result = this.iterator.next();
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new SourceError(`failed to read input: ${reason}`, span(this.mark));
      }
      if (result.done) {
        this.exhausted = true;
      } else {
        this.buffer.push(result.value);
      }
    }
  }

  private compact(): void {
    if (this.head >= COMPACT_THRESHOLD) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }
}

/**
 * Split every chunk of `source` into single code points. A high surrogate
 * ending one chunk waits for the low surrogate starting the next.
 */
function* codePoints(source: Iterable<string>): Generator<string> {
  if (typeof source === "string") {
    yield* source;
    return;
  }
  let carry = "";
  for (const chunk of source) {
    let text = carry + chunk;
    carry = "";
    const last = text.charCodeAt(text.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
      carry = text.slice(-1);
      text = text.slice(0, -1);
    }
    yield* text;
  }
  if (carry !== "") yield carry;
}
