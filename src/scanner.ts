import {
  isAlpha,
  isAnchorChar,
  isBlank,
  isBlankOrBreakZ,
  isBreak,
  isBreakZ,
  isDigit,
  isFlow,
  isHex,
  isTagChar,
  isUriChar,
} from "./chars.js";
import { Input } from "./input.js";
import {
  LexicalError,
  Marker,
  ScalarStyle,
  Span,
  YamlError,
  YamlSyntaxError,
  isYamlError,
  marker,
  span,
} from "./types.js";

export type IndicatorTokenType =
  | "stream-start"
  | "stream-end"
  | "document-start"
  | "document-end"
  | "reserved-directive"
  | "block-sequence-start"
  | "block-mapping-start"
  | "block-end"
  | "flow-sequence-start"
  | "flow-sequence-end"
  | "flow-mapping-start"
  | "flow-mapping-end"
  | "block-entry"
  | "flow-entry"
  | "key"
  | "value";

export type Token =
  | { type: IndicatorTokenType; span: Span }
  | { type: "version-directive"; major: number; minor: number; span: Span }
  | { type: "tag-directive"; handle: string; prefix: string; span: Span }
  | { type: "alias"; name: string; span: Span }
  | { type: "anchor"; name: string; span: Span }
  /** Raw tag as written; `handle` is resolved against `%TAG` by the parser */
  | { type: "tag"; handle: string; suffix: string; span: Span }
  | { type: "scalar"; style: ScalarStyle; text: string; span: Span };

export type TokenType = Token["type"];

export interface ScannerOptions {
  /** Deepest flow collection nesting accepted */
  maxFlowDepth: number;
}

interface SimpleKey {
  possible: boolean;
  /** Required keys sit at the indentation of a block mapping and must be followed by `:` */
  required: boolean;
  tokenNumber: number;
  mark: Marker;
}

interface IndentLevel {
  indent: number;
  /** False for the one-column levels pushed after `-`, `:` and flow starts */
  needsBlockEnd: boolean;
}

type ImplicitFlowMapping = "possible" | "inside";

type Chomping = "strip" | "clip" | "keep";

/** A possible simple key is forgotten once it is this many bytes behind */
const SIMPLE_KEY_LIMIT = 1024;

const ESCAPES: Record<string, string> = {
  "0": "\0",
  a: "\x07",
  b: "\b",
  t: "\t",
  "\t": "\t",
  n: "\n",
  v: "\v",
  f: "\f",
  r: "\r",
  e: "\x1b",
  " ": " ",
  '"': '"',
  "/": "/",
  "\\": "\\",
  N: "\u0085",
  _: "\u00A0",
  L: "\u2028",
  P: "\u2029",
};

const HEX_ESCAPES: Record<string, number> = { x: 2, u: 4, U: 8 };

/**
 * Turns characters into tokens. Tokens are produced lazily: the queue only
 * grows past the next token while that token could still become a simple key.
 */
export class Scanner {
  private input: Input;
  private tokens: Token[] = [];
  private error: YamlError | null = null;

  private streamStartProduced = false;
  private streamEndProduced = false;
  private tokenAvailable = false;
  private tokensParsed = 0;

  private indent = -1;
  private indents: IndentLevel[] = [];
  private flowLevel = 0;
  private simpleKeys: SimpleKey[] = [];
  private simpleKeyAllowed = false;
  /** Whether only whitespace has been seen since the start of the line */
  private leadingWhitespace = true;
  private adjacentValueAllowedAt = -1;
  private flowMappingStarted = false;
  private implicitFlowMappings: ImplicitFlowMapping[] = [];

  constructor(
    source: Iterable<string>,
    private options: ScannerOptions,
  ) {
    this.input = new Input(source);
  }

  get mark(): Marker {
    return this.input.mark;
  }

  /** Next token, or null once `stream-end` has been returned */
  nextToken(): Token | null {
    if (this.error) throw this.error;
    try {
      return this.produceToken();
    } catch (e) {
      if (isYamlError(e)) this.error = e;
      throw e;
    }
  }

  private produceToken(): Token | null {
    if (this.streamEndProduced) return null;
    if (!this.tokenAvailable) this.fetchMoreTokens();
    const token = this.tokens.shift();
    if (!token) throw new LexicalError("did not find expected next token", span(this.mark));
    this.tokenAvailable = false;
    this.tokensParsed++;
    if (token.type === "stream-end") this.streamEndProduced = true;
    return token;
  }

  private fetchMoreTokens(): void {
    for (;;) {
      let needMore = this.tokens.length === 0;
      if (!needMore) {
        this.staleSimpleKeys();
        needMore = this.simpleKeys.some((key) => key.possible && key.tokenNumber === this.tokensParsed);
      }
      if (!needMore) break;
      this.fetchNextToken();
    }
    this.tokenAvailable = true;
  }

  private fetchNextToken(): void {
    if (!this.streamStartProduced) {
      this.fetchStreamStart();
      return;
    }
    this.skipToNextToken();
    this.staleSimpleKeys();

    const mark = this.mark;
    const closedBlock = this.unrollIndent(mark.col, mark);

    if (this.input.atEnd) {
      this.fetchStreamEnd();
      return;
    }

    const ch = this.input.peek();
    if (mark.col === 0) {
      if (ch === "%") {
        this.fetchDirective();
        return;
      }
      if (this.nextIsDocumentIndicator("-")) {
        this.fetchDocumentIndicator("document-start");
        return;
      }
      if (this.nextIsDocumentIndicator(".")) {
        this.fetchDocumentIndicator("document-end");
        this.skipWsToEol(true);
        if (!isBreakZ(this.input.peek())) {
          throw new LexicalError("invalid content after document end marker", span(this.mark));
        }
        return;
      }
    }

    // Popping levels must land exactly on an enclosing level
    if (closedBlock && this.leadingWhitespace && mark.col > this.indent) {
      throw new LexicalError("inconsistent indentation", span(mark));
    }
    if (mark.col < this.indent) {
      throw new LexicalError("invalid indentation", span(mark));
    }

    const next = this.input.peek(1);
    switch (ch) {
      case "[":
        this.fetchFlowCollectionStart("flow-sequence-start");
        return;
      case "{":
        this.fetchFlowCollectionStart("flow-mapping-start");
        return;
      case "]":
        this.fetchFlowCollectionEnd("flow-sequence-end");
        return;
      case "}":
        this.fetchFlowCollectionEnd("flow-mapping-end");
        return;
      case ",":
        this.fetchFlowEntry();
        return;
      case "*":
        this.fetchAnchor("alias");
        return;
      case "&":
        this.fetchAnchor("anchor");
        return;
      case "!":
        this.fetchTag();
        return;
      case "'":
        this.fetchFlowScalar("single-quoted");
        return;
      case '"':
        this.fetchFlowScalar("double-quoted");
        return;
      case "%":
      case "@":
      case "`":
        throw new LexicalError(`unexpected character: \`${ch}'`, span(mark));
    }
    if (ch === "-" && isBlankOrBreakZ(next)) {
      this.fetchBlockEntry();
    } else if (ch === "?" && isBlankOrBreakZ(next)) {
      this.fetchKey();
    } else if (ch === ":" && isBlankOrBreakZ(next)) {
      this.fetchValue();
    } else if (
      ch === ":" &&
      this.flowLevel > 0 &&
      (isFlow(next) || mark.index === this.adjacentValueAllowedAt)
    ) {
      this.fetchFlowValue();
    } else if ((ch === "|" || ch === ">") && this.flowLevel === 0) {
      this.fetchBlockScalar(ch === "|" ? "literal" : "folded");
    } else {
      this.fetchPlainScalar();
    }
  }

  // Whitespace

  private skipBlank(): void {
    this.input.skip();
  }

  private skipNonBlank(): void {
    this.input.skip();
    this.leadingWhitespace = false;
  }

  private skipNonBlankN(count: number): void {
    this.input.skipN(count);
    this.leadingWhitespace = false;
  }

  private skipLineBreak(): void {
    this.input.skipLineBreak();
    this.leadingWhitespace = true;
  }

  private skipComment(): void {
    while (!isBreakZ(this.input.peek())) this.input.skip();
  }

  private skipToNextToken(): void {
    for (;;) {
      const ch = this.input.peek();
      if (ch === "\t" && this.indents.length > 0 && this.leadingWhitespace && this.mark.col < this.indent) {
        // A tab may only pad a line that holds nothing else
        const start = this.mark;
        this.skipWsToEol(true);
        if (!isBreakZ(this.input.peek())) {
          throw new LexicalError("tabs disallowed within this context (block indentation)", span(start));
        }
      } else if (isBlank(ch)) {
        this.skipBlank();
      } else if (isBreak(ch)) {
        this.skipLineBreak();
        if (this.flowLevel === 0) this.simpleKeyAllowed = true;
      } else if (ch === "#") {
        this.skipComment();
      } else {
        break;
      }
    }
  }

  /** Skip spaces (and tabs if asked) plus a trailing comment */
  private skipWsToEol(skipTabs: boolean): { foundTab: boolean; hasSpace: boolean } {
    let foundTab = false;
    let hasSpace = false;
    for (;;) {
      const ch = this.input.peek();
      if (ch === " ") {
        hasSpace = true;
        this.skipBlank();
      } else if (skipTabs && ch === "\t") {
        foundTab = true;
        this.skipBlank();
      } else {
        break;
      }
    }
    if (this.input.peek() === "#") {
      if (!foundTab && !hasSpace) {
        throw new LexicalError(
          "comments must be separated from other tokens by whitespace",
          span(this.mark),
        );
      }
      this.skipComment();
    }
    return { foundTab, hasSpace };
  }

  /** Whitespace after `?`: spaces, breaks and comments, but no tabs */
  private skipSeparation(): void {
    let needSpace = true;
    for (;;) {
      const ch = this.input.peek();
      if (ch === " ") {
        needSpace = false;
        this.skipBlank();
      } else if (isBreak(ch)) {
        needSpace = false;
        this.skipLineBreak();
        if (this.flowLevel === 0) this.simpleKeyAllowed = true;
      } else if (ch === "#") {
        this.skipComment();
      } else {
        break;
      }
    }
    if (this.input.peek() === "\t") {
      throw new LexicalError("tabs disallowed in this context", span(this.mark));
    }
    if (needSpace && !this.input.atEnd) {
      throw new LexicalError("expected whitespace", span(this.mark));
    }
  }

  private nextIsDocumentIndicator(ch: "-" | "."): boolean {
    const input = this.input;
    return (
      input.peek() === ch &&
      input.peek(1) === ch &&
      input.peek(2) === ch &&
      isBlankOrBreakZ(input.peek(3))
    );
  }

  // Indentation and simple keys

  private rollIndent(col: number, tokenNumber: number | undefined, type: IndicatorTokenType, mark: Marker): void {
    if (this.flowLevel > 0) return;

    if (this.indent <= col) {
      const last = this.indents[this.indents.length - 1];
      if (last && !last.needsBlockEnd) {
        this.indent = last.indent;
        this.indents.pop();
      }
    }

    if (this.indent < col) {
      this.indents.push({ indent: this.indent, needsBlockEnd: true });
      this.indent = col;
      const token: Token = { type, span: span(mark) };
      if (tokenNumber === undefined) {
        this.tokens.push(token);
      } else {
        this.insertToken(tokenNumber - this.tokensParsed, token);
      }
    }
  }

  /** Pop levels deeper than `col`; true if a block collection was closed */
  private unrollIndent(col: number, mark: Marker): boolean {
    if (this.flowLevel > 0) return false;
    let closed = false;
    while (this.indent > col) {
      const level = this.indents.pop();
      if (!level) break;
      this.indent = level.indent;
      if (level.needsBlockEnd) {
        this.tokens.push({ type: "block-end", span: span(mark) });
        closed = true;
      }
    }
    return closed;
  }

  private rollOneColIndent(): void {
    const last = this.indents[this.indents.length - 1];
    if (this.flowLevel === 0 && last && last.needsBlockEnd) {
      this.indents.push({ indent: this.indent, needsBlockEnd: false });
      this.indent++;
    }
  }

  private unrollNonBlockIndents(): void {
    for (;;) {
      const last = this.indents[this.indents.length - 1];
      if (!last || last.needsBlockEnd) return;
      this.indent = last.indent;
      this.indents.pop();
    }
  }

  private lastSimpleKey(): SimpleKey {
    const key = this.simpleKeys[this.simpleKeys.length - 1];
    if (!key) throw new LexicalError("simple key stack is empty", span(this.mark));
    return key;
  }

  private saveSimpleKey(): void {
    if (!this.simpleKeyAllowed) return;
    const mark = this.mark;
    const last = this.indents[this.indents.length - 1];
    const required = this.flowLevel === 0 && this.indent === mark.col && last !== undefined && last.needsBlockEnd;
    this.simpleKeys[this.simpleKeys.length - 1] = {
      possible: true,
      required,
      tokenNumber: this.tokensParsed + this.tokens.length,
      mark,
    };
  }

  private removeSimpleKey(): void {
    const key = this.lastSimpleKey();
    if (key.possible && key.required) {
      throw new LexicalError("simple key expected", span(this.mark));
    }
    key.possible = false;
  }

  private staleSimpleKeys(): void {
    const mark = this.mark;
    for (const key of this.simpleKeys) {
      if (
        key.possible &&
        this.flowLevel === 0 &&
        (key.mark.line < mark.line || key.mark.index + SIMPLE_KEY_LIMIT < mark.index)
      ) {
        if (key.required) throw new LexicalError("simple key expected ':'", span(mark));
        key.possible = false;
      }
    }
  }

  private insertToken(position: number, token: Token): void {
    this.tokens.splice(position, 0, token);
  }

  private increaseFlowLevel(): void {
    this.simpleKeys.push({ possible: false, required: false, tokenNumber: 0, mark: this.mark });
    this.flowLevel++;
    if (this.flowLevel > this.options.maxFlowDepth) {
      throw new YamlSyntaxError("recursion limit exceeded", span(this.mark));
    }
  }

  private decreaseFlowLevel(): void {
    if (this.flowLevel > 0) {
      this.flowLevel--;
      this.simpleKeys.pop();
    }
  }

  private endImplicitMapping(mark: Marker): void {
    const last = this.implicitFlowMappings.length - 1;
    if (last >= 0 && this.implicitFlowMappings[last] === "inside") {
      this.flowMappingStarted = false;
      this.implicitFlowMappings[last] = "possible";
      this.tokens.push({ type: "flow-mapping-end", span: span(mark) });
    }
  }

  // Structure

  private fetchStreamStart(): void {
    this.input.skipBom();
    const mark = this.mark;
    this.indent = -1;
    this.streamStartProduced = true;
    this.simpleKeyAllowed = true;
    this.tokens.push({ type: "stream-start", span: span(mark) });
    this.simpleKeys.push({ possible: false, required: false, tokenNumber: 0, mark });
  }

  private fetchStreamEnd(): void {
    let mark = this.mark;
    // The stream ends on a line of its own
    if (mark.col !== 0) mark = marker(mark.index, mark.line + 1, 0);
    for (const key of this.simpleKeys) {
      if (key.possible && key.required) throw new LexicalError("simple key expected", span(mark));
      key.possible = false;
    }
    this.unrollIndent(-1, mark);
    this.simpleKeyAllowed = false;
    this.tokens.push({ type: "stream-end", span: span(mark) });
  }

  private fetchDocumentIndicator(type: "document-start" | "document-end"): void {
    this.unrollIndent(-1, this.mark);
    this.removeSimpleKey();
    this.simpleKeyAllowed = false;
    const start = this.mark;
    this.skipNonBlankN(3);
    this.tokens.push({ type, span: span(start, this.mark) });
  }

  private fetchFlowCollectionStart(type: "flow-sequence-start" | "flow-mapping-start"): void {
    this.saveSimpleKey();
    this.rollOneColIndent();
    this.increaseFlowLevel();
    this.simpleKeyAllowed = true;

    const start = this.mark;
    this.skipNonBlank();
    const end = this.mark;

    if (type === "flow-mapping-start") {
      this.flowMappingStarted = true;
    } else {
      this.implicitFlowMappings.push("possible");
    }
    this.skipWsToEol(true);
    this.tokens.push({ type, span: span(start, end) });
  }

  private fetchFlowCollectionEnd(type: "flow-sequence-end" | "flow-mapping-end"): void {
    this.removeSimpleKey();
    this.decreaseFlowLevel();
    this.simpleKeyAllowed = false;

    if (type === "flow-sequence-end") {
      this.endImplicitMapping(this.mark);
      this.implicitFlowMappings.pop();
    }

    const start = this.mark;
    this.skipNonBlank();
    const end = this.mark;
    this.skipWsToEol(true);

    // `[a]: b` inside flow context
    if (this.flowLevel > 0) this.adjacentValueAllowedAt = this.mark.index;
    this.tokens.push({ type, span: span(start, end) });
  }

  private fetchFlowEntry(): void {
    this.removeSimpleKey();
    this.simpleKeyAllowed = true;
    this.endImplicitMapping(this.mark);

    const start = this.mark;
    this.skipNonBlank();
    const end = this.mark;
    this.skipWsToEol(true);
    this.tokens.push({ type: "flow-entry", span: span(start, end) });
  }

  private fetchBlockEntry(): void {
    const start = this.mark;
    if (this.flowLevel > 0) {
      throw new LexicalError("'-' is only valid inside a block", span(start));
    }
    if (!this.simpleKeyAllowed) {
      throw new LexicalError("block sequence entries are not allowed in this context", span(start));
    }

    // `&x\n- a` where the property sits at column 0 of an enclosing block
    const last = this.tokens[this.tokens.length - 1];
    if (
      last &&
      (last.type === "anchor" || last.type === "tag") &&
      start.col === 0 &&
      last.span.start.col === 0 &&
      this.indent > -1
    ) {
      throw new LexicalError("invalid indentation for anchor", last.span);
    }

    this.skipNonBlank();
    const end = this.mark;
    this.rollIndent(start.col, undefined, "block-sequence-start", start);

    const { foundTab } = this.skipWsToEol(true);
    const ch = this.input.peek();
    if (foundTab && ch === "-" && isBlankOrBreakZ(this.input.peek(1))) {
      throw new LexicalError("'-' must be followed by a valid YAML whitespace", span(this.mark));
    }
    if (isBreak(ch) || isFlow(ch)) this.rollOneColIndent();

    this.removeSimpleKey();
    this.simpleKeyAllowed = true;
    this.tokens.push({ type: "block-entry", span: span(start, end) });
  }

  private fetchKey(): void {
    const start = this.mark;
    if (this.flowLevel === 0) {
      if (!this.simpleKeyAllowed) {
        throw new LexicalError("mapping keys are not allowed in this context", span(start));
      }
      this.rollIndent(start.col, undefined, "block-mapping-start", start);
    } else {
      this.flowMappingStarted = true;
    }

    this.removeSimpleKey();
    this.simpleKeyAllowed = this.flowLevel === 0;

    this.skipNonBlank();
    const end = this.mark;
    this.skipSeparation();
    this.tokens.push({ type: "key", span: span(start, end) });
  }

  private fetchFlowValue(): void {
    const next = this.input.peek(1);
    if (this.mark.index !== this.adjacentValueAllowedAt && (next === "[" || next === "{")) {
      throw new LexicalError("':' may not precede any of `[{` in flow mapping", span(this.mark));
    }
    this.fetchValue();
  }

  private fetchValue(): void {
    const key = this.lastSimpleKey();
    const start = this.mark;
    const implicitFlowMapping = this.implicitFlowMappings.length > 0 && !this.flowMappingStarted;
    if (implicitFlowMapping) {
      this.implicitFlowMappings[this.implicitFlowMappings.length - 1] = "inside";
    }

    this.skipNonBlank();
    const end = this.mark;
    if (this.input.peek() === "\t") {
      const { hasSpace } = this.skipWsToEol(true);
      const ch = this.input.peek();
      if (!hasSpace && (ch === "-" || isAlpha(ch))) {
        throw new LexicalError("':' must be followed by a valid YAML whitespace", span(this.mark));
      }
    }

    if (key.possible) {
      const position = key.tokenNumber - this.tokensParsed;
      this.insertToken(position, { type: "key", span: span(key.mark) });
      if (implicitFlowMapping) {
        if (key.mark.line < start.line) {
          throw new LexicalError("illegal placement of ':' indicator", span(start));
        }
        this.insertToken(position, { type: "flow-mapping-start", span: span(key.mark) });
      }
      this.rollIndent(key.mark.col, key.tokenNumber, "block-mapping-start", key.mark);
      this.rollOneColIndent();
      key.possible = false;
      this.simpleKeyAllowed = false;
    } else {
      if (implicitFlowMapping) {
        this.tokens.push({ type: "flow-mapping-start", span: span(start) });
      }
      if (this.flowLevel === 0) {
        if (!this.simpleKeyAllowed) {
          throw new LexicalError("mapping values are not allowed in this context", span(start));
        }
        this.rollIndent(start.col, undefined, "block-mapping-start", start);
      }
      this.rollOneColIndent();
      this.simpleKeyAllowed = this.flowLevel === 0;
    }
    this.tokens.push({ type: "value", span: span(start, end) });
  }

  // Directives

  private fetchDirective(): void {
    this.unrollIndent(-1, this.mark);
    this.removeSimpleKey();
    this.simpleKeyAllowed = false;
    this.tokens.push(this.scanDirective());
  }

  private scanDirective(): Token {
    const start = this.mark;
    this.skipNonBlank();
    const name = this.scanDirectiveName(start);

    let token: Token;
    if (name === "YAML") {
      token = this.scanVersionDirectiveValue(start);
    } else if (name === "TAG") {
      token = this.scanTagDirectiveValue(start);
    } else {
      this.skipComment();
      token = { type: "reserved-directive", span: span(start, this.mark) };
    }

    this.skipWsToEol(true);
    if (!isBreakZ(this.input.peek())) {
      throw new LexicalError(
        "while scanning a directive, did not find expected comment or line break",
        span(start),
      );
    }
    this.skipLineBreak();
    return token;
  }

  private scanDirectiveName(start: Marker): string {
    let name = "";
    while (isAlpha(this.input.peek())) {
      name += this.input.peek();
      this.skipNonBlank();
    }
    if (name === "") {
      throw new LexicalError(
        "while scanning a directive, could not find expected directive name",
        span(start),
      );
    }
    if (!isBlankOrBreakZ(this.input.peek())) {
      throw new LexicalError(
        "while scanning a directive, found unexpected non-alphabetical character",
        span(start),
      );
    }
    return name;
  }

  private skipInlineBlanks(): void {
    while (isBlank(this.input.peek())) this.skipBlank();
  }

  private scanVersionDirectiveValue(start: Marker): Token {
    this.skipInlineBlanks();
    const major = this.scanVersionNumber(start);
    if (this.input.peek() !== ".") {
      throw new LexicalError(
        "while scanning a YAML directive, did not find expected digit or '.' character",
        span(start),
      );
    }
    this.skipNonBlank();
    const minor = this.scanVersionNumber(start);
    return { type: "version-directive", major, minor, span: span(start, this.mark) };
  }

  private scanVersionNumber(start: Marker): number {
    let digits = "";
    while (isDigit(this.input.peek())) {
      if (digits.length >= 9) {
        throw new LexicalError("while scanning a YAML directive, found extremely long version number", span(start));
      }
      digits += this.input.peek();
      this.skipNonBlank();
    }
    if (digits === "") {
      throw new LexicalError("while scanning a YAML directive, did not find expected version number", span(start));
    }
    return Number(digits);
  }

  private scanTagDirectiveValue(start: Marker): Token {
    this.skipInlineBlanks();
    const handle = this.scanTagHandle(true, start);
    this.skipInlineBlanks();
    const prefix = this.scanTagPrefix(start);
    if (!isBlankOrBreakZ(this.input.peek())) {
      throw new LexicalError(
        "while scanning TAG, did not find expected whitespace or line break",
        span(start),
      );
    }
    return { type: "tag-directive", handle, prefix, span: span(start, this.mark) };
  }

  private scanTagPrefix(start: Marker): string {
    let prefix = "";
    if (this.input.peek() === "!") {
      prefix += "!";
      this.skipNonBlank();
    } else if (!isTagChar(this.input.peek())) {
      throw new LexicalError("invalid global tag character", span(this.mark));
    }
    while (isUriChar(this.input.peek())) {
      if (this.input.peek() === "%") {
        prefix += this.scanUriEscapes(start);
      } else {
        prefix += this.input.peek();
        this.skipNonBlank();
      }
    }
    return prefix;
  }

  // Node properties

  private fetchAnchor(type: "alias" | "anchor"): void {
    this.saveSimpleKey();
    this.simpleKeyAllowed = false;

    const start = this.mark;
    this.skipNonBlank();
    let name = "";
    while (isAnchorChar(this.input.peek())) {
      name += this.input.peek();
      this.skipNonBlank();
    }
    if (name === "") {
      throw new LexicalError(
        "while scanning an anchor or alias, did not find expected alphabetic or numeric character",
        span(start),
      );
    }
    this.tokens.push({ type, name, span: span(start, this.mark) });
  }

  private fetchTag(): void {
    this.saveSimpleKey();
    this.simpleKeyAllowed = false;
    this.tokens.push(this.scanTag());
  }

  private scanTag(): Token {
    const start = this.mark;
    let handle = "";
    let suffix: string;

    if (this.input.peek(1) === "<") {
      suffix = this.scanVerbatimTag(start);
    } else {
      handle = this.scanTagHandle(false, start);
      if (handle.length >= 2 && handle.endsWith("!")) {
        // `!!suffix` or `!named!suffix`
        suffix = this.scanTagShorthandSuffix("", start);
      } else {
        // `!suffix`: what looked like a handle is the start of the suffix
        suffix = this.scanTagShorthandSuffix(handle, start);
        handle = "!";
        if (suffix === "") {
          handle = "";
          suffix = "!";
        }
      }
    }

    const ch = this.input.peek();
    if (isBlankOrBreakZ(ch) || (this.flowLevel > 0 && isFlow(ch))) {
      return { type: "tag", handle, suffix, span: span(start, this.mark) };
    }
    throw new LexicalError(
      "while scanning a tag, did not find expected whitespace or line break",
      span(start),
    );
  }

  private scanTagHandle(directive: boolean, start: Marker): string {
    if (this.input.peek() !== "!") {
      throw new LexicalError("while scanning a tag, did not find expected '!'", span(start));
    }
    let handle = "!";
    this.skipNonBlank();
    while (isAlpha(this.input.peek())) {
      handle += this.input.peek();
      this.skipNonBlank();
    }
    if (this.input.peek() === "!") {
      handle += "!";
      this.skipNonBlank();
    } else if (directive && handle !== "!") {
      // `%TAG !foo` without the closing `!`
      throw new LexicalError("while parsing a tag directive, did not find expected '!'", span(start));
    }
    return handle;
  }

  private scanTagShorthandSuffix(head: string, start: Marker): string {
    let length = head.length;
    let suffix = head.length > 1 ? head.slice(1) : "";
    while (isTagChar(this.input.peek())) {
      if (this.input.peek() === "%") {
        suffix += this.scanUriEscapes(start);
      } else {
        suffix += this.input.peek();
        this.skipNonBlank();
      }
      length++;
    }
    if (length === 0) {
      throw new LexicalError("while parsing a tag, did not find expected tag URI", span(start));
    }
    return suffix;
  }

  private scanVerbatimTag(start: Marker): string {
    this.skipNonBlankN(2);
    let uri = "";
    while (isUriChar(this.input.peek())) {
      if (this.input.peek() === "%") {
        uri += this.scanUriEscapes(start);
      } else {
        uri += this.input.peek();
        this.skipNonBlank();
      }
    }
    if (this.input.peek() !== ">") {
      throw new LexicalError("while scanning a verbatim tag, did not find the expected '>'", span(start));
    }
    if (uri === "") {
      throw new LexicalError("while parsing a tag, did not find expected tag URI", span(start));
    }
    this.skipNonBlank();
    return uri;
  }

  /** Decode a run of `%XX` escapes forming one UTF-8 character */
  private scanUriEscapes(start: Marker): string {
    const bytes: number[] = [];
    let width = 0;
    do {
      const hi = this.input.peek(1);
      const lo = this.input.peek(2);
      if (this.input.peek() !== "%" || !isHex(hi) || !isHex(lo)) {
        throw new LexicalError("while parsing a tag, found an invalid escape sequence", span(start));
      }
      const octet = parseInt(hi + lo, 16);
      if (width === 0) {
        width = utf8SequenceLength(octet);
        if (width === 0) {
          throw new LexicalError("while parsing a tag, found an incorrect leading UTF-8 octet", span(start));
        }
      } else if ((octet & 0xc0) !== 0x80) {
        throw new LexicalError("while parsing a tag, found an incorrect trailing UTF-8 octet", span(start));
      }
      bytes.push(octet);
      this.skipNonBlankN(3);
    } while (bytes.length < width);

    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(Uint8Array.from(bytes));
    } catch {
      throw new LexicalError("while parsing a tag, found an invalid UTF-8 codepoint", span(start));
    }
  }

  // Scalars

  private fetchBlockScalar(style: "literal" | "folded"): void {
    this.saveSimpleKey();
    this.simpleKeyAllowed = true;
    this.tokens.push(this.scanBlockScalar(style));
  }

  private scanBlockScalar(style: "literal" | "folded"): Token {
    const header = this.mark;
    this.skipNonBlank();
    this.unrollNonBlockIndents();
    const { chomping, increment } = this.scanBlockScalarIndicators();

    this.skipWsToEol(true);
    if (!isBreakZ(this.input.peek())) {
      throw new LexicalError(
        "while scanning a block scalar, did not find expected comment or line break",
        span(header),
      );
    }
    if (isBreak(this.input.peek())) this.skipLineBreak();
    if (this.input.peek() === "\t") {
      throw new LexicalError("a block scalar content cannot start with a tab", span(this.mark));
    }

    let indent: number;
    let trailingBreaks: string;
    if (increment > 0) {
      indent = this.indent >= 0 ? this.indent + increment : increment;
      trailingBreaks = this.skipBlockScalarIndent(indent);
    } else {
      ({ indent, breaks: trailingBreaks } = this.detectBlockScalarIndent());
    }

    const contentStart = this.mark;
    if (!this.input.atEnd && this.mark.col < indent && this.mark.col > this.indent) {
      throw new LexicalError("wrongly indented line in block scalar", span(this.mark));
    }

    let text = "";
    let leadingBreak = "";
    let leadingBlank = false;
    let unterminatedLastLine = false;

    while (this.mark.col === indent && !this.input.atEnd) {
      if (indent === 0 && (this.nextIsDocumentIndicator("-") || this.nextIsDocumentIndicator("."))) break;

      const trailingBlank = isBlank(this.input.peek());
      if (style === "folded" && leadingBreak !== "" && !leadingBlank && !trailingBlank) {
        text += trailingBreaks === "" ? " " : trailingBreaks;
      } else {
        text += leadingBreak + trailingBreaks;
      }
      leadingBreak = "";
      trailingBreaks = "";
      leadingBlank = isBlank(this.input.peek());

      while (!isBreakZ(this.input.peek())) text += this.input.skip();
      if (this.input.atEnd) {
        unterminatedLastLine = true;
        break;
      }
      this.skipLineBreak();
      leadingBreak = "\n";
      trailingBreaks = this.skipBlockScalarIndent(indent);
    }

    if (chomping !== "strip") text += unterminatedLastLine ? "\n" : leadingBreak;
    if (chomping === "keep") text += trailingBreaks;

    return { type: "scalar", style, text, span: span(contentStart, this.mark) };
  }

  /** Chomping and indentation indicators, in either order */
  private scanBlockScalarIndicators(): { chomping: Chomping; increment: number } {
    let chomping: Chomping = "clip";
    let increment = 0;
    for (let i = 0; i < 2; i++) {
      const ch = this.input.peek();
      if ((ch === "+" || ch === "-") && chomping === "clip") {
        chomping = ch === "+" ? "keep" : "strip";
        this.skipNonBlank();
      } else if (isDigit(ch) && increment === 0) {
        if (ch === "0") {
          throw new LexicalError(
            "while scanning a block scalar, found an indentation indicator equal to 0",
            span(this.mark),
          );
        }
        increment = Number(ch);
        this.skipNonBlank();
      }
    }
    return { chomping, increment };
  }

  /** Consume up to `indent` spaces of each line, collecting empty lines */
  private skipBlockScalarIndent(indent: number): string {
    let breaks = "";
    for (;;) {
      while (this.mark.col < indent && this.input.peek() === " ") this.skipBlank();
      if (!isBreak(this.input.peek())) return breaks;
      this.skipLineBreak();
      breaks += "\n";
    }
  }

  /** Auto-detect content indentation from the leading empty lines and the first content line */
  private detectBlockScalarIndent(): { indent: number; breaks: string } {
    let maxIndent = 0;
    let breaks = "";
    for (;;) {
      while (this.input.peek() === " ") this.skipBlank();
      if (this.mark.col > maxIndent) maxIndent = this.mark.col;
      if (!isBreak(this.input.peek())) break;
      this.skipLineBreak();
      breaks += "\n";
    }
    return { indent: Math.max(maxIndent, this.indent + 1), breaks };
  }

  private fetchFlowScalar(style: "single-quoted" | "double-quoted"): void {
    this.saveSimpleKey();
    this.simpleKeyAllowed = false;
    const token = this.scanFlowScalar(style);
    this.skipToNextToken();
    this.adjacentValueAllowedAt = this.mark.index;
    this.tokens.push(token);
  }

  private scanFlowScalar(style: "single-quoted" | "double-quoted"): Token {
    const single = style === "single-quoted";
    const quote = single ? "'" : '"';
    const start = this.mark;
    this.skipNonBlank();

    let text = "";
    let whitespaces = "";
    let leadingBreak = "";
    let trailingBreaks = "";
    let leadingBlanks = false;

    for (;;) {
      const mark = this.mark;
      if (mark.col === 0 && (this.nextIsDocumentIndicator("-") || this.nextIsDocumentIndicator("."))) {
        throw new LexicalError("while scanning a quoted scalar, found unexpected document indicator", span(start));
      }
      if (this.input.atEnd) {
        throw new LexicalError("while scanning a quoted scalar, found unexpected end of stream", span(start));
      }
      if (leadingBlanks && mark.col < this.indent) {
        throw new LexicalError("invalid indentation in quoted scalar", span(mark));
      }

      leadingBlanks = false;
      while (!isBlankOrBreakZ(this.input.peek())) {
        const ch = this.input.peek();
        const next = this.input.peek(1);
        if (single && ch === "'" && next === "'") {
          text += "'";
          this.skipNonBlankN(2);
        } else if (ch === quote) {
          break;
        } else if (!single && ch === "\\" && isBreak(next)) {
          this.skipNonBlank();
          this.skipLineBreak();
          leadingBlanks = true;
          break;
        } else if (!single && ch === "\\") {
          text += this.scanEscape();
        } else {
          text += ch;
          this.skipNonBlank();
        }
      }

      if (this.input.peek() === quote) break;

      while (isBlank(this.input.peek()) || isBreak(this.input.peek())) {
        const ch = this.input.peek();
        if (isBlank(ch)) {
          if (!leadingBlanks) {
            whitespaces += ch;
          } else if (ch === "\t" && this.mark.col < this.indent) {
            throw new LexicalError("tab cannot be used as indentation", span(this.mark));
          }
          this.skipBlank();
        } else if (leadingBlanks) {
          this.skipLineBreak();
          trailingBreaks += "\n";
        } else {
          whitespaces = "";
          this.skipLineBreak();
          leadingBreak = "\n";
          leadingBlanks = true;
        }
      }

      if (leadingBlanks) {
        if (leadingBreak === "") {
          // Escaped line break joins without a space
          text += trailingBreaks;
        } else {
          text += trailingBreaks === "" ? " " : trailingBreaks;
        }
        leadingBreak = "";
        trailingBreaks = "";
      } else {
        text += whitespaces;
        whitespaces = "";
      }
    }

    this.skipNonBlank();
    const end = this.mark;

    this.skipWsToEol(true);
    const next = this.input.peek();
    const fine =
      isBreakZ(next) ||
      (this.flowLevel > 0 && (next === "," || next === "]" || next === "}")) ||
      (next === ":" && (this.flowLevel > 0 || start.line === this.mark.line));
    if (!fine) {
      throw new LexicalError("invalid trailing content after quoted scalar", span(this.mark));
    }
    return { type: "scalar", style, text, span: span(start, end) };
  }

  private scanEscape(): string {
    const mark = this.mark;
    const code = this.input.peek(1);
    const simple = ESCAPES[code];
    if (simple !== undefined) {
      this.skipNonBlankN(2);
      return simple;
    }
    const length = HEX_ESCAPES[code];
    if (length === undefined) {
      throw new LexicalError("while parsing a quoted scalar, found unknown escape character", span(mark));
    }
    this.skipNonBlankN(2);

    let hex = "";
    for (let i = 0; i < length; i++) {
      const ch = this.input.peek(i);
      if (!isHex(ch)) {
        throw new LexicalError(
          "while parsing a quoted scalar, did not find expected hexadecimal number",
          span(this.mark),
        );
      }
      hex += ch;
    }
    const value = parseInt(hex, 16);
    if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) {
      throw new LexicalError("while parsing a quoted scalar, found invalid Unicode character escape code", span(mark));
    }
    this.skipNonBlankN(length);
    return String.fromCodePoint(value);
  }

  private fetchPlainScalar(): void {
    this.saveSimpleKey();
    this.simpleKeyAllowed = false;
    this.tokens.push(this.scanPlainScalar());
  }

  /** `:` and flow indicators end a plain scalar where they would start a token */
  private plainContinues(): boolean {
    const ch = this.input.peek();
    const next = this.input.peek(1);
    const inFlow = this.flowLevel > 0;
    if (ch === ":" && (isBlankOrBreakZ(next) || (inFlow && isFlow(next)))) return false;
    return !(inFlow && isFlow(ch));
  }

  private scanPlainScalar(): Token {
    this.unrollNonBlockIndents();
    const indent = this.indent + 1;
    const start = this.mark;

    if (this.flowLevel > 0 && start.col < indent) {
      throw new LexicalError("invalid indentation in flow construct", span(start));
    }

    let text = "";
    let whitespaces = "";
    let leadingBreak = "";
    let trailingBreaks = "";
    let end = start;

    for (;;) {
      const ch = this.input.peek();
      if (ch === "#") break;
      if (
        this.leadingWhitespace &&
        this.mark.col === 0 &&
        (this.nextIsDocumentIndicator("-") || this.nextIsDocumentIndicator("."))
      ) {
        break;
      }
      if (this.flowLevel > 0 && ch === "-" && isFlow(this.input.peek(1))) {
        throw new LexicalError("plain scalar cannot start with '-' followed by ,[]{}", span(this.mark));
      }

      if (!isBlankOrBreakZ(ch) && this.plainContinues()) {
        if (this.leadingWhitespace) {
          if (leadingBreak === "") {
            text += trailingBreaks;
          } else {
            text += trailingBreaks === "" ? " " : trailingBreaks;
          }
          leadingBreak = "";
          trailingBreaks = "";
          this.leadingWhitespace = false;
        } else {
          text += whitespaces;
        }
        whitespaces = "";

        while (!isBlankOrBreakZ(this.input.peek()) && this.plainContinues()) {
          text += this.input.peek();
          this.skipNonBlank();
        }
        end = this.mark;
      }

      if (!isBlank(this.input.peek()) && !isBreak(this.input.peek())) break;

      while (isBlank(this.input.peek()) || isBreak(this.input.peek())) {
        const c = this.input.peek();
        if (isBlank(c)) {
          if (!this.leadingWhitespace) {
            whitespaces += c;
            this.skipBlank();
          } else if (c === "\t" && this.mark.col < indent) {
            const tab = this.mark;
            this.skipWsToEol(true);
            if (!isBreakZ(this.input.peek())) {
              throw new LexicalError("while scanning a plain scalar, found a tab", span(tab));
            }
          } else {
            this.skipBlank();
          }
        } else if (this.leadingWhitespace) {
          this.skipLineBreak();
          trailingBreaks += "\n";
        } else {
          whitespaces = "";
          this.skipLineBreak();
          leadingBreak = "\n";
        }
      }

      if (this.flowLevel === 0 && this.mark.col < indent) break;
    }

    if (this.leadingWhitespace) this.simpleKeyAllowed = true;
    if (text === "") {
      throw new LexicalError("unexpected end of plain scalar", span(start));
    }
    return { type: "scalar", style: "plain", text, span: span(start, end) };
  }
}

/** Total length of a UTF-8 sequence from its leading octet, 0 if invalid */
function utf8SequenceLength(octet: number): number {
  if ((octet & 0x80) === 0) return 1;
  if ((octet & 0xe0) === 0xc0) return 2;
  if ((octet & 0xf0) === 0xe0) return 3;
  if ((octet & 0xf8) === 0xf0) return 4;
  return 0;
}
