import { DirectiveTable } from "./directives.js";
import { MalformedPolicy, decode } from "./encoding.js";
import { Scanner, Token, TokenType } from "./scanner.js";
import {
  AnchorError,
  CollectionStyle,
  Event,
  EventReceiver,
  Marker,
  Span,
  Tag,
  YamlError,
  YamlSyntaxError,
  isYamlError,
  span,
} from "./types.js";

export interface ParserOptions {
  /** Deepest collection nesting accepted */
  maxDepth: number;
  /** Handling of undecodable bytes when the source is a byte buffer */
  onMalformed: MalformedPolicy;
}

export const DEFAULT_PARSER_OPTIONS: Readonly<ParserOptions> = Object.freeze({
  maxDepth: 512,
  onMalformed: "strict",
});

export type Source = string | Uint8Array | Iterable<string>;

type State =
  | "stream-start"
  | "implicit-document-start"
  | "document-start"
  | "document-content"
  | "document-end"
  | "block-node"
  | "block-sequence-first-entry"
  | "block-sequence-entry"
  | "indentless-sequence-entry"
  | "block-mapping-first-key"
  | "block-mapping-key"
  | "block-mapping-value"
  | "flow-sequence-first-entry"
  | "flow-sequence-entry"
  | "flow-sequence-entry-mapping-key"
  | "flow-sequence-entry-mapping-value"
  | "flow-sequence-entry-mapping-end"
  | "flow-mapping-first-key"
  | "flow-mapping-key"
  | "flow-mapping-value"
  | "flow-mapping-empty-value"
  | "end";

interface NodeProperties {
  tag?: Tag;
  anchorId?: number;
}

/**
 * Pull parser. Each call to `next()` runs the state machine until exactly
 * one event is ready. Nesting lives on an explicit state stack, so deep input
 * never grows the call stack.
 */
export class Parser implements Iterable<Event> {
  private scanner: Scanner;
  private options: ParserOptions;

  private state: State = "stream-start";
  private states: State[] = [];
  private token: Token | null = null;
  private buffered: Event | null = null;
  private error: YamlError | null = null;
  private depth = 0;

  private directives = new DirectiveTable();
  private anchors = new Map<string, number>();
  private nextAnchorId = 1;

  constructor(source: Source, options: Partial<ParserOptions> = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
    const chars = source instanceof Uint8Array ? decode(source, { onMalformed: this.options.onMalformed }) : source;
    this.scanner = new Scanner(chars, { maxFlowDepth: this.options.maxDepth });
  }

  static fromString(source: string, options?: Partial<ParserOptions>): Parser {
    return new Parser(source, options);
  }

  static fromBytes(source: Uint8Array, options?: Partial<ParserOptions>): Parser {
    return new Parser(source, options);
  }

  static fromChars(source: Iterable<string>, options?: Partial<ParserOptions>): Parser {
    return new Parser(source, options);
  }

  /** Next event, or null after `stream-end` */
  next(): Event | null {
    if (this.buffered) {
      const event = this.buffered;
      this.buffered = null;
      return event;
    }
    return this.produce();
  }

  /** Next event without consuming it */
  peek(): Event | null {
    if (!this.buffered) this.buffered = this.produce();
    return this.buffered;
  }

  *[Symbol.iterator](): Iterator<Event> {
    for (let event = this.next(); event; event = this.next()) {
      yield event;
    }
  }

  /**
   * Push every event into `receiver`. With `multi: false` the run stops after
   * the first document.
   */
  drive(receiver: EventReceiver, { multi = true }: { multi?: boolean } = {}): void {
    for (let event = this.next(); event; event = this.next()) {
      receiver.onEvent(event);
      if (event.type === "stream-end") return;
      if (!multi && event.type === "document-end") return;
    }
  }

  private produce(): Event | null {
    if (this.error) throw this.error;
    if (this.state === "end") return null;
    try {
      const event = this.step();
      this.track(event);
      return event;
    } catch (e) {
      if (isYamlError(e)) this.error = e;
      throw e;
    }
  }

  private track(event: Event): void {
    switch (event.type) {
      case "sequence-start":
      case "mapping-start":
        if (++this.depth > this.options.maxDepth) {
          throw new YamlSyntaxError("recursion limit exceeded", event.span);
        }
        break;
      case "sequence-end":
      case "mapping-end":
        this.depth--;
        break;
    }
  }

  private step(): Event {
    switch (this.state) {
      case "stream-start":
        return this.streamStart();
      case "implicit-document-start":
        return this.documentStart(true);
      case "document-start":
        return this.documentStart(false);
      case "document-content":
        return this.documentContent();
      case "document-end":
        return this.documentEnd();
      case "block-node":
        return this.parseNode(true, false);
      case "block-sequence-first-entry":
        return this.blockSequenceEntry(true);
      case "block-sequence-entry":
        return this.blockSequenceEntry(false);
      case "indentless-sequence-entry":
        return this.indentlessSequenceEntry();
      case "block-mapping-first-key":
        return this.blockMappingKey(true);
      case "block-mapping-key":
        return this.blockMappingKey(false);
      case "block-mapping-value":
        return this.blockMappingValue();
      case "flow-sequence-first-entry":
        return this.flowSequenceEntry(true);
      case "flow-sequence-entry":
        return this.flowSequenceEntry(false);
      case "flow-sequence-entry-mapping-key":
        return this.flowSequenceEntryMappingKey();
      case "flow-sequence-entry-mapping-value":
        return this.flowSequenceEntryMappingValue();
      case "flow-sequence-entry-mapping-end":
        return this.flowSequenceEntryMappingEnd();
      case "flow-mapping-first-key":
        return this.flowMappingKey(true);
      case "flow-mapping-key":
        return this.flowMappingKey(false);
      case "flow-mapping-value":
        return this.flowMappingValue(false);
      case "flow-mapping-empty-value":
        return this.flowMappingValue(true);
      case "end":
        throw new YamlSyntaxError("no more events after stream end", span(this.scanner.mark));
    }
  }

  // Tokens

  private peekToken(): Token {
    if (!this.token) {
      const token = this.scanner.nextToken();
      if (!token) throw new YamlSyntaxError("unexpected end of token stream", span(this.scanner.mark));
      this.token = token;
    }
    return this.token;
  }

  private skipToken(): void {
    this.token = null;
  }

  private check(token: Token, ...types: TokenType[]): boolean {
    return types.includes(token.type);
  }

  private popState(): State {
    const state = this.states.pop();
    if (state === undefined) {
      throw new YamlSyntaxError("parser state stack is empty", span(this.scanner.mark));
    }
    return state;
  }

  // Stream and documents

  private streamStart(): Event {
    const token = this.peekToken();
    if (token.type !== "stream-start") {
      throw new YamlSyntaxError("did not find expected <stream-start>", token.span);
    }
    this.skipToken();
    this.state = "implicit-document-start";
    return { type: "stream-start", span: token.span };
  }

  private documentStart(implicit: boolean): Event {
    let token = this.peekToken();
    if (implicit) {
      while (token.type === "document-end") {
        this.skipToken();
        token = this.peekToken();
      }
    }

    if (token.type === "stream-end") {
      this.skipToken();
      this.state = "end";
      return { type: "stream-end", span: token.span };
    }

    if (this.check(token, "version-directive", "tag-directive", "reserved-directive")) {
      if (!implicit) {
        throw new YamlSyntaxError("missing explicit document end marker before directive", token.span);
      }
      return this.explicitDocumentStart();
    }
    if (token.type === "document-start") return this.explicitDocumentStart();
    if (!implicit) {
      throw new YamlSyntaxError("did not find expected <document start>", token.span);
    }

    this.beginDocument();
    this.states.push("document-end");
    this.state = "block-node";
    return { type: "document-start", explicit: false, tags: {}, span: span(token.span.start) };
  }

  private beginDocument(): void {
    this.directives = new DirectiveTable();
    this.anchors.clear();
    this.nextAnchorId = 1;
  }

  private explicitDocumentStart(): Event {
    this.beginDocument();
    let token = this.peekToken();
    for (;;) {
      if (token.type === "version-directive") {
        this.directives.setVersion({ major: token.major, minor: token.minor }, token.span);
      } else if (token.type === "tag-directive") {
        this.directives.addTag(token.handle, token.prefix, token.span);
      } else if (token.type !== "reserved-directive") {
        break;
      }
      this.skipToken();
      token = this.peekToken();
    }

    if (token.type !== "document-start") {
      throw new YamlSyntaxError("did not find expected <document start>", token.span);
    }
    this.skipToken();
    this.states.push("document-end");
    this.state = "document-content";

    const { version } = this.directives;
    return {
      type: "document-start",
      explicit: true,
      ...(version ? { version } : {}),
      tags: { ...this.directives.tags },
      span: token.span,
    };
  }

  private documentContent(): Event {
    const token = this.peekToken();
    if (
      this.check(
        token,
        "version-directive",
        "tag-directive",
        "reserved-directive",
        "document-start",
        "document-end",
        "stream-end",
      )
    ) {
      this.state = this.popState();
      return emptyScalar(token.span.start);
    }
    return this.parseNode(true, false);
  }

  private documentEnd(): Event {
    const token = this.peekToken();
    if (token.type === "document-end") {
      this.skipToken();
      this.state = "implicit-document-start";
      return { type: "document-end", explicit: true, span: token.span };
    }
    this.state = "document-start";
    return { type: "document-end", explicit: false, span: span(token.span.start) };
  }

  // Nodes

  private parseNode(block: boolean, indentlessSequence: boolean): Event {
    let token = this.peekToken();

    if (token.type === "alias") {
      this.skipToken();
      this.state = this.popState();
      const anchorId = this.anchors.get(token.name);
      if (anchorId === undefined) {
        throw new AnchorError(`while parsing node, found unknown anchor ${token.name}`, token.span);
      }
      return { type: "alias", anchorId, span: token.span };
    }

    const start = token.span.start;
    const props: NodeProperties = {};
    // Properties come in either order, each at most once
    for (let i = 0; i < 2; i++) {
      if (token.type === "anchor" && props.anchorId === undefined) {
        props.anchorId = this.defineAnchor(token.name);
      } else if (token.type === "tag" && props.tag === undefined) {
        props.tag = this.directives.resolve(token.handle, token.suffix, token.span);
      } else {
        break;
      }
      this.skipToken();
      token = this.peekToken();
    }

    if (indentlessSequence && token.type === "block-entry") {
      this.state = "indentless-sequence-entry";
      return this.collectionStart("sequence-start", "block", props, span(start, token.span.start));
    }

    if (token.type === "scalar") {
      this.skipToken();
      this.state = this.popState();
      return {
        type: "scalar",
        text: token.text,
        style: token.style,
        ...props,
        span: span(start, token.span.end),
      };
    }
    if (token.type === "flow-sequence-start") {
      this.state = "flow-sequence-first-entry";
      return this.collectionStart("sequence-start", "flow", props, span(start, token.span.end));
    }
    if (token.type === "flow-mapping-start") {
      this.state = "flow-mapping-first-key";
      return this.collectionStart("mapping-start", "flow", props, span(start, token.span.end));
    }
    if (block && token.type === "block-sequence-start") {
      this.state = "block-sequence-first-entry";
      return this.collectionStart("sequence-start", "block", props, span(start, token.span.end));
    }
    if (block && token.type === "block-mapping-start") {
      this.state = "block-mapping-first-key";
      return this.collectionStart("mapping-start", "block", props, span(start, token.span.end));
    }
    if (props.anchorId !== undefined || props.tag) {
      // A node made of properties alone
      this.state = this.popState();
      return emptyScalar(start, props);
    }
    throw new YamlSyntaxError(
      `while parsing a ${block ? "block" : "flow"} node, did not find expected node content`,
      token.span,
    );
  }

  private defineAnchor(name: string): number {
    const id = this.nextAnchorId++;
    this.anchors.set(name, id);
    return id;
  }

  private collectionStart(
    type: "sequence-start" | "mapping-start",
    style: CollectionStyle,
    props: NodeProperties,
    extent: Span,
  ): Event {
    return type === "sequence-start"
      ? { type, style, ...props, span: extent }
      : { type, style, ...props, span: extent };
  }

  // Block collections

  private blockSequenceEntry(first: boolean): Event {
    if (first) this.skipToken();
    const token = this.peekToken();

    if (token.type === "block-end") {
      this.skipToken();
      this.state = this.popState();
      return { type: "sequence-end", span: token.span };
    }
    if (token.type !== "block-entry") {
      throw new YamlSyntaxError(
        "while parsing a block collection, did not find expected '-' indicator",
        token.span,
      );
    }

    this.skipToken();
    const next = this.peekToken();
    if (this.check(next, "block-entry", "block-end")) {
      this.state = "block-sequence-entry";
      return emptyScalar(token.span.end);
    }
    this.states.push("block-sequence-entry");
    return this.parseNode(true, false);
  }

  private indentlessSequenceEntry(): Event {
    const token = this.peekToken();
    if (token.type !== "block-entry") {
      this.state = this.popState();
      return { type: "sequence-end", span: span(token.span.start) };
    }

    this.skipToken();
    const next = this.peekToken();
    if (this.check(next, "block-entry", "key", "value", "block-end")) {
      this.state = "indentless-sequence-entry";
      return emptyScalar(token.span.end);
    }
    this.states.push("indentless-sequence-entry");
    return this.parseNode(true, false);
  }

  private blockMappingKey(first: boolean): Event {
    if (first) this.skipToken();
    const token = this.peekToken();

    if (token.type === "key") {
      this.skipToken();
      const next = this.peekToken();
      if (this.check(next, "key", "value", "block-end")) {
        this.state = "block-mapping-value";
        return emptyScalar(next.span.start);
      }
      this.states.push("block-mapping-value");
      return this.parseNode(true, true);
    }
    if (token.type === "value") {
      // `: x` with the key left out
      this.state = "block-mapping-value";
      return emptyScalar(token.span.start);
    }
    if (token.type === "block-end") {
      this.skipToken();
      this.state = this.popState();
      return { type: "mapping-end", span: token.span };
    }
    throw new YamlSyntaxError("while parsing a block mapping, did not find expected key", token.span);
  }

  private blockMappingValue(): Event {
    const token = this.peekToken();
    if (token.type !== "value") {
      this.state = "block-mapping-key";
      return emptyScalar(token.span.start);
    }

    this.skipToken();
    const next = this.peekToken();
    if (this.check(next, "key", "value", "block-end")) {
      this.state = "block-mapping-key";
      return emptyScalar(next.span.start);
    }
    this.states.push("block-mapping-key");
    return this.parseNode(true, true);
  }

  // Flow collections

  private flowSequenceEntry(first: boolean): Event {
    if (first) this.skipToken();
    let token = this.peekToken();

    if (token.type !== "flow-sequence-end") {
      if (!first) {
        if (token.type !== "flow-entry") {
          throw new YamlSyntaxError("while parsing a flow sequence, expected ',' or ']'", token.span);
        }
        this.skipToken();
        token = this.peekToken();
      }

      if (token.type === "key") {
        // `[? a : b]` opens a single-pair mapping
        this.skipToken();
        this.state = "flow-sequence-entry-mapping-key";
        return this.collectionStart("mapping-start", "flow", {}, token.span);
      }
      if (token.type !== "flow-sequence-end") {
        this.states.push("flow-sequence-entry");
        return this.parseNode(false, false);
      }
    }

    this.skipToken();
    this.state = this.popState();
    return { type: "sequence-end", span: token.span };
  }

  private flowSequenceEntryMappingKey(): Event {
    const token = this.peekToken();
    if (this.check(token, "value", "flow-entry", "flow-sequence-end")) {
      this.state = "flow-sequence-entry-mapping-value";
      return emptyScalar(token.span.start);
    }
    this.states.push("flow-sequence-entry-mapping-value");
    return this.parseNode(false, false);
  }

  private flowSequenceEntryMappingValue(): Event {
    const token = this.peekToken();
    this.state = "flow-sequence-entry-mapping-end";
    if (token.type !== "value") return emptyScalar(token.span.start);

    this.skipToken();
    const next = this.peekToken();
    if (this.check(next, "flow-entry", "flow-sequence-end")) {
      return emptyScalar(next.span.start);
    }
    this.states.push("flow-sequence-entry-mapping-end");
    return this.parseNode(false, false);
  }

  private flowSequenceEntryMappingEnd(): Event {
    this.state = "flow-sequence-entry";
    return { type: "mapping-end", span: span(this.peekToken().span.start) };
  }

  private flowMappingKey(first: boolean): Event {
    if (first) this.skipToken();
    let token = this.peekToken();

    if (token.type !== "flow-mapping-end") {
      if (!first) {
        if (token.type !== "flow-entry") {
          throw new YamlSyntaxError(
            "while parsing a flow mapping, did not find expected ',' or '}'",
            token.span,
          );
        }
        this.skipToken();
        token = this.peekToken();
      }

      if (token.type === "key") {
        this.skipToken();
        const next = this.peekToken();
        if (this.check(next, "value", "flow-entry", "flow-mapping-end")) {
          this.state = "flow-mapping-value";
          return emptyScalar(next.span.start);
        }
        this.states.push("flow-mapping-value");
        return this.parseNode(false, false);
      }
      if (token.type === "value") {
        this.state = "flow-mapping-value";
        return emptyScalar(token.span.start);
      }
      if (token.type !== "flow-mapping-end") {
        // `{a, b: c}`: a key with no value
        this.states.push("flow-mapping-empty-value");
        return this.parseNode(false, false);
      }
    }

    this.skipToken();
    this.state = this.popState();
    return { type: "mapping-end", span: token.span };
  }

  private flowMappingValue(empty: boolean): Event {
    const token = this.peekToken();
    this.state = "flow-mapping-key";
    if (empty || token.type !== "value") return emptyScalar(token.span.start);

    this.skipToken();
    const next = this.peekToken();
    if (this.check(next, "flow-entry", "flow-mapping-end")) {
      return emptyScalar(next.span.start);
    }
    this.states.push("flow-mapping-key");
    return this.parseNode(false, false);
  }
}

/** An omitted node: an empty plain scalar carrying whatever properties were given */
function emptyScalar(at: Marker, props: NodeProperties = {}): Event {
  return { type: "scalar", text: "", style: "plain", ...props, span: span(at) };
}

/** Collect every event of `source` */
export function parse(source: Source, options?: Partial<ParserOptions>): Event[] {
  return [...new Parser(source, options)];
}
