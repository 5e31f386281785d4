/** A position in the source. `index` is a UTF-8 byte offset, `line` is 1-based, `col` 0-based. */
export interface Marker {
  readonly index: number;
  readonly line: number;
  readonly col: number;
}

/** Source extent, end exclusive */
export interface Span {
  readonly start: Marker;
  readonly end: Marker;
}

export function marker(index: number, line: number, col: number): Marker {
  return { index, line, col };
}

export function span(start: Marker, end: Marker = start): Span {
  return { start, end };
}

/** Scalar styles */
export type ScalarStyle = "plain" | "single-quoted" | "double-quoted" | "literal" | "folded";

/** Collection styles */
export type CollectionStyle = "block" | "flow";

/**
 * A resolved tag. `handle` holds the prefix bound to the written handle, so
 * `!!str` becomes `{ handle: "tag:yaml.org,2002:", suffix: "str" }`.
 * Verbatim tags have an empty handle.
 */
export interface Tag {
  handle: string;
  suffix: string;
}

export const CORE_SCHEMA_PREFIX = "tag:yaml.org,2002:";

export function tagToString(tag: Tag): string {
  return tag.handle + tag.suffix;
}

export function isCoreSchemaTag(tag: Tag): boolean {
  return tag.handle === CORE_SCHEMA_PREFIX;
}

/** `%YAML` version of a document */
export interface Version {
  major: number;
  minor: number;
}

/** Structural events produced by the parser */
export type Event =
  | { type: "stream-start"; span: Span }
  | { type: "stream-end"; span: Span }
  | {
      type: "document-start";
      explicit: boolean;
      version?: Version;
      /** Handle to prefix bindings declared by `%TAG` for this document */
      tags: Record<string, string>;
      span: Span;
    }
  | { type: "document-end"; explicit: boolean; span: Span }
  | { type: "alias"; anchorId: number; span: Span }
  | {
      type: "scalar";
      text: string;
      style: ScalarStyle;
      tag?: Tag;
      anchorId?: number;
      span: Span;
    }
  | { type: "sequence-start"; style: CollectionStyle; tag?: Tag; anchorId?: number; span: Span }
  | { type: "sequence-end"; span: Span }
  | { type: "mapping-start"; style: CollectionStyle; tag?: Tag; anchorId?: number; span: Span }
  | { type: "mapping-end"; span: Span };

export type EventType = Event["type"];

/** Receives events from `Parser.drive` */
export interface EventReceiver {
  onEvent(event: Event): void;
}

/** A scalar node */
export interface ScalarNode {
  type: "scalar";
  text: string;
  style: ScalarStyle;
  tag?: Tag;
  anchorId?: number;
  span?: Span;
}

/** A sequence of nodes */
export interface SequenceNode {
  type: "sequence";
  items: Node[];
  style: CollectionStyle;
  tag?: Tag;
  anchorId?: number;
  span?: Span;
}

/** A mapping entry */
export interface Entry {
  key: Node;
  value: Node;
}

/** An ordered mapping */
export interface MappingNode {
  type: "mapping";
  entries: Entry[];
  style: CollectionStyle;
  tag?: Tag;
  anchorId?: number;
  span?: Span;
}

export type Node = ScalarNode | SequenceNode | MappingNode;

/** Load result for one document */
export interface Document {
  root: Node;
  explicitStart: boolean;
  explicitEnd: boolean;
  version?: Version;
  tags: Record<string, string>;
  span: Span;
}

/** Load result for a whole input */
export interface Stream {
  documents: Document[];
}

export type ErrorKind = "lexical" | "syntax" | "anchor" | "duplicate-key" | "source";

/** Base class of everything this package throws */
export abstract class YamlError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    public readonly info: string,
    public readonly span: Span,
  ) {
    super(
      `${info} at byte ${span.start.index} line ${span.start.line} column ${span.start.col + 1}`,
    );
  }

  get marker(): Marker {
    return this.span.start;
  }
}

/** Malformed token */
export class LexicalError extends YamlError {
  readonly kind = "lexical";
  override name = "LexicalError";
}

/** Valid token in an invalid place */
export class YamlSyntaxError extends YamlError {
  readonly kind = "syntax";
  override name = "YamlSyntaxError";
}

/** Alias to an anchor the current document has not defined */
export class AnchorError extends YamlError {
  readonly kind = "anchor";
  override name = "AnchorError";
}

/** Mapping key collision under the `error` policy */
export class DuplicateKeyError extends YamlError {
  readonly kind = "duplicate-key";
  override name = "DuplicateKeyError";
}

/** The input could not be read or decoded */
export class SourceError extends YamlError {
  readonly kind = "source";
  override name = "SourceError";
}

export function isYamlError(value: unknown): value is YamlError {
  return value instanceof YamlError;
}
