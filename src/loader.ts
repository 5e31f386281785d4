import { DEFAULT_PARSER_OPTIONS, Parser, ParserOptions, Source } from "./parser.js";
import {
  AnchorError,
  Document,
  DuplicateKeyError,
  Event,
  EventReceiver,
  MappingNode,
  Node,
  ScalarNode,
  SequenceNode,
  Span,
  Stream,
  Tag,
  YamlSyntaxError,
  span,
} from "./types.js";

/** What to do when a mapping key repeats */
export type DuplicateKeyPolicy = "error" | "keep-first" | "keep-last";

export interface LoaderOptions {
  duplicateKeys: DuplicateKeyPolicy;
  /** Called with each document as soon as it is complete */
  onDocument?: (document: Document) => void;
}

export type LoadOptions = ParserOptions & LoaderOptions;

export const DEFAULT_LOAD_OPTIONS: Readonly<LoadOptions> = Object.freeze({
  ...DEFAULT_PARSER_OPTIONS,
  duplicateKeys: "error",
});

type Frame =
  | { type: "sequence"; node: SequenceNode }
  | {
      type: "mapping";
      node: MappingNode;
      key?: { node: Node; span: Span };
      /** Entry index by key text, for scalar keys */
      scalarKeys: Map<string, number>;
    };

type DocumentStartEvent = Extract<Event, { type: "document-start" }>;

/**
 * Builds node trees from parser events. Anchored nodes are kept in an arena
 * indexed by anchor id; a collection enters the arena when it starts, so an
 * alias inside it refers back to the collection itself.
 */
export class Loader implements EventReceiver {
  readonly documents: Document[] = [];

  private options: LoaderOptions;
  private start: DocumentStartEvent | null = null;
  private root: Node | undefined;
  private stack: Frame[] = [];
  private anchors: Node[] = [];

  constructor(options: Partial<LoaderOptions> = {}) {
    this.options = { duplicateKeys: DEFAULT_LOAD_OPTIONS.duplicateKeys, ...options };
  }

  onEvent(event: Event): void {
    switch (event.type) {
      case "stream-start":
      case "stream-end":
        return;
      case "document-start":
        this.start = event;
        this.root = undefined;
        this.stack = [];
        this.anchors = [];
        return;
      case "document-end":
        this.finishDocument(event.explicit, event.span);
        return;
      case "alias": {
        const node = this.anchors[event.anchorId];
        if (!node) throw new AnchorError(`unknown anchor id ${event.anchorId}`, event.span);
        this.insert(node, event.span);
        return;
      }
      case "scalar": {
        const node: ScalarNode = {
          type: "scalar",
          text: event.text,
          style: event.style,
          ...nodeProperties(event),
          span: event.span,
        };
        this.define(event, node);
        this.insert(node, event.span);
        return;
      }
      case "sequence-start": {
        const node: SequenceNode = {
          type: "sequence",
          items: [],
          style: event.style,
          ...nodeProperties(event),
          span: event.span,
        };
        this.define(event, node);
        this.insert(node, event.span);
        this.stack.push({ type: "sequence", node });
        return;
      }
      case "mapping-start": {
        const node: MappingNode = {
          type: "mapping",
          entries: [],
          style: event.style,
          ...nodeProperties(event),
          span: event.span,
        };
        this.define(event, node);
        this.insert(node, event.span);
        this.stack.push({ type: "mapping", node, scalarKeys: new Map() });
        return;
      }
      case "sequence-end":
      case "mapping-end": {
        const frame = this.stack.pop();
        if (!frame) throw new YamlSyntaxError(`unbalanced ${event.type}`, event.span);
        const start = frame.node.span ?? event.span;
        frame.node.span = span(start.start, event.span.end);
        return;
      }
    }
  }

  private define(event: { anchorId?: number }, node: Node): void {
    if (event.anchorId !== undefined) this.anchors[event.anchorId] = node;
  }

  private insert(node: Node, at: Span): void {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      this.root = node;
    } else if (frame.type === "sequence") {
      frame.node.items.push(node);
    } else if (!frame.key) {
      frame.key = { node, span: at };
    } else {
      const key = frame.key;
      frame.key = undefined;
      this.addEntry(frame, key.node, node, key.span);
    }
  }

  private addEntry(frame: Extract<Frame, { type: "mapping" }>, key: Node, value: Node, keySpan: Span): void {
    const entries = frame.node.entries;
    const index =
      key.type === "scalar" ? frame.scalarKeys.get(key.text) : entries.findIndex((entry) => nodesEqual(entry.key, key));

    if (index === undefined || index < 0) {
      if (key.type === "scalar") frame.scalarKeys.set(key.text, entries.length);
      entries.push({ key, value });
      return;
    }

    switch (this.options.duplicateKeys) {
      case "error":
        throw new DuplicateKeyError("duplicate mapping key", keySpan);
      case "keep-first":
        return;
      case "keep-last":
        entries[index] = { key: entries[index].key, value };
        return;
    }
  }

  private finishDocument(explicitEnd: boolean, end: Span): void {
    const start = this.start;
    const root = this.root;
    if (!start || !root) {
      throw new YamlSyntaxError("document ended without content", end);
    }
    const document: Document = {
      root,
      explicitStart: start.explicit,
      explicitEnd,
      ...(start.version ? { version: start.version } : {}),
      tags: start.tags,
      span: span(start.span.start, end.end),
    };
    this.start = null;
    this.root = undefined;
    this.documents.push(document);
    this.options.onDocument?.(document);
  }
}

function nodeProperties(event: { tag?: Tag; anchorId?: number }): { tag?: Tag; anchorId?: number } {
  const props: { tag?: Tag; anchorId?: number } = {};
  if (event.tag) props.tag = event.tag;
  if (event.anchorId !== undefined) props.anchorId = event.anchorId;
  return props;
}

/**
 * Structural key equality: scalars by text, collections by kind and
 * contents. Shared and cyclic structures compare without recursion.
 */
export function nodesEqual(a: Node, b: Node): boolean {
  const assumed = new Map<Node, Set<Node>>();
  const work: Array<[Node, Node]> = [[a, b]];

  for (let pair = work.pop(); pair; pair = work.pop()) {
    const [x, y] = pair;
    if (x === y) continue;
    const seen = assumed.get(x);
    if (seen?.has(y)) continue;
    if (seen) {
      seen.add(y);
    } else {
      assumed.set(x, new Set([y]));
    }

    if (x.type === "scalar") {
      if (y.type !== "scalar" || x.text !== y.text) return false;
    } else if (x.type === "sequence") {
      if (y.type !== "sequence" || x.items.length !== y.items.length) return false;
      x.items.forEach((item, i) => work.push([item, y.items[i]]));
    } else {
      if (y.type !== "mapping" || x.entries.length !== y.entries.length) return false;
      x.entries.forEach((entry, i) => {
        work.push([entry.key, y.entries[i].key]);
        work.push([entry.value, y.entries[i].value]);
      });
    }
  }
  return true;
}

/**
 * Child of `node` by mapping key text or sequence position, or undefined when
 * there is none. Accepts undefined so lookups chain.
 */
export function get(node: Node | undefined, key: string | number): Node | undefined {
  if (node?.type === "mapping" && typeof key === "string") {
    return node.entries.find((entry) => entry.key.type === "scalar" && entry.key.text === key)?.value;
  }
  if (node?.type === "sequence" && typeof key === "number") {
    return Number.isInteger(key) && key >= 0 ? node.items[key] : undefined;
  }
  return undefined;
}

/** Load every document of `source` */
export function load(source: Source, options: Partial<LoadOptions> = {}): Stream {
  const loader = new Loader(options);
  new Parser(source, options).drive(loader);
  return { documents: loader.documents };
}

/** Root node of the first document, or undefined for an empty stream */
export function loadDocument(source: Source, options: Partial<LoadOptions> = {}): Node | undefined {
  const loader = new Loader(options);
  new Parser(source, options).drive(loader, { multi: false });
  return loader.documents[0]?.root;
}
