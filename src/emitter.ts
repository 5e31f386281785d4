import { isTagChar, isUriChar } from "./chars.js";
import { resolvePlain } from "./schema.js";
import { CORE_SCHEMA_PREFIX, Document, Entry, Node, ScalarNode, Stream, Tag } from "./types.js";

export interface EmitOptions {
  /** Spaces per nesting level */
  indent: number;
  /** Write multi-line text as literal block scalars instead of escaped strings */
  multilineStrings: boolean;
}

export const DEFAULT_EMIT_OPTIONS: Readonly<EmitOptions> = Object.freeze({
  indent: 2,
  multilineStrings: true,
});

/** Longest key written in `key: value` form; longer ones use `? key` */
const MAX_SIMPLE_KEY = 1024;

const INDICATORS = new Set([..."-?:,[]{}#&*!|>'\"%@`"]);

const QUOTED_ESCAPES: Record<string, string> = {
  "\0": "\\0",
  "\x07": "\\a",
  "\b": "\\b",
  "\t": "\\t",
  "\n": "\\n",
  "\v": "\\v",
  "\f": "\\f",
  "\r": "\\r",
  "\x1b": "\\e",
  '"': '\\"',
  "\\": "\\\\",
  "\u0085": "\\N",
  "\u00A0": "\\_",
  "\u2028": "\\L",
  "\u2029": "\\P",
};

function isPrintable(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  if (code === 0x09 || code === 0x0a) return true;
  if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) return false;
  return code !== 0xfeff && code !== 0x2028 && code !== 0x2029 && !(code >= 0xd800 && code <= 0xdfff);
}

/** True if `text` reads back as the same plain scalar in block context */
function isPlainSafe(text: string): boolean {
  if (text === "" || text.trim() !== text) return false;
  if (text.startsWith("---") || text.startsWith("...")) return false;
  // `-`, `?` and `:` only start a token when followed by a space
  const lead = text[0];
  if (INDICATORS.has(lead) && !("-?:".includes(lead) && text.length > 1 && text[1] !== " ")) return false;
  if (text.includes(": ") || text.includes(" #") || text.endsWith(":")) return false;
  for (const ch of text) {
    if (ch === "\n" || ch === "\t" || !isPrintable(ch)) return false;
  }
  return true;
}

function doubleQuote(text: string): string {
  let result = '"';
  for (const ch of text) {
    const escape = QUOTED_ESCAPES[ch];
    if (escape !== undefined) {
      result += escape;
    } else if (isPrintable(ch)) {
      result += ch;
    } else {
      const code = ch.codePointAt(0) ?? 0;
      result += code <= 0xff ? `\\x${hex(code, 2)}` : `\\u${hex(code, 4)}`;
    }
  }
  return result + '"';
}

function hex(code: number, width: number): string {
  return code.toString(16).toUpperCase().padStart(width, "0");
}

const utf8 = new TextEncoder();

/** `%XX`-encode `%` and every character `allowed` rejects */
function percentEncode(text: string, allowed: (ch: string) => boolean): string {
  let result = "";
  for (const ch of text) {
    if (ch !== "%" && allowed(ch)) {
      result += ch;
    } else {
      for (const byte of utf8.encode(ch)) result += `%${hex(byte, 2)}`;
    }
  }
  return result;
}

function formatTag(tag: Tag): string {
  if (tag.handle === "" && tag.suffix === "!") return "!";
  if (tag.suffix !== "") {
    const suffix = percentEncode(tag.suffix, isTagChar);
    if (tag.handle === CORE_SCHEMA_PREFIX) return `!!${suffix}`;
    if (tag.handle === "!") return `!${suffix}`;
  }
  return `!<${percentEncode(tag.handle + tag.suffix, isUriChar)}>`;
}

type EmitTask =
  | { kind: "node"; prefix: string; node: Node; indent: number }
  | { kind: "entry"; pad: string; entry: Entry; indent: number };

/**
 * Writes node trees back out as block-style YAML. Nodes reachable along more
 * than one path are anchored at their first occurrence and aliased after.
 */
class Emitter {
  private lines: string[] = [];
  private shared = new Set<Node>();
  private anchors = new Map<Node, string>();

  constructor(private options: EmitOptions) {}

  document(root: Node): void {
    this.findShared(root);
    this.anchors.clear();
    const work: EmitTask[] = [{ kind: "node", prefix: "---", node: root, indent: 0 }];
    for (let task = work.pop(); task; task = work.pop()) {
      const next =
        task.kind === "node" ? this.value(task.prefix, task.node, task.indent) : this.entry(task.pad, task.entry, task.indent);
      for (let i = next.length - 1; i >= 0; i--) work.push(next[i]);
    }
  }

  toString(): string {
    return this.lines.length === 0 ? "" : this.lines.join("\n") + "\n";
  }

  private findShared(root: Node): void {
    this.shared.clear();
    const visited = new Set<Node>();
    const work: Node[] = [root];
    for (let node = work.pop(); node; node = work.pop()) {
      if (visited.has(node)) {
        this.shared.add(node);
        continue;
      }
      visited.add(node);
      if (node.type === "sequence") {
        for (const item of node.items) work.push(item);
      } else if (node.type === "mapping") {
        for (const entry of node.entries) work.push(entry.key, entry.value);
      }
    }
  }

  /** Anchor and tag, or null when the node was written before and takes an alias */
  private properties(node: Node): string[] | null {
    const existing = this.anchors.get(node);
    if (existing !== undefined) return null;
    const props: string[] = [];
    if (this.shared.has(node)) {
      const name = `a${this.anchors.size + 1}`;
      this.anchors.set(node, name);
      props.push(`&${name}`);
    }
    if (node.tag) props.push(formatTag(node.tag));
    return props;
  }

  private alias(node: Node): string {
    return `*${this.anchors.get(node) ?? ""}`;
  }

  /** Write `node` after `prefix` (`---`, `- ` or `key:`) and return its children */
  private value(prefix: string, node: Node, childIndent: number): EmitTask[] {
    const props = this.properties(node);
    if (!props) {
      this.lines.push(`${prefix} ${this.alias(node)}`);
      return [];
    }
    const head = [prefix, ...props].join(" ");

    if (node.type === "scalar") {
      this.scalar(head, node, childIndent);
      return [];
    }

    const pad = " ".repeat(childIndent);
    const indent = childIndent + this.options.indent;
    if (node.type === "sequence") {
      if (node.items.length === 0) {
        this.lines.push(`${head} []`);
        return [];
      }
      this.lines.push(head);
      return node.items.map((item): EmitTask => ({ kind: "node", prefix: `${pad}-`, node: item, indent }));
    }

    if (node.entries.length === 0) {
      this.lines.push(`${head} {}`);
      return [];
    }
    this.lines.push(head);
    return node.entries.map((entry): EmitTask => ({ kind: "entry", pad, entry, indent }));
  }

  private entry(pad: string, { key, value }: Entry, indent: number): EmitTask[] {
    const simple = this.simpleKey(key);
    if (simple !== null) {
      return [{ kind: "node", prefix: `${pad}${simple}:`, node: value, indent }];
    }
    return [
      { kind: "node", prefix: `${pad}?`, node: key, indent },
      { kind: "node", prefix: `${pad}:`, node: value, indent },
    ];
  }

  private scalar(head: string, node: ScalarNode, childIndent: number): void {
    const { text } = node;
    if (text === "" && node.style === "plain") {
      this.lines.push(head);
      return;
    }
    if (this.options.multilineStrings && isLiteralSafe(text)) {
      this.literal(head, text, Math.max(childIndent, this.options.indent));
      return;
    }
    this.lines.push(`${head} ${this.inlineScalar(node)}`);
  }

  private inlineScalar(node: ScalarNode): string {
    const { text } = node;
    const keepsType = node.style === "plain" || typeof resolvePlain(text) === "string";
    return isPlainSafe(text) && keepsType ? text : doubleQuote(text);
  }

  private literal(head: string, text: string, indent: number): void {
    const body = text.replace(/\n+$/, "");
    const trailing = text.length - body.length;
    const chomping = trailing === 0 ? "-" : trailing === 1 ? "" : "+";
    this.lines.push(`${head} |${chomping}`);
    const pad = " ".repeat(indent);
    for (const line of body.split("\n")) {
      this.lines.push(line === "" ? "" : pad + line);
    }
    // Keep chomping turns the extra breaks into empty lines
    for (let i = 1; i < trailing; i++) this.lines.push("");
  }

  /** Key text for `key: value` form, or null when the key needs `? key` */
  private simpleKey(key: Node): string | null {
    if (this.anchors.has(key)) return `${this.alias(key)} `;
    if (key.type !== "scalar") return null;
    if (key.text === "" && key.style === "plain") return null;
    const props = this.properties(key);
    if (!props) return null;
    const text = this.inlineScalar(key);
    if (text.length > MAX_SIMPLE_KEY) {
      // Undo the anchor so the `? key` form can assign it
      this.anchors.delete(key);
      return null;
    }
    return [...props, text].join(" ");
  }
}

/** True if `text` can be written as a literal block scalar */
function isLiteralSafe(text: string): boolean {
  if (!text.includes("\n")) return false;
  const body = text.replace(/\n+$/, "");
  if (body === "" || body.startsWith(" ") || body.startsWith("\n")) return false;
  for (const ch of text) {
    if (!isPrintable(ch)) return false;
  }
  return !body.split("\n").some((line) => line !== line.trimEnd());
}

function isStream(input: Node | Document | Stream): input is Stream {
  return "documents" in input;
}

function isDocument(input: Node | Document | Stream): input is Document {
  return "root" in input;
}

/** Serialize a node, a document or a whole stream */
export function emit(input: Node | Document | Stream, options: Partial<EmitOptions> = {}): string {
  const emitter = new Emitter({ ...DEFAULT_EMIT_OPTIONS, ...options });
  if (isStream(input)) {
    for (const document of input.documents) emitter.document(document.root);
  } else {
    emitter.document(isDocument(input) ? input.root : input);
  }
  return emitter.toString();
}
