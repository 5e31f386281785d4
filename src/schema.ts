import { Entry, Node, ScalarNode, isCoreSchemaTag } from "./types.js";

/** A scalar resolved by the core schema */
export type ScalarValue = null | boolean | number | string;

const NULL = /^(?:~|null|Null|NULL|)$/;
const BOOL = /^(?:true|True|TRUE|false|False|FALSE)$/;
const INT_DECIMAL = /^[-+]?[0-9]+$/;
const INT_OCTAL = /^0o[0-7]+$/;
const INT_HEX = /^0x[0-9a-fA-F]+$/;
const FLOAT = /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/;
const INFINITY = /^[-+]?\.(?:inf|Inf|INF)$/;
const NAN = /^\.(?:nan|NaN|NAN)$/;

function parseNull(text: string): null | undefined {
  return NULL.test(text) ? null : undefined;
}

function parseBool(text: string): boolean | undefined {
  if (!BOOL.test(text)) return undefined;
  return text[0] === "t" || text[0] === "T";
}

function toInteger(text: string): number | undefined {
  if (INT_DECIMAL.test(text)) return Number(text);
  if (INT_OCTAL.test(text)) return parseInt(text.slice(2), 8);
  if (INT_HEX.test(text)) return parseInt(text.slice(2), 16);
  return undefined;
}

function toFloat(text: string): number | undefined {
  if (FLOAT.test(text)) return Number(text);
  if (INFINITY.test(text)) return text.startsWith("-") ? -Infinity : Infinity;
  if (NAN.test(text)) return NaN;
  return undefined;
}

function forced<T>(value: T | undefined, text: string, tag: string): T {
  if (value === undefined) {
    throw new TypeError(`cannot resolve ${JSON.stringify(text)} as !!${tag}`);
  }
  return value;
}

/** Core schema resolution of plain text with no tag */
export function resolvePlain(text: string): ScalarValue {
  const nil = parseNull(text);
  if (nil !== undefined) return nil;
  const bool = parseBool(text);
  if (bool !== undefined) return bool;
  return toInteger(text) ?? toFloat(text) ?? text;
}

/**
 * Resolve a scalar node. Explicit core tags force the type; any other tag,
 * and every quoted or block scalar, stays a string. Integers beyond
 * `Number.MAX_SAFE_INTEGER` round to the nearest double.
 */
export function resolveScalar(node: ScalarNode): ScalarValue {
  const { text, tag } = node;
  if (tag) {
    if (!isCoreSchemaTag(tag)) return text;
    switch (tag.suffix) {
      case "null":
        return forced(parseNull(text), text, tag.suffix);
      case "bool":
        return forced(parseBool(text), text, tag.suffix);
      case "int":
        return forced(toInteger(text), text, tag.suffix);
      case "float":
        return forced(toFloat(text) ?? toInteger(text), text, tag.suffix);
      default:
        return text;
    }
  }
  if (node.style !== "plain") return text;
  return resolvePlain(text);
}

type Frame =
  | { kind: "sequence"; items: Node[]; result: unknown[]; index: number }
  | { kind: "mapping"; entries: Entry[]; result: Record<string, unknown>; index: number; key: unknown };

/**
 * Convert a node tree to plain JavaScript values. Mapping keys become the
 * string form of their resolved value. A node reached twice converts to the
 * same object, so cycles survive.
 */
export function toJS(node: Node): unknown {
  const seen = new Map<Node, unknown>();
  const stack: Frame[] = [];

  // Scalars resolve at once; a collection gets its container now and is
  // filled when its frame reaches the top of the stack
  function open(node: Node): unknown {
    if (node.type === "scalar") return resolveScalar(node);
    const existing = seen.get(node);
    if (existing !== undefined) return existing;
    if (node.type === "sequence") {
      const result: unknown[] = [];
      seen.set(node, result);
      stack.push({ kind: "sequence", items: node.items, result, index: 0 });
      return result;
    }
    const result: Record<string, unknown> = {};
    seen.set(node, result);
    stack.push({ kind: "mapping", entries: node.entries, result, index: 0, key: undefined });
    return result;
  }

  const root = open(node);
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.kind === "sequence") {
      if (frame.index < frame.items.length) {
        const item = frame.items[frame.index++];
        frame.result.push(open(item));
      } else {
        stack.pop();
      }
    } else if (frame.index < frame.entries.length * 2) {
      // Even steps open the key; its frame completes before the odd step
      // stores the value under it
      const entry = frame.entries[Math.floor(frame.index / 2)];
      if (frame.index++ % 2 === 0) {
        frame.key = open(entry.key);
      } else {
        Object.defineProperty(frame.result, keyString(frame.key), {
          value: open(entry.value),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    } else {
      stack.pop();
    }
  }
  return root;
}

function keyString(key: unknown): string {
  if (typeof key !== "object" || key === null) return String(key);
  try {
    return JSON.stringify(key);
  } catch (cause) {
    throw new TypeError("cannot use a collection that contains itself as a mapping key", { cause });
  }
}
