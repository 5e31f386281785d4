export { Parser, parse, DEFAULT_PARSER_OPTIONS } from "./parser.js";
export type { ParserOptions, Source } from "./parser.js";
export { Loader, get, load, loadDocument, nodesEqual, DEFAULT_LOAD_OPTIONS } from "./loader.js";
export type { DuplicateKeyPolicy, LoadOptions, LoaderOptions } from "./loader.js";
export { decode, detectEncoding, DEFAULT_DECODE_OPTIONS } from "./encoding.js";
export type { DecodeOptions, Encoding, MalformedPolicy } from "./encoding.js";
export { resolvePlain, resolveScalar, toJS } from "./schema.js";
export type { ScalarValue } from "./schema.js";
export { emit, DEFAULT_EMIT_OPTIONS } from "./emitter.js";
export type { EmitOptions } from "./emitter.js";
export { formatEvent, formatEvents } from "./events.js";
export type {
  CollectionStyle,
  Document,
  Entry,
  ErrorKind,
  Event,
  EventReceiver,
  EventType,
  MappingNode,
  Marker,
  Node,
  ScalarNode,
  ScalarStyle,
  SequenceNode,
  Span,
  Stream,
  Tag,
  Version,
} from "./types.js";
export {
  AnchorError,
  CORE_SCHEMA_PREFIX,
  DuplicateKeyError,
  LexicalError,
  SourceError,
  YamlError,
  YamlSyntaxError,
  isCoreSchemaTag,
  isYamlError,
  tagToString,
} from "./types.js";
