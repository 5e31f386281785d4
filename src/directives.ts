import { CORE_SCHEMA_PREFIX, Span, Tag, Version, YamlSyntaxError } from "./types.js";

/** Handles every document starts with */
export const DEFAULT_TAG_HANDLES: Readonly<Record<string, string>> = Object.freeze({
  "!": "!",
  "!!": CORE_SCHEMA_PREFIX,
});

/**
 * Directives of the document being parsed. A fresh table is made at every
 * document start, so `%TAG` bindings never leak into the next document.
 */
export class DirectiveTable {
  version: Version | undefined;
  /** Handles bound by `%TAG` in this document */
  readonly tags: Record<string, string> = {};

  setVersion(version: Version, span: Span): void {
    if (this.version) {
      throw new YamlSyntaxError("duplicate version directive", span);
    }
    if (version.major !== 1) {
      throw new YamlSyntaxError("found incompatible YAML document", span);
    }
    this.version = version;
  }

  addTag(handle: string, prefix: string, span: Span): void {
    if (Object.hasOwn(this.tags, handle)) {
      throw new YamlSyntaxError("the TAG directive must only be given at most once per handle in the same document", span);
    }
    this.tags[handle] = prefix;
  }

  /**
   * Resolve a tag as written. An empty handle (verbatim or the non-specific
   * `!`) is returned unchanged.
   */
  resolve(handle: string, suffix: string, span: Span): Tag {
    if (handle === "") return { handle, suffix };
    const prefix: string | undefined = Object.hasOwn(this.tags, handle) ? this.tags[handle] : DEFAULT_TAG_HANDLES[handle];
    if (prefix === undefined) {
      throw new YamlSyntaxError(`while parsing a node, found undefined tag handle ${handle}`, span);
    }
    return { handle: prefix, suffix };
  }
}
