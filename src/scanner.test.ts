import assert from "node:assert";
import { describe, it } from "node:test";
import { Scanner, Token } from "./scanner.js";
import { LexicalError, YamlError } from "./types.js";

function scan(source: Iterable<string>): Token[] {
  const scanner = new Scanner(source, { maxFlowDepth: 512 });
  const tokens: Token[] = [];
  for (let token = scanner.nextToken(); token; token = scanner.nextToken()) {
    tokens.push(token);
  }
  return tokens;
}

function types(source: Iterable<string>): string[] {
  return scan(source).map((t) => t.type);
}

function scalars(source: string): string[] {
  return scan(source).flatMap((t) => (t.type === "scalar" ? [t.text] : []));
}

function scanError(source: string): YamlError {
  try {
    scan(source);
  } catch (e) {
    if (e instanceof YamlError) return e;
    throw e;
  }
  assert.fail(`expected ${JSON.stringify(source)} to fail`);
}

describe("structure", () => {
  it("opens and closes a block sequence", () => {
    assert.deepStrictEqual(types("- 1\n- 2\n- 3\n"), [
      "stream-start",
      "block-sequence-start",
      "block-entry",
      "scalar",
      "block-entry",
      "scalar",
      "block-entry",
      "scalar",
      "block-end",
      "stream-end",
    ]);
  });

  it("inserts key and mapping start before a simple key", () => {
    assert.deepStrictEqual(types("a: 1"), [
      "stream-start",
      "block-mapping-start",
      "key",
      "scalar",
      "value",
      "scalar",
      "block-end",
      "stream-end",
    ]);
  });

  it("makes a single pair in a flow sequence an explicit mapping", () => {
    assert.deepStrictEqual(types("[a: 1, b]"), [
      "stream-start",
      "flow-sequence-start",
      "flow-mapping-start",
      "key",
      "scalar",
      "value",
      "scalar",
      "flow-mapping-end",
      "flow-entry",
      "scalar",
      "flow-sequence-end",
      "stream-end",
    ]);
  });

  it("reads a sequence at the key's indentation without opening a level", () => {
    assert.deepStrictEqual(types("k:\n- x\n- y\n"), [
      "stream-start",
      "block-mapping-start",
      "key",
      "scalar",
      "value",
      "block-entry",
      "scalar",
      "block-entry",
      "scalar",
      "block-end",
      "stream-end",
    ]);
  });

  it("reads the same tokens from chunks", () => {
    assert.deepStrictEqual(types(["- a", "\n- ", "b\n"]), types("- a\n- b\n"));
  });

  it("reads directives", () => {
    const tokens = scan("%YAML 1.2\n%TAG !e! tag:example.com,2000:\n%FOO bar\n---\n");
    assert.deepStrictEqual(tokens.slice(1, 5), [
      {
        type: "version-directive",
        major: 1,
        minor: 2,
        span: { start: { index: 0, line: 1, col: 0 }, end: { index: 9, line: 1, col: 9 } },
      },
      {
        type: "tag-directive",
        handle: "!e!",
        prefix: "tag:example.com,2000:",
        span: { start: { index: 10, line: 2, col: 0 }, end: { index: 40, line: 2, col: 30 } },
      },
      {
        type: "reserved-directive",
        span: { start: { index: 41, line: 3, col: 0 }, end: { index: 49, line: 3, col: 8 } },
      },
      {
        type: "document-start",
        span: { start: { index: 50, line: 4, col: 0 }, end: { index: 53, line: 4, col: 3 } },
      },
    ]);
  });

  it("reads tags", () => {
    const tags = scan("- !!str a\n- !local b\n- !<tag:x> c\n- ! d\n").flatMap((t) =>
      t.type === "tag" ? [[t.handle, t.suffix]] : [],
    );
    assert.deepStrictEqual(tags, [
      ["!!", "str"],
      ["!", "local"],
      ["", "tag:x"],
      ["", "!"],
    ]);
  });

  it("decodes percent escapes in tags", () => {
    const tag = scan("!e%C3%A9 x").find((t) => t.type === "tag");
    assert.deepStrictEqual(tag && tag.type === "tag" ? tag.suffix : null, "e\u00e9");
  });

  it("skips a byte order mark without counting a column", () => {
    const scalar = scan("\uFEFFa").find((t) => t.type === "scalar");
    assert.deepStrictEqual(scalar?.span.start, { index: 3, line: 1, col: 0 });
  });

  it("counts bytes and columns separately", () => {
    const values = scan("\u00e9: x").filter((t) => t.type === "scalar");
    assert.deepStrictEqual(values[1]?.span.start, { index: 4, line: 1, col: 3 });
  });
});

describe("scalars", () => {
  it("folds multi-line plain scalars", () => {
    assert.deepStrictEqual(scalars("key: first\n  second\n\n  third\n"), ["key", "first second\nthird"]);
  });

  it("stops plain scalars at a comment", () => {
    assert.deepStrictEqual(scalars("a: b#c # comment\n"), ["a", "b#c"]);
  });

  it("decodes double-quoted escapes", () => {
    assert.deepStrictEqual(scalars('"\\x41\\u00e9\\U0001F600\\t\\\\\\"\\/"'), [
      "A\u00e9\u{1F600}\t\\\"/",
    ]);
  });

  it("joins an escaped line break without a space", () => {
    assert.deepStrictEqual(scalars('"a\\\n  b"'), ["ab"]);
  });

  it("folds quoted line breaks", () => {
    assert.deepStrictEqual(scalars("'a\n\n  b'"), ["a\nb"]);
    assert.deepStrictEqual(scalars("'it''s'"), ["it's"]);
  });

  it("chomps literal scalars", () => {
    assert.deepStrictEqual(scalars("|-\nfoo\nbar\n\n"), ["foo\nbar"]);
    assert.deepStrictEqual(scalars("|\nfoo\nbar\n\n"), ["foo\nbar\n"]);
    assert.deepStrictEqual(scalars("a: |+\n  x\n\n"), ["a", "x\n\n"]);
  });

  it("gives an empty clipped block scalar no line break", () => {
    assert.deepStrictEqual(scalars("a: |\nb: 1\n"), ["a", "", "b", "1"]);
  });

  it("folds folded scalars except around more-indented lines", () => {
    assert.deepStrictEqual(scalars("a: >\n  one\n  two\n\n    code\n  end\n"), ["a", "one two\n\n  code\nend\n"]);
  });

  it("honours an explicit indentation indicator", () => {
    assert.deepStrictEqual(scalars("a: |2\n   x\n"), ["a", " x\n"]);
  });

  it("ends a block scalar at a document marker", () => {
    assert.deepStrictEqual(scalars("--- |\nfoo\n---\n"), ["foo\n"]);
  });
});

describe("errors", () => {
  it("reports inconsistent indentation at the offending character", () => {
    const error = scanError("a:\n    b: 1\n  c: 2\n");
    assert.ok(error instanceof LexicalError);
    assert.strictEqual(error.message, "inconsistent indentation at byte 14 line 3 column 3");
  });

  it("reports an unknown escape at the backslash", () => {
    const error = scanError('"a\\qb"');
    assert.strictEqual(error.info, "while parsing a quoted scalar, found unknown escape character");
    assert.deepStrictEqual(error.marker, { index: 2, line: 1, col: 2 });
  });

  it("rejects escapes that are not code points", () => {
    const error = scanError('"\\uD800"');
    assert.strictEqual(error.info, "while parsing a quoted scalar, found invalid Unicode character escape code");
    assert.strictEqual(error.marker.index, 1);
  });

  it("reports an unterminated quoted scalar at the opening quote", () => {
    const error = scanError("x: 'abc");
    assert.strictEqual(error.info, "while scanning a quoted scalar, found unexpected end of stream");
    assert.deepStrictEqual(error.marker, { index: 3, line: 1, col: 3 });
  });

  it("rejects a zero indentation indicator", () => {
    const error = scanError("a: |0\n x\n");
    assert.strictEqual(error.message, "while scanning a block scalar, found an indentation indicator equal to 0 at byte 4 line 1 column 5");
  });

  it("rejects a mapping value after a multi-line plain scalar", () => {
    const error = scanError("\n# syntax error\nscalar\nkey: [1, 2]]\nkey1:a2\n");
    assert.strictEqual(error.message, "mapping values are not allowed in this context at byte 26 line 4 column 4");
  });

  it("requires whitespace before a comment", () => {
    const error = scanError("[a,#c\n]");
    assert.strictEqual(error.message, "comments must be separated from other tokens by whitespace at byte 3 line 1 column 4");
  });

  it("rejects tabs used as block indentation", () => {
    const error = scanError("a:\n\tb: 1\n");
    assert.strictEqual(error.info, "tabs disallowed within this context (block indentation)");
    assert.deepStrictEqual(error.marker, { index: 3, line: 2, col: 0 });
  });

  it("rejects content after a document end marker", () => {
    const error = scanError("a\n... x\n");
    assert.strictEqual(error.message, "invalid content after document end marker at byte 6 line 2 column 5");
  });

  it("rejects reserved indicators", () => {
    const error = scanError("a: @b");
    assert.strictEqual(error.info, "unexpected character: `@'");
  });

  it("limits flow nesting", () => {
    const scanner = new Scanner("[[[1]]]", { maxFlowDepth: 2 });
    assert.throws(
      () => {
        while (scanner.nextToken()) continue;
      },
      (e: unknown) => e instanceof YamlError && e.info === "recursion limit exceeded" && e.marker.index === 2,
    );
  });

  it("keeps failing after the first error", () => {
    const scanner = new Scanner("'abc", { maxFlowDepth: 512 });
    scanner.nextToken();
    let first: unknown;
    try {
      scanner.nextToken();
    } catch (e) {
      first = e;
    }
    assert.ok(first instanceof LexicalError);
    assert.throws(() => scanner.nextToken(), (e: unknown) => e === first);
  });
});
