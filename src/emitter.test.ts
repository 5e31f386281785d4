import assert from "node:assert";
import { describe, it } from "node:test";
import { emit } from "./emitter.js";
import { load, loadDocument, nodesEqual } from "./loader.js";
import { Node } from "./types.js";

function root(source: string): Node {
  const node = loadDocument(source);
  assert.ok(node);
  return node;
}

describe("emit", () => {
  it("writes block collections", () => {
    assert.strictEqual(emit(root("a: 1\nb:\n  - x\n  - y\nc: {}\n")), "---\na: 1\nb:\n  - x\n  - y\nc: {}\n");
  });

  it("honours the indent option", () => {
    assert.strictEqual(emit(root("a: [x]\n"), { indent: 4 }), "---\na:\n    - x\n");
  });

  it("anchors shared nodes and aliases repeats", () => {
    assert.strictEqual(emit(root("a: &x [1]\nb: *x\n")), "---\na: &a1\n  - 1\nb: *a1\n");
  });

  it("writes cycles", () => {
    assert.strictEqual(emit(root("&a [*a]")), "--- &a1\n- *a1\n");
  });

  it("quotes text that would read back differently", () => {
    const source = "- \"true\"\n- \"a: b\"\n- -5\n- ''\n- \"x\\ty\"\n";
    assert.strictEqual(emit(root(source)), '---\n- "true"\n- "a: b"\n- -5\n- ""\n- "x\\ty"\n');
  });

  it("writes multi-line text as literal scalars", () => {
    assert.strictEqual(emit(root('key: "line1\\nline2\\n"')), "---\nkey: |\n  line1\n  line2\n");
    assert.strictEqual(emit(root('key: "a\\nb"')), "---\nkey: |-\n  a\n  b\n");
  });

  it("escapes multi-line text when literals are off", () => {
    assert.strictEqual(emit(root('key: "a\\nb"'), { multilineStrings: false }), '---\nkey: "a\\nb"\n');
  });

  it("writes tags", () => {
    const source = "- !!str 1\n- !local x\n- !<tag:x> y\n";
    assert.strictEqual(emit(root(source)), source.replace(/^/, "---\n"));
  });

  it("escapes tag characters the scanner would not read back", () => {
    assert.strictEqual(emit(root("!a%20b v")), "--- !a%20b v\n");
    assert.strictEqual(emit(root("!<tag:a%7Bb> v")), "--- !<tag:a%7Bb> v\n");
    assert.strictEqual(emit(root("!!x%25y v")), "--- !!x%25y v\n");
  });

  it("writes deeply nested collections", () => {
    const depth = 10000;
    const node = loadDocument("[".repeat(depth) + "]".repeat(depth), { maxDepth: 2 * depth });
    assert.ok(node);
    const output = emit(node, { indent: 1 });
    assert.ok(output.startsWith("---\n-\n -\n  -\n"));
    assert.ok(output.endsWith(`\n${" ".repeat(depth - 2)}- []\n`));
    assert.strictEqual(output.split("\n").length, depth + 1);
  });

  it("writes complex keys in explicit form", () => {
    assert.strictEqual(emit(root("? [1, 2]\n: x\n")), "---\n?\n  - 1\n  - 2\n: x\n");
  });

  it("writes empty values and documents", () => {
    assert.strictEqual(emit(root("a:\n")), "---\na:\n");
    assert.strictEqual(emit(root("---\n")), "---\n");
  });

  it("writes every document of a stream", () => {
    assert.strictEqual(emit(load("a\n---\nb\n")), "---\na\n---\nb\n");
    assert.strictEqual(emit(load("")), "");
  });

  it("reads back as the same tree", () => {
    const sources = [
      "{a: [1, 2], b: {c: d}}\n",
      "base: &b\n  x: 1\nother: *b\n",
      "lit: |\n  a\n  b\nfold: >\n  a\n  b\n",
      "- 'it''s'\n- \"tab\\there\"\n- \"\\u00e9\\x01\"\n",
      "? {a: 1}\n: [x]\n? ''\n: z\n",
      "k: |+\n  kept\n\n\n",
      "--- 0o17\n",
      "!a%20b v",
      "- !<tag:x%C3%A9> y\n",
    ];
    for (const source of sources) {
      const original = root(source);
      const copy = root(emit(original));
      assert.ok(nodesEqual(original, copy), `${JSON.stringify(source)} emitted as ${JSON.stringify(emit(original))}`);
    }
  });
});
