import assert from "node:assert";
import { describe, it } from "node:test";
import { Loader, get, load, loadDocument, nodesEqual } from "./loader.js";
import { Parser } from "./parser.js";
import { AnchorError, Document, DuplicateKeyError, MappingNode, Node, SequenceNode } from "./types.js";

function root(source: string): Node {
  const node = loadDocument(source);
  assert.ok(node, `expected ${JSON.stringify(source)} to hold a document`);
  return node;
}

function mapping(node: Node | undefined): MappingNode {
  if (node?.type !== "mapping") assert.fail(`expected a mapping, got ${node?.type}`);
  return node;
}

function sequence(node: Node | undefined): SequenceNode {
  if (node?.type !== "sequence") assert.fail(`expected a sequence, got ${node?.type}`);
  return node;
}

function text(node: Node | undefined): string {
  if (node?.type !== "scalar") assert.fail(`expected a scalar, got ${node?.type}`);
  return node.text;
}

describe("trees", () => {
  it("builds mappings and sequences", () => {
    const map = mapping(root("a: 1\nb: [x, y]\n"));
    assert.deepStrictEqual(map.entries.map((e) => text(e.key)), ["a", "b"]);
    assert.strictEqual(text(map.entries[0]?.value), "1");
    assert.deepStrictEqual(sequence(map.entries[1]?.value).items.map(text), ["x", "y"]);
    assert.strictEqual(map.style, "block");
    assert.strictEqual(sequence(map.entries[1]?.value).style, "flow");
  });

  it("shares the anchored node with its aliases", () => {
    const map = mapping(root("a: &x [1]\nb: *x\n"));
    assert.strictEqual(map.entries[1]?.value, map.entries[0]?.value);
  });

  it("lets an alias refer to the latest definition of a name", () => {
    const items = sequence(root("- &a 1\n- &a 2\n- *a\n")).items;
    assert.strictEqual(items[2], items[1]);
  });

  it("builds cycles through aliases inside the anchored collection", () => {
    const seq = sequence(root("&a [*a]"));
    assert.strictEqual(seq.items[0], seq);
  });

  it("loads an empty document as an empty plain scalar", () => {
    const node = root("---\n");
    assert.deepStrictEqual(node, {
      type: "scalar",
      text: "",
      style: "plain",
      span: { start: { index: 4, line: 2, col: 0 }, end: { index: 4, line: 2, col: 0 } },
    });
  });

  it("gives collections the span from start to end indicator", () => {
    assert.deepStrictEqual(root("[1, 2]").span, {
      start: { index: 0, line: 1, col: 0 },
      end: { index: 6, line: 1, col: 6 },
    });
  });

  it("keeps tags and anchor ids on nodes", () => {
    const node = root("--- !!str &a x\n");
    assert.deepStrictEqual(node.tag, { handle: "tag:yaml.org,2002:", suffix: "str" });
    assert.strictEqual(node.anchorId, 1);
  });
});

describe("duplicate keys", () => {
  it("rejects them by default", () => {
    assert.throws(
      () => load("{a: 1, a: 2}"),
      (e: unknown) => e instanceof DuplicateKeyError && e.message === "duplicate mapping key at byte 7 line 1 column 8",
    );
  });

  it("keeps the first value when asked", () => {
    const map = mapping(loadDocument("{a: 1, a: 2}", { duplicateKeys: "keep-first" }));
    assert.strictEqual(map.entries.length, 1);
    assert.strictEqual(text(map.entries[0]?.value), "1");
  });

  it("keeps the last value in the first position when asked", () => {
    const map = mapping(loadDocument("a: 1\nb: 2\na: 3\n", { duplicateKeys: "keep-last" }));
    assert.deepStrictEqual(
      map.entries.map((e) => [text(e.key), text(e.value)]),
      [
        ["a", "3"],
        ["b", "2"],
      ],
    );
  });

  it("compares collection keys by content", () => {
    assert.throws(
      () => load("? [1, 2]\n: a\n? [1, 2]\n: b\n"),
      (e: unknown) => e instanceof DuplicateKeyError && e.message === "duplicate mapping key at byte 15 line 3 column 3",
    );
  });

  it("compares scalar keys by text alone", () => {
    assert.strictEqual(mapping(root("1: a\n01: c\n")).entries.length, 2);
    assert.throws(() => load("1: a\n'1': b\n"), DuplicateKeyError);
  });
});

describe("documents", () => {
  it("records document markers and directives", () => {
    const [document] = load("%YAML 1.2\n---\na\n...\n").documents;
    assert.strictEqual(document?.explicitStart, true);
    assert.strictEqual(document?.explicitEnd, true);
    assert.deepStrictEqual(document?.version, { major: 1, minor: 2 });
    assert.deepStrictEqual(document?.span, {
      start: { index: 10, line: 2, col: 0 },
      end: { index: 19, line: 4, col: 3 },
    });
  });

  it("loads every document of a stream", () => {
    const { documents } = load("a\n---\nb\n...\nc\n");
    assert.deepStrictEqual(
      documents.map((d) => text(d.root)),
      ["a", "b", "c"],
    );
    assert.deepStrictEqual(
      documents.map((d) => d.explicitStart),
      [false, true, false],
    );
  });

  it("reports each document as it completes", () => {
    const seen: string[] = [];
    load("a\n---\nb\n", { onDocument: (d: Document) => seen.push(text(d.root)) });
    assert.deepStrictEqual(seen, ["a", "b"]);
  });

  it("keeps earlier documents when a later one fails", () => {
    const loader = new Loader();
    assert.throws(() => new Parser("a\n---\n[*x]\n").drive(loader), AnchorError);
    assert.deepStrictEqual(loader.documents.map((d) => text(d.root)), ["a"]);
  });

  it("stops reading after the first document", () => {
    assert.strictEqual(text(loadDocument("a\n--- *x\n")), "a");
    assert.strictEqual(loadDocument(""), undefined);
  });
});

describe("nodesEqual", () => {
  it("compares structure rather than identity", () => {
    assert.ok(nodesEqual(root("{a: [1, 2]}"), root("a:\n- 1\n- 2\n")));
    assert.ok(!nodesEqual(root("[1, 2]"), root("[1, 3]")));
    assert.ok(!nodesEqual(root("[1]"), root("{1: }")));
  });

  it("terminates on cycles", () => {
    assert.ok(nodesEqual(root("&a [*a]"), root("&b [*b]")));
    assert.ok(!nodesEqual(root("&a [*a]"), root("&b [[*b], 1]")));
  });
});

describe("get", () => {
  const doc = root("name: app\n'a b': 1\nports: [80, 443]\n? [x]\n: y\n");

  it("looks up mapping values by key text", () => {
    assert.strictEqual(text(get(doc, "name")), "app");
    assert.strictEqual(text(get(doc, "a b")), "1");
  });

  it("indexes sequences by position", () => {
    assert.strictEqual(text(get(get(doc, "ports"), 1)), "443");
  });

  it("returns undefined when there is no such child", () => {
    const ports = get(doc, "ports");
    assert.strictEqual(get(doc, "missing"), undefined);
    assert.strictEqual(get(doc, "[x]"), undefined);
    assert.strictEqual(get(doc, 0), undefined);
    assert.strictEqual(get(ports, 2), undefined);
    assert.strictEqual(get(ports, -1), undefined);
    assert.strictEqual(get(ports, 0.5), undefined);
    assert.strictEqual(get(ports, "0"), undefined);
    assert.strictEqual(get(get(doc, "name"), "app"), undefined);
    assert.strictEqual(get(get(doc, "missing"), 0), undefined);
  });
});
