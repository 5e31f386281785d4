import assert from "node:assert";
import { describe, it } from "node:test";
import { formatEvent, formatEvents } from "./events.js";
import { marker, span } from "./types.js";

const at = span(marker(0, 1, 0));

describe("formatEvent", () => {
  it("writes properties before the text", () => {
    assert.strictEqual(
      formatEvent({
        type: "scalar",
        text: "x",
        style: "single-quoted",
        anchorId: 2,
        tag: { handle: "!", suffix: "local" },
        span: at,
      }),
      "=VAL &2 <!local> 'x",
    );
  });

  it("escapes control characters and backslashes", () => {
    assert.strictEqual(
      formatEvent({ type: "scalar", text: "a\\b\n\t\r\x08", style: "double-quoted", span: at }),
      '=VAL "a\\\\b\\n\\t\\r\\b',
    );
  });

  it("marks flow collections", () => {
    assert.strictEqual(formatEvent({ type: "sequence-start", style: "flow", anchorId: 1, span: at }), "+SEQ [] &1");
    assert.strictEqual(formatEvent({ type: "mapping-start", style: "block", span: at }), "+MAP");
  });

  it("marks explicit document boundaries", () => {
    assert.strictEqual(
      formatEvents([
        { type: "document-start", explicit: true, tags: {}, span: at },
        { type: "alias", anchorId: 3, span: at },
        { type: "document-end", explicit: true, span: at },
      ]),
      "+DOC ---\n=ALI *3\n-DOC ...",
    );
  });
});
