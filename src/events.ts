import { Event, ScalarStyle, Tag, tagToString } from "./types.js";

const STYLE_SIGILS: Record<ScalarStyle, string> = {
  plain: ":",
  "single-quoted": "'",
  "double-quoted": '"',
  literal: "|",
  folded: ">",
};

function escapeText(s: string): string {
  let result = "";
  for (const ch of s) {
    switch (ch) {
      case "\\":
        result += "\\\\";
        break;
      case "\n":
        result += "\\n";
        break;
      case "\t":
        result += "\\t";
        break;
      case "\b":
        result += "\\b";
        break;
      case "\r":
        result += "\\r";
        break;
      default:
        result += ch;
    }
  }
  return result;
}

function properties(anchorId: number | undefined, tag: Tag | undefined): string {
  let result = "";
  if (anchorId !== undefined) result += ` &${anchorId}`;
  if (tag) result += ` <${tagToString(tag)}>`;
  return result;
}

/** One event in yaml-test-suite notation, e.g. `=VAL &1 :text` */
export function formatEvent(event: Event): string {
  switch (event.type) {
    case "stream-start":
      return "+STR";
    case "stream-end":
      return "-STR";
    case "document-start":
      return event.explicit ? "+DOC ---" : "+DOC";
    case "document-end":
      return event.explicit ? "-DOC ..." : "-DOC";
    case "sequence-start":
      return `+SEQ${event.style === "flow" ? " []" : ""}${properties(event.anchorId, event.tag)}`;
    case "sequence-end":
      return "-SEQ";
    case "mapping-start":
      return `+MAP${event.style === "flow" ? " {}" : ""}${properties(event.anchorId, event.tag)}`;
    case "mapping-end":
      return "-MAP";
    case "alias":
      return `=ALI *${event.anchorId}`;
    case "scalar":
      return `=VAL${properties(event.anchorId, event.tag)} ${STYLE_SIGILS[event.style]}${escapeText(event.text)}`;
  }
}

/** A whole event sequence, one event per line */
export function formatEvents(events: Iterable<Event>): string {
  const lines: string[] = [];
  for (const event of events) {
    lines.push(formatEvent(event));
  }
  return lines.join("\n");
}
