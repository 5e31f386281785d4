import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it } from "node:test";
import assert from "node:assert";
import { formatEvents } from "./events.js";
import { parse } from "./parser.js";
import { YamlError } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const corpus = path.resolve(__dirname, "../compliance/corpus");

function findYamlFiles(dir: string): string[] {
  const files: string[] = [];

  function walk(d: string) {
    const entries = fs.readdirSync(d, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(d, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.name.endsWith(".yaml")) {
        files.push(fullPath);
      }
    }
  }

  walk(dir);
  return files.sort();
}

/** Event dump of a file, or `<ErrorName>: <message>` if it fails to parse */
function getOutput(content: string): string {
  try {
    return formatEvents(parse(content));
  } catch (e) {
    if (e instanceof YamlError) {
      return `${e.name}: ${e.message}`;
    }
    throw e;
  }
}

/** Expected output sits beside the input as `.events` or, for failures, `.error` */
function getExpected(file: string): string {
  const base = file.slice(0, -".yaml".length);
  for (const ext of [".events", ".error"]) {
    if (fs.existsSync(base + ext)) return fs.readFileSync(base + ext, "utf-8");
  }
  throw new Error(`no expected output for ${file}`);
}

function normalizeOutput(output: string): string {
  const lines: string[] = [];
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith(";")) continue;
    lines.push(trimmed);
  }
  return lines.join("\n");
}

describe("compliance corpus", () => {
  const files = findYamlFiles(corpus);

  it("has test files", () => {
    assert.ok(files.length > 0, "expected at least one .yaml file in the corpus");
  });

  for (const file of files) {
    const name = path.relative(corpus, file);
    it(name, () => {
      const content = fs.readFileSync(file, "utf-8");
      assert.strictEqual(normalizeOutput(getOutput(content)), normalizeOutput(getExpected(file)));
    });
  }
});
