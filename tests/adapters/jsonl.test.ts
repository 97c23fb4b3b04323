import { describe, expect, it } from "vitest";
import { Readable } from "node:stream";
import { decodeJsonLine, splitLines } from "../../src/adapters/jsonl.js";

async function collect(stream: NodeJS.ReadableStream): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of splitLines(stream)) lines.push(line);
  return lines;
}

describe("splitLines", () => {
  it("joins partial lines across chunks", async () => {
    const stream = Readable.from([
      '{"type":"progress","message":"a"}\n{"type":"progress"',
      ',"message":"b"}\n'
    ]);
    expect(await collect(stream)).toEqual([
      '{"type":"progress","message":"a"}',
      '{"type":"progress","message":"b"}'
    ]);
  });

  it("skips blank lines and flushes a final line without newline", async () => {
    const stream = Readable.from(["first\n\n   \n", "sec", "ond"]);
    expect(await collect(stream)).toEqual(["first", "second"]);
  });
});

describe("decodeJsonLine", () => {
  it("decodes JSON objects", () => {
    expect(decodeJsonLine('{"type":"result","result":"ok"}')).toEqual({
      kind: "json",
      payload: { type: "result", result: "ok" }
    });
  });

  it("falls back to text for malformed JSON", () => {
    expect(decodeJsonLine("{bad json}")).toEqual({ kind: "text", content: "{bad json}" });
  });

  it("treats JSON that is not an object as text", () => {
    expect(decodeJsonLine("42")).toEqual({ kind: "text", content: "42" });
    expect(decodeJsonLine('["a"]')).toEqual({ kind: "text", content: '["a"]' });
  });
});
