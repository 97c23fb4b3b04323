export type DecodedLine =
  | { kind: "json"; payload: Record<string, unknown> }
  | { kind: "text"; content: string };

/** Yields trimmed, non-empty lines; a trailing line without newline is flushed at end of stream. */
export async function* splitLines(stream: NodeJS.ReadableStream): AsyncGenerator<string> {
  let buffer = "";
  for await (const chunk of stream) {
    buffer += chunk.toString();
    let index = buffer.indexOf("\n");
    while (index >= 0) {
      const line = buffer.slice(0, index).trim();
      buffer = buffer.slice(index + 1);
      if (line) yield line;
      index = buffer.indexOf("\n");
    }
  }
  const rest = buffer.trim();
  if (rest) yield rest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Backends sometimes print plain diagnostics between JSON events; those
 * lines come back as text instead of being dropped.
 */
export function decodeJsonLine(line: string): DecodedLine {
  const payload = tryParseJson(line);
  if (isRecord(payload)) return { kind: "json", payload };
  return { kind: "text", content: line };
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
