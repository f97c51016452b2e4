export type TerminalMarker =
  | { kind: "ok" }
  | { kind: "error"; code: string | null; text: string };

const CME_PATTERN = /^\+CM[ES] ERROR:\s*(.*)$/;

const completeLines = (buffer: string) => {
  const normalized = buffer.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  const lastNewline = normalized.lastIndexOf("\n");
  if (lastNewline < 0) {
    return [];
  }
  return normalized.slice(0, lastNewline).split("\n");
};

const markerOf = (line: string): TerminalMarker | null => {
  const trimmed = line.trim();
  if (trimmed === "OK") {
    return { kind: "ok" };
  }
  if (trimmed === "ERROR") {
    return { kind: "error", code: null, text: trimmed };
  }
  const match = trimmed.match(CME_PATTERN);
  if (match) {
    const code = match[1].trim();
    return { kind: "error", code: code.length > 0 ? code : null, text: trimmed };
  }
  return null;
};

/**
 * Looks for the reply terminator in an accumulated receive buffer.
 * Only complete lines count: a half-received `+CME ERROR: 1` is not yet terminal.
 */
export const detectTerminal = (buffer: string): TerminalMarker | null => {
  for (const line of completeLines(buffer)) {
    const marker = markerOf(line);
    if (marker) {
      return marker;
    }
  }
  return null;
};

export const splitResponseLines = (buffer: string) =>
  buffer
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);

export const formatCommand = (command: string) => `${command.trimEnd()}\r\n`;

export const isEcho = (line: string, command?: string) => {
  const trimmed = line.trim();
  if (command !== undefined) {
    return trimmed === command.trim();
  }
  return /^AT/i.test(trimmed);
};

/** Reply lines with echo and terminator removed. */
export const payloadLines = (lines: readonly string[], command?: string) =>
  lines.filter((line) => !isEcho(line, command) && markerOf(line) === null);
