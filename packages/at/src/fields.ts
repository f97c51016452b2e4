export const SENTINEL_ABSENT = -32768;

/** Splits `+TAG: a,"b,c",d` into `["a", "b,c", "d"]`. */
export const splitFields = (line: string) => {
  const colon = line.indexOf(":");
  const payload = colon >= 0 && line.trimStart().startsWith("+") ? line.slice(colon + 1) : line;
  const fields: string[] = [];
  let current = "";
  let quoted = false;
  for (const char of payload) {
    if (char === '"') {
      quoted = !quoted;
      continue;
    }
    if (char === "," && !quoted) {
      fields.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  fields.push(current.trim());
  return fields;
};

export const linesWithPrefix = (lines: readonly string[] | undefined, prefix: string) =>
  (lines ?? []).filter((line) => line.trimStart().toUpperCase().startsWith(prefix.toUpperCase()));

export const firstLineWithPrefix = (lines: readonly string[] | undefined, prefix: string) =>
  linesWithPrefix(lines, prefix)[0] ?? null;

export const toInt = (value: string | undefined | null): number | null => {
  if (value === undefined || value === null) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

/** Signed measurement; `-32768` and `-` mean the receiver has no value. */
export const toMeasurement = (value: string | undefined | null): number | null => {
  const parsed = toInt(value);
  if (parsed === null || parsed === SENTINEL_ABSENT) {
    return null;
  }
  return parsed;
};

export const toHexInt = (value: string | undefined | null): number | null => {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^[0-9A-Fa-f]+$/.test(trimmed)) {
    return null;
  }
  const parsed = Number.parseInt(trimmed, 16);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const toText = (value: string | undefined | null): string | null => {
  if (value === undefined || value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== "-" ? trimmed : null;
};

const UNSET_ADDRESSES = new Set(["0.0.0.0", "N/A", "::"]);

/** IP address text; placeholders for an unassigned address become null. */
export const toAddress = (value: string | undefined | null): string | null => {
  const text = toText(value);
  return text === null || UNSET_ADDRESSES.has(text.toUpperCase()) ? null : text;
};
