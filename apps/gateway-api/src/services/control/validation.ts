import { ValidationError } from "../../errors/app-error";

export type Body = Record<string, unknown>;

const isRecord = (value: unknown): value is Body =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readBody = (value: unknown): Body => {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ValidationError("Request body must be a JSON object.");
  }
  return value;
};

export const readObject = (body: Body, name: string): Body | undefined => {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid ${name}.`, { field: name });
  }
  return value;
};

export const optionalBoolean = (body: Body, name: string) => {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ValidationError(`Invalid ${name}: expected a boolean.`, { field: name });
  }
  return value;
};

export const requireBoolean = (body: Body, name: string) => {
  const value = optionalBoolean(body, name);
  if (value === undefined) {
    throw new ValidationError(`Missing ${name}.`, { field: name });
  }
  return value;
};

export const readDryRun = (body: Body) => optionalBoolean(body, "dry_run") ?? false;

export const optionalInteger = (body: Body, name: string, min = 0) => {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ValidationError(`Invalid ${name}: expected an integer >= ${min}.`, { field: name });
  }
  return value;
};

export const oneOf = <T extends string>(
  body: Body,
  name: string,
  allowed: readonly T[],
  fallback?: T
): T => {
  const value = body[name];
  if ((value === undefined || value === null) && fallback !== undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`Invalid ${name}: expected one of ${allowed.join(", ")}.`, {
      field: name,
      allowed,
    });
  }
  return match;
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/** Free text that ends up inside a quoted AT parameter. */
export const quotedText = (body: Body, name: string, options: { required?: boolean; max?: number } = {}) => {
  const value = body[name];
  if (value === undefined || value === null || value === "") {
    if (options.required) {
      throw new ValidationError(`Missing ${name}.`, { field: name });
    }
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`Invalid ${name}: expected a string.`, { field: name });
  }
  if (value.includes('"') || CONTROL_CHARS.test(value)) {
    throw new ValidationError(`Invalid ${name}: quotes and control characters are not allowed.`, {
      field: name,
    });
  }
  if (value.length > (options.max ?? 63)) {
    throw new ValidationError(`Invalid ${name}: too long.`, { field: name });
  }
  return value;
};

// Above every LTE and NR band number 3GPP assigns.
const MAX_BAND = 1024;

const inBandRange = (band: number) => Number.isSafeInteger(band) && band > 0 && band <= MAX_BAND;

const toBand = (entry: unknown) => {
  if (typeof entry === "number") {
    return inBandRange(entry) ? entry : null;
  }
  if (typeof entry === "string" && /^\d{1,4}$/.test(entry.trim())) {
    const band = Number.parseInt(entry.trim(), 10);
    return inBandRange(band) ? band : null;
  }
  return null;
};

/** Band lists accept numbers or digit strings; every entry must be a band number from 1 to 1024. */
export const bandList = (body: Body, name: string) => {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError(`Invalid ${name}: expected a list of band numbers.`, { field: name });
  }
  const bands: number[] = [];
  for (const entry of value) {
    const band = toBand(entry);
    if (band === null) {
      throw new ValidationError(`Invalid ${name}: ${JSON.stringify(entry)} is not a band number.`, {
        field: name,
      });
    }
    bands.push(band);
  }
  return bands;
};

/** Mode tokens go into the command unquoted, so keep them to a plain word list. */
export const modeToken = (body: Body, name: string) => {
  const value = body[name];
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value !== "string" || !/^[A-Za-z0-9:_]+$/.test(value)) {
    throw new ValidationError(`Invalid ${name}.`, { field: name });
  }
  return value;
};
