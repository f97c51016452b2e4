export type FieldFailure = { field: string; message: string };

/**
 * Runs one field decoder; a throw is recorded in `failures` and the field becomes null.
 */
export const isolate = <T>(
  field: string,
  decode: () => T | null,
  failures: FieldFailure[]
): T | null => {
  try {
    return decode();
  } catch (error) {
    failures.push({ field, message: error instanceof Error ? error.message : String(error) });
    return null;
  }
};
