/** Entries of a query table (`key -> AT command`) in declaration order, keys kept typed. */
export const queryEntries = <K extends string>(table: Readonly<Record<K, string>>) => {
  const entries: Array<[K, string]> = [];
  for (const key in table) {
    entries.push([key, table[key]]);
  }
  return entries;
};
