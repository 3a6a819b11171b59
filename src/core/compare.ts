/** Code-unit ordering; independent of locale so persisted output is stable everywhere. */
export function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
