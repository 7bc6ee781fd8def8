/**
 * Shell quoting for generated scripts
 */

/**
 * Quote a value for a POSIX shell. Plain words are left as they are.
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
