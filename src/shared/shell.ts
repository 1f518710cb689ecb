/**
 * Quote a value for interpolation into a bash script.
 * Wraps the string in single quotes and escapes any single quotes within.
 */
export function shellQuote(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/** Quote a value for a PowerShell single-quoted string literal. */
export function psQuote(arg: string): string {
  return "'" + arg.replace(/'/g, "''") + "'";
}
