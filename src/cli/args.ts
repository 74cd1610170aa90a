export function isHelpFlag(token: string): boolean {
  return token === "-h" || token === "--help";
}

/**
 * Reads the value following `flag` at `index`, rejecting a missing value or another flag.
 */
export function readFlagValue(args: string[], index: number, flag: string): string {
  const next = args[index + 1];
  if (next === undefined || next.startsWith("--")) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return next;
}
