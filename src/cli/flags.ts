/**
 * Argument helpers shared by the CLI commands.
 */

/** True when any of `flags` (long or single-letter) is present. */
export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some(
    (flag) => args.includes(`--${flag}`) || (flag.length === 1 && args.includes(`-${flag}`)),
  );
}

/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

export function getNonFlagArgs(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

/** Confidence as a percentage with one decimal, e.g. "65.0%". */
export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}
