/**
 * Minimal argv helpers shared by the scripts: `--flag value`, `--flag=value`
 * and bare boolean flags.
 */

export function readOption(argv: readonly string[], name: string): string | undefined {
  const equalsArg = argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = argv.indexOf(name);
  if (index >= 0) {
    const next = argv[index + 1];
    if (next !== undefined && !next.startsWith('--')) return next;
  }
  return undefined;
}

export function hasFlag(argv: readonly string[], name: string): boolean {
  return argv.includes(name);
}

export function readIntOption(argv: readonly string[], name: string, fallback: number): number {
  const raw = readOption(argv, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`invalid_argument: ${name} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/** Arguments that are neither flags nor the value of an option that takes one. */
export function positionals(argv: readonly string[], optionsWithValues: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      if (optionsWithValues.includes(arg)) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}
