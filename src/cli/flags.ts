export function getFlagValue(args: string[], flag: string): string | undefined {
  const flagIndex = args.indexOf(flag);
  if (flagIndex < 0) {
    return undefined;
  }

  return args[flagIndex + 1];
}

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** Positional arguments, skipping flags and the values that follow them. */
export function getPositionals(args: string[], valueFlags: string[]): string[] {
  const positionals: string[] = [];
  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? "";
    if (valueFlags.includes(arg)) {
      index++;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }
  return positionals;
}

export function toPositiveInt(
  value: string | undefined,
  flag: string,
): number | undefined {
  if (value == null) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${flag}: ${value}`);
  }

  return parsed;
}

export function parseList(value: string | undefined): string[] | undefined {
  if (value == null) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
