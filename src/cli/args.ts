/** Minimal flag access over argv (no parser dependency). */

export function hasFlag(args: readonly string[], ...names: string[]): boolean {
  return names.some((n) => args.includes(n));
}

export function getFlagValue(args: readonly string[], ...names: string[]): string | null {
  for (const name of names) {
    const i = args.indexOf(name);
    if (i >= 0 && i < args.length - 1) {
      const v = args[i + 1];
      if (v !== undefined && !v.startsWith("--")) return v;
    }
    const prefix = name + "=";
    const inline = args.find((a) => a.startsWith(prefix));
    if (inline !== undefined) return inline.slice(prefix.length);
  }
  return null;
}
