export type CliArgs = {
  _: string[];
  flags: Record<string, string | true>;
};

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { _: [], flags: {} };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (!token.startsWith("--")) {
      out._.push(token);
      continue;
    }

    const eq = token.indexOf("=");
    if (eq !== -1) {
      out.flags[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }

    const k = token.slice(2);
    const next = argv[i + 1];

    if (next !== undefined && !next.startsWith("--")) {
      out.flags[k] = next;
      i++;
    } else {
      out.flags[k] = true;
    }
  }

  return out;
}

export function getFlag(args: CliArgs, name: string): string | undefined {
  const v = args.flags[name];
  return typeof v === "string" ? v : undefined;
}

export function hasFlag(args: CliArgs, name: string): boolean {
  return args.flags[name] !== undefined;
}

export function getNumberFlag(args: CliArgs, name: string): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${name} must be a number (got "${raw}")`);
  return n;
}

export function getArg(name: string, fallback?: string) {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return fallback;
  return process.argv[idx + 1] ?? fallback;
}
