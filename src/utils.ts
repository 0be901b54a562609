function isTruthyFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isDryRun(): boolean {
  return isTruthyFlag(process.env.IMPOSTOR_ARENA_DRY_RUN ?? process.env.DRY_RUN);
}

export function shouldPrintThoughts(): boolean {
  return isTruthyFlag(process.env.IMPOSTOR_ARENA_PRINT_THOUGHTS);
}

export function dryRunSeed(): number {
  const raw = process.env.IMPOSTOR_ARENA_DRY_RUN_SEED;
  if (!raw) return 1;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 1;
}

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates over a copy; deterministic given `rng`. */
export function shuffled<T>(items: readonly T[], rng: () => number): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = arr[i];
    arr[i] = arr[j]!;
    arr[j] = tmp!;
  }
  return arr;
}

export function pickDeterministic<T>(options: readonly T[], key: string): T | undefined {
  if (options.length === 0) return undefined;
  return options[fnv1a32(key) % options.length];
}

/** Freeze a plain data value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
