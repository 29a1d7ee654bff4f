/** SEEDED RNG  -------------------------------------------------------------- */
export type RNG = () => number;

/** Simple deterministic PRNG (mulberry32) */
function mulberry32(seed: number): RNG {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashString(str: string): number {
  // xfnv1a 32-bit
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** Create RNG: if seed omitted -> uses Math.random adapter (non-deterministic) */
export function makeRNG(seed?: string | null): RNG {
  if (!seed) return () => Math.random();
  return mulberry32(hashString(String(seed)));
}

/** Seeded shuffle */
export function shuffleRng<T>(arr: readonly T[], rng: RNG): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export function pickOne<T>(arr: readonly T[], rng: RNG): T {
  return arr[Math.floor(rng() * arr.length)];
}

/** Unsigned random integer of `bits` bits, assembled from 32-bit draws. */
export function randomBits(rng: RNG, bits: number): bigint {
  let value = 0n;
  for (let drawn = 0; drawn < bits; drawn += 32) {
    value = (value << 32n) | BigInt(Math.floor(rng() * 4294967296));
  }
  return value & ((1n << BigInt(bits)) - 1n);
}

/** TEXT UTILS --------------------------------------------------------------- */
function normalizeText(s: string): string {
  if (!s) return "";
  return s
    .toLowerCase()
    .replace(/[‘’‚‛′]/g, "'")
    .replace(/[“”„‟″]/g, '"')
    .replace(/[–—−]/g, "-")
    .replace(/[.,;:!?()\[\]{}]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function tokens(s: string): string[] {
  return normalizeText(s).split(" ").filter(Boolean);
}

function jaccard(a: string[], b: string[]): number {
  const A = new Set(a);
  const B = new Set(b);
  const inter = [...A].filter((x) => B.has(x)).length;
  const union = new Set([...A, ...B]).size;
  return union === 0 ? 0 : inter / union;
}

function levenshtein(a: string, b: string): number {
  const m = a.length,
    n = b.length;
  const dp = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;
  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }
  return dp[m][n];
}

function charSimilarity(a: string, b: string): number {
  const na = normalizeText(a);
  const nb = normalizeText(b);
  if (!na && !nb) return 1;
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - levenshtein(na, nb) / maxLen; // 1.0 is identical
}

export function bestVariantSimilarity(user: string, variants: readonly string[]): number {
  const tUser = tokens(user);
  let best = 0;
  for (const v of variants) {
    const sim = Math.max(jaccard(tUser, tokens(v)), charSimilarity(user, v));
    if (sim > best) best = sim;
  }
  return best;
}
