// packages/utils/env.ts
export type EnvLike = Record<string, string | undefined>;

export const toBool = (v: string | undefined, d = false): boolean => {
  const s = String(v ?? "").trim().toLowerCase();
  if (!s) return d;
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return d;
};

export const toInt = (v: string | undefined, d: number): number => {
  const n = parseInt(String(v ?? ""), 10);
  return Number.isFinite(n) ? n : d;
};

export const toFloat = (v: string | undefined, d: number): number => {
  const n = parseFloat(String(v ?? ""));
  return Number.isFinite(n) ? n : d;
};

export const toStr = (v: string | undefined, d = ""): string => {
  const s = (v ?? "").trim();
  return s || d;
};
