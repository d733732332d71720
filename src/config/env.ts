import { config as loadEnv } from "dotenv";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type Env = Record<string, string | undefined>;

export const isDev = (env: Env = process.env) => env.NODE_ENV !== "production";

/**
 * Numeric env value, or the fallback when unset or unparsable.
 */
export function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Math.floor(readNumber(value, fallback));
  return parsed > 0 ? parsed : fallback;
}

export function readUrl(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return trimmed.replace(/\/+$/, "");
}
