import crypto from 'node:crypto';

export function now(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function dateKey(ts: number | string): string {
  return new Date(ts).toISOString().slice(0, 10);
}

export function addDays(dateStr: string, days: number): string {
  const date = new Date(`${dateStr}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

export function newId(): string {
  return crypto.randomUUID();
}

/** Trims, drops empty strings and keeps the first occurrence of each value. */
export function normalizeList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (value.length === 0 || seen.has(value)) {
      continue;
    }
    seen.add(value);
    result.push(value);
  }
  return result;
}

export function splitList(value: string | null | undefined, separator: string): string[] {
  if (!value) {
    return [];
  }
  return normalizeList(value.split(separator));
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function readingTime(text: string): string {
  const minutes = Math.max(1, Math.floor(wordCount(text) / 200));
  return `${minutes} min read`;
}

export function isMood(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 10;
}
