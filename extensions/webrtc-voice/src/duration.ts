/**
 * Voice API duration codec.
 *
 * The API writes durations as seconds with an "s" suffix ("30s", "1.5s")
 * and accepts plain numbers of seconds. Inside the bridge every duration
 * is a number of milliseconds.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const COMPOUND_PATTERN = /^[+-]?((\d+(\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h))+$/;
const TERM_PATTERN = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;

/**
 * Format milliseconds as API seconds: 60000 → "60s", 1500 → "1.5s".
 */
export function formatDuration(ms: number): string {
  return `${ms / 1000}s`;
}

/**
 * Parse an API duration into milliseconds.
 *
 * Accepts a number of seconds, a numeric string of seconds, or a unit
 * string such as "400ms", "1m30s" or "2h".
 *
 * @throws Error for anything else
 */
export function parseDuration(value: number | string): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid duration: ${value}`);
    }
    return value * 1000;
  }

  const text = value.trim();
  if (text === "0") {
    return 0;
  }

  if (COMPOUND_PATTERN.test(text)) {
    let total = 0;
    for (const match of text.matchAll(TERM_PATTERN)) {
      total += Number(match[1]) * UNIT_MS[match[2]];
    }
    return text.startsWith("-") ? -total : total;
  }

  if (text.length > 0) {
    const seconds = Number(text);
    if (Number.isFinite(seconds)) {
      return seconds * 1000;
    }
  }

  throw new Error(`Invalid duration format: "${value}"`);
}
