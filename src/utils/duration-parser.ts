import { ReasonerError } from '../core/errors.js';

const UNIT_MS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof UNIT_MS;

const DURATION_RE = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/;

function isDurationUnit(value: string): value is DurationUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_MS, value);
}

/**
 * Převede délku na milisekundy.
 * Formáty: "1500ms", "30s", "2m", "1.5h", číslo nebo řetězec bez jednotky (ms).
 *
 * @throws {ReasonerError} Při neplatném nebo záporném vstupu
 */
export function parseDuration(duration: string | number): number {
  if (typeof duration === 'number') {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new ReasonerError(`Invalid duration: ${duration}`);
    }
    return duration;
  }

  const match = DURATION_RE.exec(duration.trim());
  if (!match) {
    throw new ReasonerError(`Invalid duration: "${duration}"`);
  }

  const unit = match[2] ?? 'ms';
  if (!isDurationUnit(unit)) {
    throw new ReasonerError(`Unknown duration unit: ${unit}`);
  }

  return Math.round(Number(match[1]) * UNIT_MS[unit]);
}

/**
 * Čitelný zápis délky v ms (`850ms`, `1.2s`, `3m`).
 */
export function formatDuration(ms: number): string {
  if (ms < UNIT_MS.s) return `${Math.round(ms)}ms`;
  if (ms < UNIT_MS.m) return `${Number((ms / UNIT_MS.s).toFixed(1))}s`;
  if (ms < UNIT_MS.h) return `${Number((ms / UNIT_MS.m).toFixed(1))}m`;
  return `${Number((ms / UNIT_MS.h).toFixed(1))}h`;
}
