/**
 * Elapsed time formatting: H:MM:SS[.ffffff]
 */

const MICROS_PER_SECOND = 1_000_000;

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Format a number of seconds as elapsed time.
 *
 * Hours are not capped at 24 and not zero-padded; microseconds are appended
 * only when the value is not a whole second.
 *
 * @example
 * formatElapsed(10)      // '0:00:10'
 * formatElapsed(3725.5)  // '1:02:05.500000'
 */
export function formatElapsed(seconds: number): string {
  const sign = seconds < 0 ? '-' : '';
  const totalMicros = Math.round(Math.abs(seconds) * MICROS_PER_SECOND);
  const wholeSeconds = Math.floor(totalMicros / MICROS_PER_SECOND);
  const micros = totalMicros % MICROS_PER_SECOND;

  const hours = Math.floor(wholeSeconds / 3600);
  const minutes = Math.floor((wholeSeconds % 3600) / 60);
  const secs = wholeSeconds % 60;

  const base = `${sign}${hours}:${pad(minutes, 2)}:${pad(secs, 2)}`;
  return micros === 0 ? base : `${base}.${pad(micros, 6)}`;
}
