const UNIT_MILLISECONDS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  μs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION = /^([-+]?)((?:(?:\d+\.?\d*|\.\d+)(?:ns|us|µs|μs|ms|s|m|h))+)$/;
const COMPONENT = /(\d+\.?\d*|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;

/**
 * Parses a Go-style duration string such as `300ms`, `1.5h` or `2h45m` into milliseconds.
 * The empty string and `0` are zero.
 *
 * @param value - Duration text
 * @returns Milliseconds, or undefined when the text is not a valid duration
 */
export function parseDuration(value: string): number | undefined {
  if (value === '' || value === '0') {
    return 0;
  }
  const match = DURATION.exec(value);
  if (!match) {
    return undefined;
  }
  let total = 0;
  for (const [, amount, unit] of match[2].matchAll(COMPONENT)) {
    total += Number(amount) * UNIT_MILLISECONDS[unit];
  }
  return match[1] === '-' ? -total : total;
}
