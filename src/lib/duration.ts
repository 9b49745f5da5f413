/**
 * cors-gate - duration parsing for env values
 *
 * Accepts a bare number of seconds ("90") or a number with a unit suffix:
 * "1500ms", "90s", "1m", "2h". Fractions are allowed ("1.5s").
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/;

/** Duration in milliseconds, or null when the value is not a duration */
export function parseDuration(value: string): number | null {
  const match = DURATION.exec(value.trim());
  if (!match) return null;
  const amount = Number(match[1]);
  const unit = match[2] ?? "s";
  return amount * UNIT_MS[unit];
}
