export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (CLI, production context) should use this; workflows
 * and tests receive a clock so report names are deterministic.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
