/**
 * Simulation Settings
 * ===================
 * Immutable value object describing how the remote service evaluates an
 * expression. Settings are cloned per job and never mutated after submission.
 */

export type InstrumentType = 'EQUITY' | 'FUTURES' | 'CRYPTO' | 'FOREX';
export type Neutralization = 'INDUSTRY' | 'SECTOR' | 'MARKET' | 'SUBINDUSTRY' | 'NONE';
export type ToggleMode = 'ON' | 'OFF';

export interface SimulationSettings {
  readonly instrumentType: InstrumentType;
  readonly region: string;
  readonly universe: string;
  readonly delay: number;
  readonly decay: number;
  readonly neutralization: Neutralization;
  /** Fraction in [0, 1] */
  readonly truncation: number;
  readonly pasteurization: ToggleMode;
  readonly unitHandling: string;
  readonly nanHandling: ToggleMode;
  readonly language: string;
  readonly visualization: boolean;
}

/**
 * Wire representation sent to / received from the remote service
 */
export type WireSimulationSettings = {
  instrumentType: string;
  region: string;
  universe: string;
  delay: number;
  decay: number;
  neutralization: string;
  truncation: number;
  pasteurization: string;
  unitHandling: string;
  nanHandling: string;
  language: string;
  visualization: boolean;
};

export const DEFAULT_SIMULATION_SETTINGS: SimulationSettings = Object.freeze({
  instrumentType: 'EQUITY',
  region: 'USA',
  universe: 'TOP3000',
  delay: 1,
  decay: 0,
  neutralization: 'INDUSTRY',
  truncation: 0.08,
  pasteurization: 'ON',
  unitHandling: 'VERIFY',
  nanHandling: 'OFF',
  language: 'FASTEXPR',
  visualization: false,
});

export const INSTRUMENT_TYPES: readonly InstrumentType[] = ['EQUITY', 'FUTURES', 'CRYPTO', 'FOREX'];
export const NEUTRALIZATIONS: readonly Neutralization[] = [
  'INDUSTRY',
  'SECTOR',
  'MARKET',
  'SUBINDUSTRY',
  'NONE',
];

/**
 * First range violation in `settings`, or null when they are usable
 */
export function findSettingsProblem(settings: SimulationSettings): string | null {
  if (!(settings.truncation >= 0 && settings.truncation <= 1)) {
    return `truncation must be within [0, 1], got ${settings.truncation}`;
  }
  if (!Number.isInteger(settings.delay) || settings.delay < 0) {
    return `delay must be a non-negative integer, got ${settings.delay}`;
  }
  if (!Number.isInteger(settings.decay) || settings.decay < 0) {
    return `decay must be a non-negative integer, got ${settings.decay}`;
  }
  return null;
}

/**
 * Build settings from defaults plus overrides. The result is frozen.
 */
export function createSimulationSettings(
  overrides: Partial<SimulationSettings> = {}
): SimulationSettings {
  const settings: SimulationSettings = { ...DEFAULT_SIMULATION_SETTINGS, ...overrides };
  const problem = findSettingsProblem(settings);
  if (problem) {
    throw new RangeError(problem);
  }
  return Object.freeze(settings);
}

/**
 * Clone settings with the region replaced. Ranges are not rechecked here;
 * the orchestrator checks each request before submitting it.
 */
export function withRegion(settings: SimulationSettings, region: string): SimulationSettings {
  return Object.freeze({ ...settings, region });
}

export function toWireSettings(settings: SimulationSettings): WireSimulationSettings {
  return {
    instrumentType: settings.instrumentType,
    region: settings.region,
    universe: settings.universe,
    delay: settings.delay,
    decay: settings.decay,
    neutralization: settings.neutralization,
    truncation: settings.truncation,
    pasteurization: settings.pasteurization,
    unitHandling: settings.unitHandling,
    nanHandling: settings.nanHandling,
    language: settings.language,
    visualization: settings.visualization,
  };
}

function pick<T>(value: unknown, guard: (v: unknown) => v is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isInstrumentType = (v: unknown): v is InstrumentType =>
  INSTRUMENT_TYPES.some((t) => t === v);
const isNeutralization = (v: unknown): v is Neutralization =>
  NEUTRALIZATIONS.some((n) => n === v);
const isToggle = (v: unknown): v is ToggleMode => v === 'ON' || v === 'OFF';

/**
 * Parse settings returned by the remote service, falling back to defaults for
 * missing or malformed fields.
 */
export function fromWireSettings(data: Record<string, unknown> | undefined): SimulationSettings {
  const d = DEFAULT_SIMULATION_SETTINGS;
  const src = data ?? {};
  return Object.freeze({
    instrumentType: pick(src.instrumentType, isInstrumentType, d.instrumentType),
    region: pick(src.region, isString, d.region),
    universe: pick(src.universe, isString, d.universe),
    delay: pick(src.delay, isNumber, d.delay),
    decay: pick(src.decay, isNumber, d.decay),
    neutralization: pick(src.neutralization, isNeutralization, d.neutralization),
    truncation: pick(src.truncation, isNumber, d.truncation),
    pasteurization: pick(src.pasteurization, isToggle, d.pasteurization),
    unitHandling: pick(src.unitHandling, isString, d.unitHandling),
    nanHandling: pick(src.nanHandling, isToggle, d.nanHandling),
    language: pick(src.language, isString, d.language),
    visualization: pick(src.visualization, isBoolean, d.visualization),
  });
}
