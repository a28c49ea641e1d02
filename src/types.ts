/**
 * Core Types
 *
 * Shared vocabulary of the timing analyzer: units, hardware line names,
 * radar sites and the analyzer configuration.
 */

// =============================================================================
// Units
// =============================================================================

/** One microsecond in seconds. Controller programs write times in µs. */
export const US = 1e-6;

/** One nanosecond in seconds. */
export const NS = 1e-9;

/** Propagation speed used for range calculations [m/s] */
export const SPEED_OF_LIGHT = 299_792_458;

// =============================================================================
// Timed events
// =============================================================================

export interface TimedEvent<T> {
  /** Seconds from the start of the cycle */
  time: number;
  event: T;
}

export type Phase = 0 | 180;

// =============================================================================
// Hardware lines
// =============================================================================

export const CHANNEL_NUMBERS = [1, 2, 3, 4, 5, 6] as const;

export type ChannelNumber = (typeof CHANNEL_NUMBERS)[number];

export type ChannelName = `CH${ChannelNumber}`;

export type SettingName = 'RXPROT' | 'LOPROT' | 'CAL' | 'BEAM';

/** Pseudo-streams tracking which phase the phase shifter holds */
export type PhaseStreamName = '+' | '-';

export type StreamName = 'RF' | SettingName | ChannelName | PhaseStreamName;

export const SETTING_NAMES: readonly SettingName[] = ['RXPROT', 'LOPROT', 'CAL', 'BEAM'];

export const CHANNEL_NAMES: readonly ChannelName[] = CHANNEL_NUMBERS.map(
  (ch): ChannelName => `CH${ch}`
);

export const PHASE_STREAM_NAMES: readonly PhaseStreamName[] = ['+', '-'];

export const STREAM_NAMES: readonly StreamName[] = [
  'RF',
  ...SETTING_NAMES,
  ...CHANNEL_NAMES,
  ...PHASE_STREAM_NAMES,
];

export function isChannelNumber(value: number): value is ChannelNumber {
  return CHANNEL_NUMBERS.some((ch) => ch === value);
}

// =============================================================================
// Radar sites
// =============================================================================

export type RadarSite = 'UHF' | 'VHF' | 'ESR' | 'KIR' | 'SOD';

export const RADAR_SITES: readonly RadarSite[] = ['UHF', 'VHF', 'ESR', 'KIR', 'SOD'];

export function parseRadarSite(value: string): RadarSite | null {
  const upper = value.toUpperCase();
  return RADAR_SITES.find((site) => site === upper) ?? null;
}

/**
 * Local oscillator frequencies [MHz], one entry per receiver path.
 * A single lo1 entry means both paths share the first oscillator.
 */
export interface LocalOscillators {
  lo1: number[];
  lo2: number[];
}

/**
 * Receiver setup handed from the console interpreter to the controller
 * interpreter.
 */
export interface ReceiverConfig extends LocalOscillators {
  /** NCO tables [MHz] per channel, where one was loaded */
  channelTables: Partial<Record<ChannelNumber, number[]>>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface AnalyzerConfig {
  radar: RadarSite;
  oscillators: Record<RadarSite, LocalOscillators>;
  /** Iteration bound of console `for` loops */
  maxLoopIterations: number;
  /** How many times `gotoblock` may jump before the experiment is aborted */
  maxBlockJumps: number;
  /** Directories searched for experiment files given by relative name */
  experimentRoots: string[];
}

const UHF_OSCILLATORS: LocalOscillators = { lo1: [812], lo2: [128, 122] };

export const DEFAULT_CONFIG: AnalyzerConfig = {
  radar: 'UHF',
  oscillators: {
    UHF: UHF_OSCILLATORS,
    VHF: { lo1: [298, 298], lo2: [84, 84] },
    ESR: { lo1: [419, 435, 419, 435], lo2: [81.25, 81.25, 81.25, 81.25] },
    // The remote sites receive the UHF signal through the same chain
    KIR: UHF_OSCILLATORS,
    SOD: UHF_OSCILLATORS,
  },
  maxLoopIterations: 1000,
  maxBlockJumps: 100,
  experimentRoots: ['/kst/exp', 'kst/exp'],
};

export function copyOscillators(oscillators: LocalOscillators): LocalOscillators {
  return { lo1: [...oscillators.lo1], lo2: [...oscillators.lo2] };
}
