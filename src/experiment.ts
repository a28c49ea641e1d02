/**
 * Experiment Assembly
 *
 * Turns a replayed controller program into per-subcycle timelines: transmit
 * and receive windows, the other hardware settings, phase events, baud
 * lengths and channel frequencies. `loadExperiment` runs the whole chain
 * from an experiment script.
 *
 * This is the shape handed to anything that draws timing diagrams.
 */

import { basename, join } from 'node:path';
import { ExperimentFileError, errorMessage } from './errors.js';
import { createExperimentConsole } from './eros/catalog.js';
import { channelFiles, controllerProgramPath, findExperimentFile, type ExperimentState } from './eros/session.js';
import { FrequencySeries, type FrequencyPoint } from './frequency-series.js';
import { loggers, type Logger } from './logger.js';
import { loadNcoFile } from './nco.js';
import { ControllerInterpreter, type ControllerOptions, type ControllerWarning } from './tarlan/interpreter.js';
import type { SubcycleSnapshot } from './tarlan/subcycles.js';
import { formatList } from './tcl/parser.js';
import { TimeInterval } from './time-interval.js';
import {
  CHANNEL_NUMBERS,
  DEFAULT_CONFIG,
  SETTING_NAMES,
  SPEED_OF_LIGHT,
  US,
  type AnalyzerConfig,
  type ChannelNumber,
  type Phase,
  type RadarSite,
  type SettingName,
  type StreamName,
  type TimedEvent,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface Overlap {
  transmit: TimeInterval;
  channel: ChannelNumber;
  receive: TimeInterval;
}

export interface SubcycleTiming {
  index: number;
  interval: TimeInterval;
  transmits: TimeInterval[];
  receives: Map<ChannelNumber, TimeInterval[]>;
  settings: Map<SettingName, TimeInterval[]>;
  /** Intervals during which the phase shifter held each phase */
  phaseIntervals: Record<Phase, TimeInterval[]>;
  phaseShifts: TimedEvent<Phase>[];
  /** Estimated baud length [s] of each transmit, null without phase shifts */
  baudLengths: Array<number | null>;
  /** Channel center frequencies [MHz] during the subcycle */
  frequencies: Map<ChannelNumber, FrequencySeries>;
  overlaps: Overlap[];
}

export interface ExperimentSource {
  name: string;
  radar: RadarSite;
  /** Experiment script, when the experiment was loaded from one */
  script?: string;
  program?: string;
  /** NCO file per channel */
  ncoFiles: Partial<Record<ChannelNumber, string>>;
}

type IntervalJSON = { begin: number; end: number };

export interface SubcycleJSON {
  index: number;
  interval: IntervalJSON;
  transmits: IntervalJSON[];
  receives: Record<string, IntervalJSON[]>;
  settings: Record<string, IntervalJSON[]>;
  phaseShifts: TimedEvent<Phase>[];
  baudLengths: Array<number | null>;
  frequencies: Record<string, FrequencyPoint[]>;
  overlaps: Array<{ transmit: IntervalJSON; channel: ChannelNumber; receive: IntervalJSON }>;
}

export interface ExperimentJSON {
  source: ExperimentSource;
  cycle: IntervalJSON;
  filtersStartedAt: number | null;
  warnings: ControllerWarning[];
  subcycles: SubcycleJSON[];
}

// =============================================================================
// Range helpers
// =============================================================================

/**
 * Nearest range [m] the receive window measures after a transmit. Only the
 * last baud of the pulse is seen at this range.
 */
export function nearestRange(
  transmit: TimeInterval,
  receive: TimeInterval,
  baudLength: number,
  speed: number = SPEED_OF_LIGHT
): number {
  return (speed * (receive.begin - transmit.end + baudLength)) / 2;
}

/**
 * Furthest range [m] at which the receive window sees the whole pulse.
 */
export function furthestFullRange(
  transmit: TimeInterval,
  receive: TimeInterval,
  speed: number = SPEED_OF_LIGHT
): number {
  return (speed * (receive.end - transmit.end)) / 2;
}

// =============================================================================
// Assembly
// =============================================================================

/**
 * Frequencies during an interval. A channel whose first frequency comes
 * after the interval begins starts at that first frequency.
 */
function frequenciesWithin(series: FrequencySeries, interval: TimeInterval): FrequencySeries | null {
  if (series.at(interval.begin) !== null) {
    return series.shiftsWithin(interval);
  }
  const inside = series.entries().filter((p) => p.time >= interval.begin && p.time < interval.end);
  return inside.length > 0 ? new FrequencySeries(inside) : null;
}

function assembleSubcycle(snapshot: SubcycleSnapshot, controller: ControllerInterpreter): SubcycleTiming {
  const streams = (name: StreamName): TimeInterval[] => [
    ...(snapshot.streams.get(name) ?? []),
  ];

  const transmits = streams('RF');
  const receives = new Map<ChannelNumber, TimeInterval[]>();
  const frequencies = new Map<ChannelNumber, FrequencySeries>();
  const overlaps: Overlap[] = [];

  for (const ch of CHANNEL_NUMBERS) {
    const windows = streams(`CH${ch}`);
    if (windows.length > 0) {
      receives.set(ch, windows);
    }
    for (const receive of windows) {
      for (const transmit of transmits) {
        if (transmit.overlapsWith(receive)) {
          overlaps.push({ transmit, channel: ch, receive });
        }
      }
    }
    const series = frequenciesWithin(controller.frequencySeries(ch), snapshot.interval);
    if (series !== null) {
      frequencies.set(ch, series);
    }
  }

  const settings = new Map<SettingName, TimeInterval[]>();
  for (const name of SETTING_NAMES) {
    const windows = streams(name);
    if (windows.length > 0) {
      settings.set(name, windows);
    }
  }

  return {
    index: snapshot.index,
    interval: snapshot.interval,
    transmits,
    receives,
    settings,
    phaseIntervals: { 0: streams('+'), 180: streams('-') },
    phaseShifts: controller.phaseShifter.phaseShiftsWithin(snapshot.interval),
    baudLengths: transmits.map((transmit) => controller.phaseShifter.estimateBaudLength(transmit)),
    frequencies,
    overlaps,
  };
}

const intervalJSON = (interval: TimeInterval): IntervalJSON => interval.toJSON();

function recordJSON<K extends string | number, V, R>(map: ReadonlyMap<K, V>, convert: (value: V) => R): Record<string, R> {
  const record: Record<string, R> = {};
  for (const [key, value] of map) {
    record[String(key)] = convert(value);
  }
  return record;
}

export class Experiment {
  readonly cycle: TimeInterval;
  readonly subcycles: readonly SubcycleTiming[];
  readonly warnings: readonly ControllerWarning[];
  readonly filtersStartedAt: number | null;

  constructor(
    readonly source: ExperimentSource,
    controller: ControllerInterpreter
  ) {
    if (!controller.isFinished) {
      throw new Error('The controller program has not run to its REP');
    }
    this.cycle = new TimeInterval(0, controller.endTime);
    this.subcycles = controller.subcycles.all().map((snapshot) => assembleSubcycle(snapshot, controller));
    this.warnings = [...controller.warnings];
    this.filtersStartedAt = controller.filtersStartedAt;
  }

  /**
   * @throws RangeError for an index outside the program
   */
  subcycle(index: number): SubcycleTiming {
    const timing = this.subcycles[index];
    if (timing === undefined) {
      throw new RangeError(`Select a subcycle between 0 and ${this.subcycles.length - 1}, not ${index}`);
    }
    return timing;
  }

  get overlaps(): Overlap[] {
    return this.subcycles.flatMap((s) => s.overlaps);
  }

  toJSON(): ExperimentJSON {
    return {
      source: this.source,
      cycle: intervalJSON(this.cycle),
      filtersStartedAt: this.filtersStartedAt,
      warnings: [...this.warnings],
      subcycles: this.subcycles.map((s) => ({
        index: s.index,
        interval: intervalJSON(s.interval),
        transmits: s.transmits.map(intervalJSON),
        receives: recordJSON(s.receives, (windows) => windows.map(intervalJSON)),
        settings: recordJSON(s.settings, (windows) => windows.map(intervalJSON)),
        phaseShifts: s.phaseShifts,
        baudLengths: s.baudLengths,
        frequencies: recordJSON(s.frequencies, (series) => series.entries()),
        overlaps: s.overlaps.map((o) => ({
          transmit: intervalJSON(o.transmit),
          channel: o.channel,
          receive: intervalJSON(o.receive),
        })),
      })),
    };
  }
}

/**
 * Replay controller program text and assemble it
 */
export function analyzeProgram(
  text: string,
  options: ControllerOptions & { name?: string; radar?: RadarSite } = {}
): Experiment {
  const controller = new ControllerInterpreter(options).runText(text);
  return new Experiment({ name: options.name ?? 'program', radar: options.radar ?? DEFAULT_CONFIG.radar, ncoFiles: {} }, controller);
}

// =============================================================================
// Loading from experiment files
// =============================================================================

export interface LoadOptions {
  radar?: RadarSite;
  antenna?: string;
  /** Arguments after the start time, as given to runexperiment */
  args?: string[];
  config?: AnalyzerConfig;
  /** Receives `puts` output of the script; dropped by default */
  output?: (text: string) => void;
  logger?: Logger;
}

/**
 * Find a file referenced by an experiment script: where the script says,
 * under the experiment roots, or next to the script itself.
 */
function resolveReferenced(file: string, ending: string, directory: string, roots: readonly string[]): string {
  try {
    return findExperimentFile(file, ending, roots).path;
  } catch (error) {
    if (!(error instanceof ExperimentFileError)) throw error;
    return findExperimentFile(join(directory, basename(file)), ending, []).path;
  }
}

/**
 * Run the console script and return the session state it leaves behind
 */
export function runExperimentScript(path: string, options: LoadOptions = {}): ExperimentState {
  const config = options.config ?? DEFAULT_CONFIG;
  const interp = createExperimentConsole({
    radar: options.radar ?? config.radar,
    antenna: options.antenna,
    config,
    output: options.output ?? (() => undefined),
    logger: options.logger?.child('eros'),
  });
  interp.evaluate(`runexperiment ${formatList([path, '0', ...(options.args ?? [])])}`);
  return interp.root.state;
}

/**
 * Load an experiment from its console script: run the script, find the
 * controller program and NCO files it loaded, replay the program.
 *
 * @throws ExperimentFileError when the script or the controller program is missing
 */
export async function loadExperiment(elanPath: string, options: LoadOptions = {}): Promise<Experiment> {
  const config = options.config ?? DEFAULT_CONFIG;
  const log = options.logger ?? loggers.experiment;
  const script = findExperimentFile(elanPath, '.elan', config.experimentRoots);
  log.info(`Loading experiment ${script.name} from ${script.path}`);

  const state = runExperimentScript(script.path, options);
  const binary = state.files.rbin !== '' ? state.files.rbin : state.files.tbin;
  if (binary === '') {
    throw new Error(`Experiment ${script.name} loads no controller program`);
  }
  const program = resolveReferenced(controllerProgramPath(binary), '.tlan', script.directory, config.experimentRoots);

  const channelTables: Partial<Record<ChannelNumber, number[]>> = {};
  for (const [ch, file] of channelFiles(state)) {
    try {
      channelTables[ch] = await loadNcoFile(resolveReferenced(file, '.nco', script.directory, config.experimentRoots));
    } catch (error) {
      log.warn(`No frequencies for channel ${ch}: ${errorMessage(error)}`);
    }
  }

  const controller = ControllerInterpreter.fromReceiverConfig(
    {
      lo1: state.oscillators.lo1,
      lo2: state.oscillators.lo2,
      channelTables,
    },
    options.logger?.child('tarlan')
  );
  await controller.runFile(program);
  log.debug(`Program ${program} ran for ${controller.endTime / US} µs`);

  return new Experiment(
    {
      name: script.name,
      radar: state.radar,
      script: script.path,
      program,
      ncoFiles: { ...state.files.nco },
    },
    controller
  );
}

// =============================================================================
// Text summaries
// =============================================================================

/** Seconds as µs, rounded to ns */
export function formatMicroseconds(seconds: number): string {
  return String(Math.round((seconds / US) * 1000) / 1000);
}

function formatWindows(windows: readonly TimeInterval[]): string {
  return windows.map((w) => `${formatMicroseconds(w.begin)}-${formatMicroseconds(w.end)}`).join(', ');
}

/**
 * One subcycle as text, all times in µs
 */
export function formatSubcycle(timing: SubcycleTiming): string {
  const lines = [
    `Subcycle ${timing.index + 1}: ${formatWindows([timing.interval])} µs`,
    `  RF      ${formatWindows(timing.transmits)}`,
  ];
  for (const [ch, windows] of timing.receives) {
    lines.push(`  CH${ch}     ${formatWindows(windows)}`);
  }
  for (const [name, windows] of timing.settings) {
    lines.push(`  ${name.padEnd(8)}${formatWindows(windows)}`);
  }
  const bauds = timing.baudLengths.filter((b): b is number => b !== null);
  if (bauds.length > 0) {
    lines.push(`  baud    ${bauds.map(formatMicroseconds).join(', ')}`);
  }
  for (const [ch, series] of timing.frequencies) {
    const points = series.entries().map((p) => `${p.frequency} MHz at ${formatMicroseconds(p.time)}`);
    lines.push(`  f(CH${ch}) ${points.join(', ')}`);
  }
  for (const overlap of timing.overlaps) {
    lines.push(
      `  overlap RF ${formatWindows([overlap.transmit])} with CH${overlap.channel} ${formatWindows([overlap.receive])}`
    );
  }
  return lines.join('\n');
}
