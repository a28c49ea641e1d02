/**
 * Experiment Session State
 *
 * What the operator commands of an experiment script leave behind: the
 * radar the script runs at, the local oscillator settings, and the files
 * loaded into the radar controllers, filters and channels. Every console
 * scope carries its own copy; a finished procedure call folds its copy
 * back into the caller's.
 */

import { existsSync, statSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { ExperimentFileError } from '../errors.js';
import {
  CHANNEL_NUMBERS,
  DEFAULT_CONFIG,
  copyOscillators,
  type AnalyzerConfig,
  type ChannelNumber,
  type LocalOscillators,
  type RadarSite,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface LoadedFiles {
  /** Compiled controller program of the receiver */
  rbin: string;
  /** Compiled controller program of the transmitter */
  tbin: string;
  /** Last filter loaded with `loadfilter` */
  filter: string;
  /** Correlator file given to `startdata` */
  fil: string;
  /** NCO file per channel, from `loadfrequency` */
  nco: Partial<Record<ChannelNumber, string>>;
}

export type StartTimeDevice = 'e' | 'b' | 'r' | 't' | 'c';

export interface ExperimentState {
  radar: RadarSite;
  /** Antenna; defaults to the radar name. ESR scripts use 32m/42m/32p/42p. */
  antenna: string;
  oscillators: LocalOscillators;
  files: LoadedFiles;
  /** Arguments following the start time of `runexperiment` */
  argv: string[];
  startTimes: Record<StartTimeDevice, number>;
}

export interface ExperimentFile {
  directory: string;
  /** File name without directory and extension */
  name: string;
  path: string;
}

// =============================================================================
// State
// =============================================================================

export function createExperimentState(
  radar: RadarSite = DEFAULT_CONFIG.radar,
  antenna: string = radar,
  config: Pick<AnalyzerConfig, 'oscillators'> = DEFAULT_CONFIG
): ExperimentState {
  return {
    radar,
    antenna,
    oscillators: copyOscillators(config.oscillators[radar]),
    files: { rbin: '', tbin: '', filter: '', fil: '', nco: {} },
    argv: [],
    startTimes: { e: -1, b: -1, r: -1, t: -1, c: -1 },
  };
}

export function cloneExperimentState(state: ExperimentState): ExperimentState {
  return {
    ...state,
    oscillators: copyOscillators(state.oscillators),
    files: { ...state.files, nco: { ...state.files.nco } },
    argv: [...state.argv],
    startTimes: { ...state.startTimes },
  };
}

/**
 * Take over what a procedure or block loaded. The caller keeps its own
 * argument vector.
 */
export function mergeExperimentState(parent: ExperimentState, child: ExperimentState): void {
  parent.oscillators = copyOscillators(child.oscillators);
  parent.files = { ...child.files, nco: { ...child.files.nco } };
  parent.startTimes = { ...child.startTimes };
}

/**
 * NCO files bound to channels, in channel order
 */
export function channelFiles(state: ExperimentState): Array<[ChannelNumber, string]> {
  const bound: Array<[ChannelNumber, string]> = [];
  for (const ch of CHANNEL_NUMBERS) {
    const file = state.files.nco[ch];
    if (file !== undefined && file !== '') {
      bound.push([ch, file]);
    }
  }
  return bound;
}

// =============================================================================
// Files
// =============================================================================

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Find an experiment file. The name may be a path of its own or relative to
 * one of the experiment roots; a leading root is stripped before the roots
 * are searched.
 *
 * @throws ExperimentFileError when no candidate exists
 */
export function findExperimentFile(
  filename: string,
  ending: string = '.elan',
  roots: readonly string[] = DEFAULT_CONFIG.experimentRoots
): ExperimentFile {
  const withEnding = filename.endsWith(ending) ? filename : filename + ending;
  let relative = withEnding;
  for (const root of roots) {
    const prefix = root.endsWith('/') ? root : `${root}/`;
    if (relative.startsWith(prefix)) {
      relative = relative.slice(prefix.length);
      break;
    }
  }

  const candidates = [withEnding, ...roots.map((root) => join(root, relative))];
  const path = candidates.find(isFile);
  if (path === undefined) {
    throw new ExperimentFileError(filename, candidates);
  }
  return { directory: dirname(path), name: basename(path, extname(path)), path };
}

/**
 * Controller program compiled into a binary: same name, `.tlan` extension
 */
export function controllerProgramPath(binary: string): string {
  const extension = extname(binary);
  return (extension === '' ? binary : binary.slice(0, -extension.length)) + '.tlan';
}

/**
 * Receiver setup left behind by a script, as text
 */
export function formatSessionState(state: ExperimentState): string {
  const lines = [
    `Radar: ${state.radar} (antenna ${state.antenna})`,
    `lo1: ${state.oscillators.lo1.join(', ')} MHz`,
    `lo2: ${state.oscillators.lo2.join(', ')} MHz`,
    `Receiver program: ${state.files.rbin || '-'}`,
    `Transmitter program: ${state.files.tbin || '-'}`,
  ];
  for (const [ch, file] of channelFiles(state)) {
    lines.push(`CH${ch} NCO file: ${file}`);
  }
  return lines.join('\n');
}
