/**
 * Numerically Controlled Oscillator
 *
 * Parses NCO parameter files and tracks the center frequency one receive
 * channel ends up with. The incoming signal has already been mixed down by
 * both local oscillators before the NCO shifts it again:
 *
 *   f_center = lo1 + lo2 − f_nco
 *
 * All frequencies are MHz.
 */

import { readFile } from 'node:fs/promises';
import { NcoFormatError } from './errors.js';
import { loggers } from './logger.js';

const log = loggers.nco;

export const NCO_FILE_VERSION = 'NCOPAR_VS 0.1';

/**
 * Parse the text of an NCO file into its frequency table, indexed by NCO
 * entry number.
 *
 * @throws NcoFormatError
 */
export function parseNcoFile(text: string): number[] {
  const table: number[] = [];
  let versionSeen = false;

  text.split(/\r?\n/).forEach((raw, i) => {
    const lineNumber = i + 1;
    const code = raw.split('%')[0].trim();
    if (code === '') return;

    const tokens = code.split(/\s+/);

    if (!versionSeen) {
      if (tokens.join(' ') !== NCO_FILE_VERSION) {
        throw new NcoFormatError(
          'version',
          `First line must be '${NCO_FILE_VERSION}', got '${code}'`,
          lineNumber
        );
      }
      versionSeen = true;
      return;
    }

    if (tokens.length !== 3 || tokens[0] !== 'NCO') {
      throw new NcoFormatError('malformed', `Expected 'NCO <index> <frequency>', got '${code}'`, lineNumber);
    }

    const index = Number(tokens[1]);
    if (!Number.isInteger(index) || index !== table.length) {
      throw new NcoFormatError(
        'malformed',
        `Expected NCO entry ${table.length}, got '${tokens[1]}'`,
        lineNumber
      );
    }

    const frequency = Number(tokens[2]);
    if (tokens[2] === '' || Number.isNaN(frequency)) {
      throw new NcoFormatError('frequency', `Invalid frequency '${tokens[2]}'`, lineNumber);
    }
    table.push(frequency);
  });

  if (!versionSeen) {
    throw new NcoFormatError('version', `Missing '${NCO_FILE_VERSION}' line`, 0);
  }
  return table;
}

export async function loadNcoFile(path: string): Promise<number[]> {
  const text = await readFile(path, 'utf-8');
  const table = parseNcoFile(text);
  log.debug(`Loaded ${table.length} NCO entries from ${path}`);
  return table;
}

/**
 * Oscillator state of one receive channel
 */
export class Nco {
  private lo1: number | null;
  private lo2: number | null;
  private table: number[] | null;
  private selected: number | null = null;

  constructor(options: { lo1?: number; lo2?: number; table?: number[] } = {}) {
    this.lo1 = options.lo1 ?? null;
    this.lo2 = options.lo2 ?? null;
    this.table = options.table ? [...options.table] : null;
  }

  setLo1(frequency: number): void {
    this.lo1 = frequency;
  }

  setLo2(frequency: number): void {
    this.lo2 = frequency;
  }

  loadTable(table: readonly number[]): void {
    this.table = [...table];
  }

  get hasTable(): boolean {
    return this.table !== null;
  }

  get selectedIndex(): number | null {
    return this.selected;
  }

  select(index: number): void {
    this.selected = index;
  }

  /** All of lo1, lo2, a table and a selected entry present in that table */
  get isReady(): boolean {
    return (
      this.lo1 !== null &&
      this.lo2 !== null &&
      this.table !== null &&
      this.selected !== null &&
      this.selected < this.table.length
    );
  }

  /**
   * Center frequency [MHz] of the channel.
   *
   * @throws Error when any of the inputs is unknown
   */
  frequency(): number {
    if (this.lo1 === null || this.lo2 === null) {
      throw new Error('Local oscillator frequencies are not set');
    }
    if (this.table === null) {
      throw new Error('No NCO table has been loaded');
    }
    if (this.selected === null) {
      throw new Error('No NCO entry has been selected');
    }
    const nco = this.table[this.selected];
    if (nco === undefined) {
      throw new Error(`NCO entry ${this.selected} is not in the loaded table`);
    }
    return this.lo1 + this.lo2 - nco;
  }
}
