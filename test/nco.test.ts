/**
 * NCO Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Nco, loadNcoFile, parseNcoFile } from '../src/nco.js';
import { NcoFormatError } from '../src/errors.js';

const HEADER = `NCOPAR_VS       0.1
%======================================
% test_ch1
%======================================
`;

function isNcoError(kind: string, line: number) {
  return (error: unknown) => error instanceof NcoFormatError && error.kind === kind && error.line === line;
}

describe('parseNcoFile', () => {
  it('should read the frequency table', () => {
    const text = `${HEADER}NCO\t0\t 10.4\t% f12
NCO\t1\t 10.1\t% f13
NCO\t2\t 10.1\t% f13
NCO\t3\t 10.4\t% f12
`;
    assert.deepStrictEqual(parseNcoFile(text), [10.4, 10.1, 10.1, 10.4]);
  });

  it('should need the version line first', () => {
    assert.throws(() => parseNcoFile('NCO 0 10.4\n'), isNcoError('version', 1));
    assert.throws(() => parseNcoFile('NCOPAR_VS 0.2\nNCO 0 10.4\n'), isNcoError('version', 1));
    assert.throws(() => parseNcoFile('% only a comment\n'), isNcoError('version', 0));
  });

  it('should refuse text left outside a comment', () => {
    const text = `${HEADER}NCO 0 10.4 % f12
NCO 1 10.1 f13
`;
    assert.throws(() => parseNcoFile(text), isNcoError('malformed', 6));
  });

  it('should refuse entries out of sequence', () => {
    const text = `${HEADER}NCO 0 10.4
NCO 2 10.1
`;
    assert.throws(() => parseNcoFile(text), isNcoError('malformed', 6));
  });

  it('should refuse a frequency that is not a number', () => {
    const text = `${HEADER}NCO 0 ten
`;
    assert.throws(() => parseNcoFile(text), isNcoError('frequency', 5));
  });

  it('should load a table from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'nco-'));
    try {
      const path = join(dir, 'ch1.nco');
      await writeFile(path, `${HEADER}NCO 0 12.5\nNCO 1 11.5\n`);
      assert.deepStrictEqual(await loadNcoFile(path), [12.5, 11.5]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('Nco', () => {
  it('should mix both local oscillators down by the selected entry', () => {
    const nco = new Nco({ lo1: 500, lo2: 30, table: [10.5, 12.25] });
    assert.strictEqual(nco.isReady, false);
    nco.select(1);
    assert.strictEqual(nco.isReady, true);
    assert.strictEqual(nco.frequency(), 517.75);
  });

  it('should follow oscillator changes', () => {
    const nco = new Nco({ table: [10] });
    nco.select(0);
    assert.throws(() => nco.frequency(), /Local oscillator frequencies are not set/);
    nco.setLo1(812);
    nco.setLo2(128);
    assert.strictEqual(nco.frequency(), 930);
    nco.setLo2(120);
    assert.strictEqual(nco.frequency(), 922);
  });

  it('should not be ready without a table', () => {
    const nco = new Nco({ lo1: 1, lo2: 2 });
    nco.select(0);
    assert.strictEqual(nco.hasTable, false);
    assert.strictEqual(nco.isReady, false);
    assert.throws(() => nco.frequency(), /No NCO table has been loaded/);
    nco.loadTable([0.5]);
    assert.strictEqual(nco.frequency(), 2.5);
  });

  it('should refuse an entry outside the table', () => {
    const nco = new Nco({ lo1: 1, lo2: 2, table: [0.5] });
    assert.throws(() => nco.frequency(), /No NCO entry has been selected/);
    nco.select(5);
    assert.strictEqual(nco.isReady, false);
    assert.throws(() => nco.frequency(), /NCO entry 5 is not in the loaded table/);
  });
});
