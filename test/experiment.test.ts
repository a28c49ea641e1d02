/**
 * Experiment Assembly Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Experiment,
  analyzeProgram,
  formatMicroseconds,
  formatSubcycle,
  furthestFullRange,
  loadExperiment,
  nearestRange,
  runExperimentScript,
} from '../src/experiment.js';
import { createLogger } from '../src/logger.js';
import { ControllerInterpreter } from '../src/tarlan/interpreter.js';
import { TimeInterval } from '../src/time-interval.js';
import { DEFAULT_CONFIG, SPEED_OF_LIGHT, US } from '../src/types.js';

const quiet = createLogger('test', { level: 'silent' });

const PROGRAM = `AT 0 AD1L,NCOSEL0
AT 10 PHA0
AT 20 RFON
AT 21 PHA180
AT 22 PHA0
AT 24 RFOFF
AT 30 RXPROT
AT 50 RXPOFF
AT 60 CH1
AT 400 CH1OFF
SETTCR 500
AT 20 RFON
AT 100 CH2
AT 110 RFOFF
AT 300 CH2OFF
SETTCR 0
AT 1000 REP
`;

const analyze = () => analyzeProgram(PROGRAM, { name: 'demo', logger: quiet, channelTables: { 1: [10] } });

describe('Experiment', () => {
  it('should assemble every subcycle', () => {
    const experiment = analyze();
    assert.deepStrictEqual(experiment.cycle, new TimeInterval(0, 1000 * US));
    assert.strictEqual(experiment.subcycles.length, 2);
    assert.deepStrictEqual(experiment.source, { name: 'demo', radar: 'UHF', ncoFiles: {} });

    const first = experiment.subcycle(0);
    assert.deepStrictEqual(first.interval, new TimeInterval(0, 500 * US));
    assert.deepStrictEqual(first.transmits, [new TimeInterval(20 * US, 24 * US)]);
    assert.deepStrictEqual([...first.receives.keys()], [1]);
    assert.deepStrictEqual([...first.settings.keys()], ['RXPROT']);
    assert.deepStrictEqual(first.phaseIntervals[180], [new TimeInterval(21 * US, 22 * US)]);
    assert.deepStrictEqual(
      first.phaseShifts.map((shift) => shift.event),
      [0, 180, 0]
    );
  });

  it('should estimate the baud length of coded pulses only', () => {
    const experiment = analyze();
    assert.deepStrictEqual(experiment.subcycle(0).baudLengths, [1e-6]);
    assert.deepStrictEqual(experiment.subcycle(1).baudLengths, [null]);
  });

  it('should follow channel frequencies into each subcycle', () => {
    const experiment = analyze();
    assert.deepStrictEqual(experiment.subcycle(0).frequencies.get(1)?.entries(), [{ time: 0, frequency: 930 }]);
    assert.deepStrictEqual(experiment.subcycle(1).frequencies.get(1)?.entries(), [
      { time: 500 * US, frequency: 930 },
    ]);
    assert.strictEqual(experiment.subcycle(0).frequencies.has(2), false);
  });

  it('should report receive windows that overlap a transmit', () => {
    const experiment = analyze();
    assert.strictEqual(experiment.subcycle(0).overlaps.length, 0);
    assert.deepStrictEqual(experiment.overlaps, [
      {
        transmit: new TimeInterval(500 * US + 20 * US, 500 * US + 110 * US),
        channel: 2,
        receive: new TimeInterval(500 * US + 100 * US, 500 * US + 300 * US),
      },
    ]);
  });

  it('should refuse subcycles outside the program', () => {
    assert.throws(() => analyze().subcycle(2), /Select a subcycle between 0 and 1, not 2/);
  });

  it('should need a finished program', () => {
    const controller = new ControllerInterpreter({ logger: quiet });
    controller.step({ time: 0, mnemonic: 'RFON', line: 1 });
    assert.throws(
      () => new Experiment({ name: 'x', radar: 'UHF', ncoFiles: {} }, controller),
      /has not run to its REP/
    );
  });

  it('should convert to plain JSON', () => {
    const json = analyze().toJSON();
    assert.strictEqual(json.subcycles[1].overlaps[0].channel, 2);
    assert.deepStrictEqual(json.subcycles[0].settings, { RXPROT: [{ begin: 30 * US, end: 50 * US }] });
    assert.deepStrictEqual(json.subcycles[0].frequencies, { 1: [{ time: 0, frequency: 930 }] });
    assert.deepStrictEqual(JSON.parse(JSON.stringify(json)).cycle, { begin: 0, end: 1000 * US });
  });
});

describe('Ranges', () => {
  it('should compute the nearest and furthest ranges', () => {
    const transmit = new TimeInterval(0, 10);
    const receive = new TimeInterval(20, 30);
    assert.strictEqual(nearestRange(transmit, receive, 2, 2), 12);
    assert.strictEqual(furthestFullRange(transmit, receive, 2), 20);
  });

  it('should default to the speed of light', () => {
    assert.strictEqual(furthestFullRange(new TimeInterval(0, 0), new TimeInterval(0, 2)), SPEED_OF_LIGHT);
  });
});

describe('Text summary', () => {
  it('should round to nanoseconds', () => {
    assert.strictEqual(formatMicroseconds(0), '0');
    assert.strictEqual(formatMicroseconds(1.5 * US), '1.5');
    assert.strictEqual(formatMicroseconds(1.0004 * US), '1');
  });

  it('should describe a subcycle', () => {
    const [first, second] = analyze().subcycles;
    assert.strictEqual(
      formatSubcycle(first),
      [
        'Subcycle 1: 0-500 µs',
        '  RF      20-24',
        '  CH1     60-400',
        '  RXPROT  30-50',
        '  baud    1',
        '  f(CH1) 930 MHz at 0',
      ].join('\n')
    );
    assert.strictEqual(
      formatSubcycle(second),
      [
        'Subcycle 2: 500-1000 µs',
        '  RF      520-610',
        '  CH2     600-800',
        '  f(CH1) 930 MHz at 500',
        '  overlap RF 520-610 with CH2 600-800',
      ].join('\n')
    );
  });
});

describe('Loading from experiment files', () => {
  const config = { ...DEFAULT_CONFIG, experimentRoots: [] };

  async function withExperiment(script: string, run: (dir: string) => Promise<void>): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), 'experiment-'));
    try {
      await writeFile(join(dir, 'exp.elan'), script);
      await writeFile(join(dir, 'demo.tlan'), 'AT 0 AD1L,NCOSEL1\nAT 10 RFON\nAT 20 RFOFF\nAT 30 CH1\nAT 90 CH1OFF\nAT 100 REP\n');
      await writeFile(join(dir, 'ch1.nco'), 'NCOPAR_VS 0.1\nNCO 0 10\nNCO 1 12\n');
      await run(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  it('should replay the program the script loads', async () => {
    const script = 'loadradar receiver -f demo.rbin\nloadfrequency ch1.nco 1\nselectlo 1 130\n';
    await withExperiment(script, async (dir) => {
      const experiment = await loadExperiment(join(dir, 'exp.elan'), { config, logger: quiet });
      assert.deepStrictEqual(experiment.source, {
        name: 'exp',
        radar: 'UHF',
        script: join(dir, 'exp.elan'),
        program: join(dir, 'demo.tlan'),
        ncoFiles: { 1: 'ch1.nco' },
      });
      const [subcycle] = experiment.subcycles;
      assert.deepStrictEqual(subcycle.transmits, [new TimeInterval(10 * US, 20 * US)]);
      assert.deepStrictEqual(subcycle.frequencies.get(1)?.entries(), [{ time: 0, frequency: 930 }]);
    });
  });

  it('should refuse a script without a controller program', async () => {
    await withExperiment('selectlo 1 130\n', async (dir) => {
      await assert.rejects(loadExperiment(join(dir, 'exp.elan'), { config, logger: quiet }), /Experiment exp loads no controller program/);
    });
  });

  it('should return the session state of a script', async () => {
    await withExperiment('loadradar transmitter -f demo.tbin\nputs [argv]\n', async (dir) => {
      let output = '';
      const state = runExperimentScript(join(dir, 'exp.elan'), {
        config,
        args: ['x', 'y z'],
        logger: quiet,
        output: (text) => {
          output += text;
        },
      });
      assert.strictEqual(state.files.tbin, 'demo.tbin');
      assert.strictEqual(output, 'x y z\n');
    });
  });
});
