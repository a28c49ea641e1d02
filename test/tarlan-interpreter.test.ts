/**
 * Controller Interpreter Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ControllerInterpreter, interpretProgram } from '../src/tarlan/interpreter.js';
import { ControllerProgramError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { TimeInterval } from '../src/time-interval.js';
import { US } from '../src/types.js';

const quiet = createLogger('test', { level: 'silent' });

const TWO_SUBCYCLES = `% two pulses
SETTCR 0
AT 10 PHA0
AT 40 RFON
AT 41 PHA180
AT 42 PHA0
AT 220 RFOFF
AT 300 CH1
AT 1500 ALLOFF
SETTCR 1505
AT 40 RFON
AT 220 RFOFF
AT 300 CH2
AT 1400 CH2OFF
SETTCR 0
AT 3010 REP
`;

function run(text: string, interpreter = new ControllerInterpreter({ logger: quiet })): ControllerInterpreter {
  return interpreter.runText(text);
}

describe('ControllerInterpreter', () => {
  it('should split the cycle at every SETTCR', () => {
    const interpreter = run(TWO_SUBCYCLES);
    assert.strictEqual(interpreter.isFinished, true);
    assert.strictEqual(interpreter.endTime, 3010 * US);
    assert.deepStrictEqual(interpreter.cycle.intervals, [new TimeInterval(0, 3010 * US)]);
    assert.deepStrictEqual(interpreter.subcycles.intervals, [
      new TimeInterval(0, 1505 * US),
      new TimeInterval(1505 * US, 3010 * US),
    ]);
    assert.deepStrictEqual(interpreter.warnings, []);
  });

  it('should end the cycle at the absolute REP time', () => {
    const interpreter = run(
      'SETTCR 0\nAT 40 RFON\nAT 220 RFOFF\nAT 1500 ALLOFF\nSETTCR 1505\nAT 40 RFON\nAT 220 RFOFF\nAT 3010 REP'
    );
    assert.strictEqual(interpreter.endTime, 3010 * US);
    assert.deepStrictEqual(interpreter.subcycles.intervals, [
      new TimeInterval(0, 1505 * US),
      new TimeInterval(1505 * US, 3010 * US),
    ]);
  });

  it('should time commands relative to the time control register', () => {
    const [first, second] = run(TWO_SUBCYCLES).subcycles.all();
    assert.deepStrictEqual(first.streams.get('RF'), [new TimeInterval(40 * US, 220 * US)]);
    assert.deepStrictEqual(first.streams.get('CH1'), [new TimeInterval(300 * US, 1500 * US)]);
    assert.deepStrictEqual(second.streams.get('RF'), [new TimeInterval(1505 * US + 40 * US, 1505 * US + 220 * US)]);
    assert.deepStrictEqual(second.streams.get('CH2'), [new TimeInterval(1505 * US + 300 * US, 1505 * US + 1400 * US)]);
    assert.deepStrictEqual(second.streams.get('CH1'), []);
  });

  it('should carry the phase across a subcycle boundary', () => {
    const interpreter = run(TWO_SUBCYCLES);
    const [first, second] = interpreter.subcycles.all();
    assert.deepStrictEqual(first.streams.get('+'), [
      new TimeInterval(10 * US, 41 * US),
      new TimeInterval(42 * US, 1505 * US),
    ]);
    assert.deepStrictEqual(first.streams.get('-'), [new TimeInterval(41 * US, 42 * US)]);
    assert.deepStrictEqual(second.streams.get('+'), [new TimeInterval(1505 * US, 3010 * US)]);
    assert.deepStrictEqual(
      interpreter.phaseShifter.phaseShifts.map((shift) => shift.event),
      [0, 180, 0]
    );
  });

  it('should refuse a channel left on at the end of a subcycle', () => {
    assert.throws(
      () => run('SETTCR 0\nAT 10 CH1\nSETTCR 100\nAT 200 REP'),
      (error: unknown) =>
        error instanceof ControllerProgramError &&
        error.line === 3 &&
        error.message === 'The .tlan file has errors in line 3: Data stream CH1 is still on at the end of subcycle 0!'
    );
  });

  it('should refuse to turn a stream on twice', () => {
    assert.throws(() => run('AT 10 RFON\nAT 20 RFON\nAT 30 REP'), /line 2: Data stream RF is already on!/);
  });

  it('should require REP at the end', () => {
    assert.throws(() => run('AT 10 RFON\nAT 20 RFOFF'), /line 2: The program must end with REP/);
    assert.throws(() => run(''), /The program must end with REP/);
  });

  it('should refuse commands after REP', () => {
    const interpreter = run('AT 10 REP');
    assert.throws(() => interpreter.step({ time: 0, mnemonic: 'RFON', line: 5 }), /RFON follows REP/);
  });

  it('should warn about unknown mnemonics and go on', () => {
    const interpreter = run('AT 10 FOO\nAT 15 RFON\nAT 16 RFOFF\nAT 20 REP');
    assert.deepStrictEqual(interpreter.warnings, [
      { line: 1, mnemonic: 'FOO', message: 'Command FOO, called from line 1 is not implemented' },
    ]);
    assert.deepStrictEqual(interpreter.subcycles.subcycle(0).streams.get('RF'), [new TimeInterval(15 * US, 16 * US)]);
  });

  it('should warn about SETTCR 0 in the middle of a program', () => {
    const interpreter = run('AT 10 RFON\nAT 20 RFOFF\nSETTCR 0\nAT 30 CH1\nAT 40 CH1OFF\nAT 50 REP');
    assert.strictEqual(interpreter.warnings.length, 1);
    assert.strictEqual(interpreter.warnings[0].mnemonic, 'SETTCR');
    assert.strictEqual(interpreter.warnings[0].line, 3);
    assert.strictEqual(interpreter.subcycles.count, 1);
  });

  it('should close every channel on ALLOFF', () => {
    const interpreter = run('AT 10 CH1,CH5\nAT 20 ALLOFF\nAT 30 REP');
    const streams = interpreter.subcycles.subcycle(0).streams;
    assert.deepStrictEqual(streams.get('CH5'), [new TimeInterval(10 * US, 20 * US)]);
    assert.deepStrictEqual(streams.get('CH2'), []);
  });

  it('should remember the first filter start', () => {
    const interpreter = run('AT 5 STFIR\nAT 10 STFIR\nAT 20 REP');
    assert.strictEqual(interpreter.filtersStartedAt, 5 * US);
  });
});

describe('Channel frequencies', () => {
  it('should follow routing and NCO selection', () => {
    const interpreter = run(
      'AT 0 AD1L\nAT 5 NCOSEL1\nAT 100 AD2L\nAT 200 REP',
      new ControllerInterpreter({ logger: quiet, channelTables: { 1: [10.5, 12.25] } })
    );
    assert.deepStrictEqual(interpreter.frequencySeries(1).entries(), [
      { time: 5 * US, frequency: 927.75 },
      { time: 100 * US, frequency: 921.75 },
    ]);
    assert.strictEqual(interpreter.frequencySeries(2).size, 0);
  });

  it('should record transmitter frequency selections in time order', () => {
    const interpreter = run('AT 10 F3\nAT 50 F15\nAT 20 F1\nAT 100 REP');
    assert.deepStrictEqual(interpreter.transmitterSelections, [
      { time: 10 * US, index: 3 },
      { time: 20 * US, index: 1 },
      { time: 50 * US, index: 15 },
    ]);
    assert.strictEqual(interpreter.transmitterFrequencyAt(5 * US), null);
    assert.strictEqual(interpreter.transmitterFrequencyAt(30 * US), 1);
    assert.strictEqual(interpreter.transmitterFrequencyAt(50 * US), 15);
    assert.deepStrictEqual(interpreter.warnings, []);
  });

  it('should refuse a path without oscillators', () => {
    const interpreter = new ControllerInterpreter({ logger: quiet, oscillators: { lo1: [1], lo2: [2] } });
    assert.throws(() => run('AT 0 AD2L\nAT 10 REP', interpreter), /No local oscillators configured for receiver path 2/);
  });

  it('should build from a receiver setup', () => {
    const interpreter = ControllerInterpreter.fromReceiverConfig(
      { lo1: [298, 298], lo2: [84, 84], channelTables: { 4: [2] } },
      quiet
    );
    run('AT 0 AD1R,NCOSEL0\nAT 10 REP', interpreter);
    assert.deepStrictEqual(interpreter.frequencySeries(4).entries(), [{ time: 0, frequency: 380 }]);
  });
});

describe('interpretProgram', () => {
  it('should replay program text', () => {
    const interpreter = interpretProgram('AT 0 RFON\nAT 1 RFOFF\nAT 2 REP', { logger: quiet });
    assert.strictEqual(interpreter.endTime, 2 * US);
  });

  it('should replay a program file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tlan-'));
    try {
      const path = join(dir, 'pulse.tlan');
      await writeFile(path, 'AT 0 RFON\nAT 1 RFOFF\nAT 2 REP\n');
      const interpreter = await new ControllerInterpreter({ logger: quiet }).runFile(path);
      assert.strictEqual(interpreter.subcycles.count, 1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
