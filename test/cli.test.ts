/**
 * Command Line Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseCliArguments } from '../src/index.js';

describe('parseCliArguments', () => {
  it('should default to UHF text output', () => {
    assert.deepStrictEqual(parseCliArguments(['tlan', 'demo.tlan']), {
      json: false,
      colors: true,
      logLevel: null,
      radar: 'UHF',
      positional: ['tlan', 'demo.tlan'],
    });
  });

  it('should take flags anywhere', () => {
    const options = parseCliArguments(['experiment', '--json', 'exp.elan', '--no-color', '2']);
    assert.strictEqual(options.json, true);
    assert.strictEqual(options.colors, false);
    assert.deepStrictEqual(options.positional, ['experiment', 'exp.elan', '2']);
  });

  it('should read the radar and log level values', () => {
    const options = parseCliArguments(['--radar', 'esr', '--log-level', 'DEBUG', 'mnemonics']);
    assert.strictEqual(options.radar, 'ESR');
    assert.strictEqual(options.logLevel, 'debug');
    assert.deepStrictEqual(options.positional, ['mnemonics']);
  });

  it('should refuse bad values', () => {
    assert.throws(() => parseCliArguments(['--radar', 'MARS']), /--radar takes one of UHF, VHF, ESR, KIR, SOD/);
    assert.throws(() => parseCliArguments(['--log-level']), /--log-level takes one of debug, info, warn, error, silent/);
  });

  it('should refuse unknown options', () => {
    assert.throws(() => parseCliArguments(['--verbose']), /Unknown option --verbose/);
  });
});
