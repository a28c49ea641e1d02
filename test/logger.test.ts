/**
 * Logger Module Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import {
  Logger,
  configureLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  getAvailableLevels,
  createLogger,
  getLoggerConfig,
  loggers,
} from '../src/logger.js';

const defaults = getLoggerConfig();

afterEach(() => {
  configureLogger(defaults);
});

// =============================================================================
// Logger Class Tests
// =============================================================================

describe('Logger', () => {
  it('should keep its module name', () => {
    assert.strictEqual(new Logger('tarlan').getName(), 'tarlan');
  });

  it('should respect an explicit level', () => {
    const logger = new Logger('test', { level: 'warn' });
    assert.strictEqual(logger.getLevel(), 'warn');
  });

  it('should allow changing the level', () => {
    const logger = new Logger('test', { level: 'info' });
    logger.setLevel('debug');
    assert.strictEqual(logger.getLevel(), 'debug');
  });

  it('should follow the global level unless overridden', () => {
    const follower = createLogger('follower');
    const pinned = createLogger('pinned', { level: 'error' });
    configureLogger({ level: 'debug' });
    assert.strictEqual(follower.getLevel(), 'debug');
    assert.strictEqual(pinned.getLevel(), 'error');
  });
});

// =============================================================================
// Formatting Tests
// =============================================================================

describe('Message Formatting', () => {
  beforeEach(() => {
    configureLogger({ timestamps: false, colors: false });
  });

  it('should prefix level and module', () => {
    const logger = createLogger('tarlan');
    assert.strictEqual(logger.formatMessage('warn', 'Unknown mnemonic FOO'), '[WRN] [tarlan] Unknown mnemonic FOO');
    assert.strictEqual(logger.formatMessage('debug', 'step'), '[DBG] [tarlan] step');
  });

  it('should append scalar data on the same line', () => {
    const logger = createLogger('nco');
    assert.strictEqual(logger.formatMessage('info', 'Entries', 3), '[INF] [nco] Entries 3');
  });

  it('should append objects as indented JSON', () => {
    const logger = createLogger('eros');
    assert.strictEqual(
      logger.formatMessage('error', 'Bad state', { lo1: [812] }),
      '[ERR] [eros] Bad state\n{\n  "lo1": [\n    812\n  ]\n}'
    );
  });

  it('should color the prefixes when asked', () => {
    const logger = createLogger('cli', { colors: true });
    assert.strictEqual(
      logger.formatMessage('info', 'ready'),
      '\x1b[34m[INF]\x1b[0m \x1b[36m[cli]\x1b[0m ready'
    );
  });
});

// =============================================================================
// Log Level Tests
// =============================================================================

describe('Log Levels', () => {
  beforeEach(() => {
    setLogLevel('info');
  });

  it('should get and set the global level', () => {
    assert.strictEqual(getLogLevel(), 'info');
    setLogLevel('debug');
    assert.strictEqual(getLogLevel(), 'debug');
  });

  it('should parse levels case-insensitively', () => {
    assert.strictEqual(parseLogLevel('debug'), 'debug');
    assert.strictEqual(parseLogLevel('INFO'), 'info');
    assert.strictEqual(parseLogLevel('WARN'), 'warn');
    assert.strictEqual(parseLogLevel('error'), 'error');
    assert.strictEqual(parseLogLevel('Silent'), 'silent');
  });

  it('should return null for unknown levels', () => {
    assert.strictEqual(parseLogLevel('invalid'), null);
    assert.strictEqual(parseLogLevel(''), null);
    assert.strictEqual(parseLogLevel('trace'), null);
  });

  it('should list levels from most to least verbose', () => {
    assert.deepStrictEqual(getAvailableLevels(), ['debug', 'info', 'warn', 'error', 'silent']);
  });
});

// =============================================================================
// Configuration Tests
// =============================================================================

describe('Logger Configuration', () => {
  it('should merge partial configuration', () => {
    configureLogger({ level: 'debug', stream: 'stderr' });
    const config = getLoggerConfig();
    assert.strictEqual(config.level, 'debug');
    assert.strictEqual(config.stream, 'stderr');
    assert.strictEqual(config.timestamps, defaults.timestamps);
  });

  it('should hand out copies', () => {
    const config = getLoggerConfig();
    config.level = 'error';
    assert.notStrictEqual(getLoggerConfig().level, 'error');
  });
});

// =============================================================================
// Child Logger Tests
// =============================================================================

describe('Child Loggers', () => {
  it('should inherit the parent overrides', () => {
    const parent = createLogger('parent', { level: 'warn' });
    assert.strictEqual(parent.child('child').getLevel(), 'warn');
  });

  it('should nest module names', () => {
    const nested = createLogger('experiment').child('eros').child('tcl');
    assert.strictEqual(nested.getName(), 'experiment:eros:tcl');
  });

  it('should not change the parent when its own level changes', () => {
    const parent = createLogger('parent', { level: 'info' });
    const child = parent.child('child');
    child.setLevel('silent');
    assert.strictEqual(parent.getLevel(), 'info');
  });

  it('should provide a logger per subsystem', () => {
    assert.strictEqual(loggers.tarlan.getName(), 'tarlan');
    assert.strictEqual(loggers.mcp.child('tarlan').getName(), 'mcp:tarlan');
  });
});
