#!/usr/bin/env node
/**
 * Radar Timing Entry Point
 *
 * Command line front end and programmatic exports. The CLI reconstructs the
 * timing of controller programs and experiment scripts and prints it as
 * text or JSON.
 */

import { basename } from 'node:path';
import { errorMessage } from './errors.js';
import { formatSessionState } from './eros/session.js';
import { Experiment, formatMicroseconds, formatSubcycle, loadExperiment, runExperimentScript } from './experiment.js';
import { configureLogger, getAvailableLevels, loggers, parseLogLevel, type LogLevel } from './logger.js';
import { describeMnemonic, listMnemonics } from './tarlan/mnemonics.js';
import { ControllerInterpreter } from './tarlan/interpreter.js';
import { DEFAULT_CONFIG, parseRadarSite, type RadarSite } from './types.js';

const log = loggers.cli;

export interface CliOptions {
  json: boolean;
  colors: boolean;
  logLevel: LogLevel | null;
  radar: RadarSite;
  positional: string[];
}

/**
 * Split flags from positional arguments.
 *
 * @throws Error for unknown flags and bad flag values
 */
export function parseCliArguments(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    json: false,
    colors: true,
    logLevel: null,
    radar: DEFAULT_CONFIG.radar,
    positional: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '--no-color':
        options.colors = false;
        break;
      case '--log-level': {
        const level = parseLogLevel(argv[++i] ?? '');
        if (level === null) {
          throw new Error(`--log-level takes one of ${getAvailableLevels().join(', ')}`);
        }
        options.logLevel = level;
        break;
      }
      case '--radar': {
        const radar = parseRadarSite(argv[++i] ?? '');
        if (radar === null) {
          throw new Error('--radar takes one of UHF, VHF, ESR, KIR, SOD');
        }
        options.radar = radar;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option ${arg}`);
        }
        options.positional.push(arg);
    }
  }
  return options;
}

/**
 * 1-based subcycle argument to an index
 */
function subcycleIndex(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Subcycle must be a positive integer, not ${value}`);
  }
  return n - 1;
}

function printExperiment(experiment: Experiment, subcycle: number | null, json: boolean): void {
  if (subcycle !== null) {
    // Validates the index for both output forms
    const timing = experiment.subcycle(subcycle);
    console.log(json ? JSON.stringify(experiment.toJSON().subcycles[subcycle], null, 2) : formatSubcycle(timing));
    return;
  }
  if (json) {
    console.log(JSON.stringify(experiment.toJSON(), null, 2));
    return;
  }

  console.log(
    `${experiment.source.name}: ${experiment.subcycles.length} subcycle(s), cycle ${formatMicroseconds(experiment.cycle.end)} µs`
  );
  for (const timing of experiment.subcycles) {
    console.log(formatSubcycle(timing));
  }
  if (experiment.warnings.length > 0) {
    console.log(`${experiment.warnings.length} unknown mnemonic(s) skipped`);
  }
}

const HELP = `
Radar experiment timing

Commands:
  tlan <file> [subcycle]         Replay a controller program
  elan <file> [args...]          Run an experiment script, show the receiver setup
  experiment <file> [subcycle]   Run a script and replay the program it loads
  mnemonics [prefix]             List controller mnemonics
  help                           Show this help

Options:
  --radar <site>       UHF, VHF, ESR, KIR or SOD (default ${DEFAULT_CONFIG.radar})
  --log-level <level>  ${getAvailableLevels().join(', ')}
  --json               Print JSON instead of text
  --no-color           Plain log output

Usage:
  radar-timing <command> [options]
`;

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const options = parseCliArguments(argv);
  configureLogger({
    colors: options.colors,
    ...(options.logLevel === null ? {} : { level: options.logLevel }),
  });
  const [command, ...args] = options.positional;

  switch (command) {
    case 'tlan': {
      const [path, subcycle] = args;
      if (path === undefined) throw new Error('tlan needs a controller program');
      const controller = new ControllerInterpreter({ oscillators: DEFAULT_CONFIG.oscillators[options.radar] });
      await controller.runFile(path);
      const experiment = new Experiment(
        { name: basename(path), radar: options.radar, program: path, ncoFiles: {} },
        controller
      );
      printExperiment(experiment, subcycleIndex(subcycle), options.json);
      break;
    }

    case 'elan': {
      const [path, ...scriptArgs] = args;
      if (path === undefined) throw new Error('elan needs an experiment script');
      const state = runExperimentScript(path, {
        radar: options.radar,
        args: scriptArgs,
        output: (text) => process.stdout.write(text),
      });
      console.log(options.json ? JSON.stringify(state, null, 2) : formatSessionState(state));
      break;
    }

    case 'experiment': {
      const [path, subcycle] = args;
      if (path === undefined) throw new Error('experiment needs an experiment script');
      const experiment = await loadExperiment(path, { radar: options.radar });
      printExperiment(experiment, subcycleIndex(subcycle), options.json);
      break;
    }

    case 'mnemonics': {
      const names = listMnemonics(args[0] ?? '');
      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(names.map((n) => [n, describeMnemonic(n) ?? ''])), null, 2));
      } else {
        for (const name of names) {
          console.log(`${name.padEnd(12)}${describeMnemonic(name) ?? ''}`);
        }
      }
      break;
    }

    case 'help':
    case undefined:
      console.log(HELP);
      break;

    default:
      throw new Error(`Unknown command ${command}. Run "radar-timing help".`);
  }
}

// Run if executed directly
const isMain = import.meta.url === `file://${process.argv[1]}`;
if (isMain) {
  main().catch((error) => {
    log.error(errorMessage(error));
    process.exit(1);
  });
}

// Exports for programmatic use
export { DEFAULT_CONFIG } from './types.js';
export * from './errors.js';
export { TimeInterval } from './time-interval.js';
export { IntervalStream } from './interval-stream.js';
export { PhaseShifter } from './phase-shifter.js';
export { FrequencySeries } from './frequency-series.js';
export { Nco, parseNcoFile, loadNcoFile } from './nco.js';
export { parseProgram, parseLine } from './tarlan/parser.js';
export { ControllerInterpreter, interpretProgram } from './tarlan/interpreter.js';
export { describeMnemonic, listMnemonics } from './tarlan/mnemonics.js';
export { ConsoleInterpreter } from './tcl/interpreter.js';
export { createExperimentConsole, EROS_COMMANDS } from './eros/catalog.js';
export {
  Experiment,
  analyzeProgram,
  loadExperiment,
  runExperimentScript,
  nearestRange,
  furthestFullRange,
} from './experiment.js';
