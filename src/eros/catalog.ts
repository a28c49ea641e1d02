/**
 * Operator Command Catalog
 *
 * The commands experiment scripts use to drive the radar. Commands that
 * decide what the controllers run (loaded programs, oscillator settings,
 * channel frequency tables, experiment blocks) update the session state of
 * the calling scope. The rest only describe what the radar would do, and
 * log that description.
 *
 * Handlers never touch timing state; that comes from replaying the
 * controller program afterwards.
 */

import { readFileSync } from 'node:fs';
import { CommandUsageError, errorMessage } from '../errors.js';
import { loggers, type Logger } from '../logger.js';
import { parseNcoFile } from '../nco.js';
import { sourceFile, parseProcArguments } from '../tcl/builtins.js';
import { normal, type Completion } from '../tcl/completion.js';
import { formatValue } from '../tcl/expr.js';
import {
  ConsoleInterpreter,
  type CommandContext,
  type DomainAdapter,
  type DomainCommand,
} from '../tcl/interpreter.js';
import { splitList } from '../tcl/parser.js';
import type { CallLogEntry } from '../tcl/scope.js';
import { DEFAULT_CONFIG, isChannelNumber, type AnalyzerConfig, type ChannelNumber, type RadarSite } from '../types.js';
import {
  cloneExperimentState,
  createExperimentState,
  findExperimentFile,
  mergeExperimentState,
  type ExperimentState,
  type StartTimeDevice,
} from './session.js';

// =============================================================================
// Types
// =============================================================================

export type ErosCategory = 'experiment' | 'radar' | 'frequency' | 'data' | 'info';

export interface CatalogEnv {
  config: AnalyzerConfig;
  log: Logger;
}

export type ErosHandler = (
  args: string[],
  ctx: CommandContext<ExperimentState>,
  env: CatalogEnv
) => string | void | Completion;

export interface ErosCommandDef {
  name: string;
  description: string;
  category: ErosCategory;
  /** Changes session state, as opposed to only describing an action */
  stateful: boolean;
  handler: ErosHandler;
}

// =============================================================================
// Helpers
// =============================================================================

const CONTROLLERS = ['transmitter', 'receiver', 'ion line receiver', 'plasma line receiver'] as const;

type ReceiverLine = 'ionline' | 'plasmaline';

/**
 * The one choice starting with `prefix`
 */
function extend<T extends string>(choices: readonly T[], prefix: string): T {
  const matches = choices.filter((choice) => choice.startsWith(prefix));
  if (matches.length === 1) {
    return matches[0];
  }
  throw new CommandUsageError(
    matches.length > 1
      ? `'${prefix}' is ambiguous: ${matches.join(', ')}`
      : `'${prefix}' is none of ${choices.join(', ')}`
  );
}

function requireArgs(args: readonly string[], count: number, usage: string): void {
  if (args.length < count) {
    throw new CommandUsageError(`wrong # args: should be "${usage}"`);
  }
}

function receiverLine(word: string | undefined): ReceiverLine | null {
  if (word === undefined || word === '') return null;
  if ('plasmaline'.startsWith(word)) return 'plasmaline';
  if ('ionline'.startsWith(word)) return 'ionline';
  return null;
}

/** Channel numbers in a channel list such as `1,2` or `{3 4}` */
function channelsIn(text: string): ChannelNumber[] {
  return (text.match(/\d+/g) ?? []).map((digits) => {
    const ch = parseInt(digits, 10);
    if (!isChannelNumber(ch)) {
      throw new CommandUsageError(`There is no channel ${digits}`);
    }
    return ch;
  });
}

interface ChannelArguments {
  /** Option letters, lowercased and without the dash */
  options: string[];
  receiver: ReceiverLine | null;
  /** File or frequency, depending on the command */
  target: string;
  channels: ChannelNumber[];
}

/**
 * Arguments in the order `?options? ?receiver? <target> <channels>`
 */
function parseChannelArguments(args: readonly string[]): ChannelArguments {
  const target = args[args.length - 2];
  const list = args[args.length - 1];
  if (target === undefined || list === undefined) {
    throw new CommandUsageError('expected a target and a channel list');
  }
  const receiver = args.length > 2 ? receiverLine(args[args.length - 3]) : null;
  const options = args.slice(0, args.length - 2 - (receiver === null ? 0 : 1)).map((arg) => arg.slice(1, 2).toLowerCase());
  return { options, receiver, target, channels: channelsIn(list) };
}

function isRadar(ctx: CommandContext<ExperimentState>, ...sites: RadarSite[]): boolean {
  return sites.includes(ctx.scope.state.radar);
}

const flag = (value: boolean): string => (value ? '1' : '0');

/**
 * Describe a frequency load or set the way the operator console would
 */
function describeFrequencyChange(ctx: CommandContext<ExperimentState>, options: string[], what: string): string {
  const esr = isRadar(ctx, 'ESR');
  const verb = `${options.includes('v') ? 'verbose ' : ''}${options.includes('t') ? 'test' : 'load'}`;
  const correct = options.includes('e') || esr ? 'and correct ' : '';
  const uncorrected = options.includes('u') || !esr ? ' uncorrected' : '';
  return `${verb.charAt(0).toUpperCase()}${verb.slice(1)} ${correct}${what}${uncorrected}`;
}

/**
 * Run a block in a child scope linked from `entry`, so that what the block
 * loaded can be found through the caller's log
 */
function callBlock(ctx: CommandContext<ExperimentState>, words: readonly string[], entry: CallLogEntry): Completion {
  const [name, ...args] = words;
  const block = name === undefined ? undefined : ctx.interp.scopes.lookupProc(ctx.scope, name);
  if (name === undefined || block === undefined) {
    throw new CommandUsageError(`Block '${name ?? ''}' is not defined`);
  }
  return ctx.interp.callProc(ctx.scope, block, args, entry);
}

const ESR_PATHS: Record<string, number> = {
  P1: 1, U32: 1, '32U': 1, U32m: 1, U: 1,
  P2: 2, D32: 2, '32D': 2, D32m: 2, D: 2,
  P3: 3, U42: 3, '42U': 3, U42m: 3,
  P4: 4, D42: 4, '42D': 4, D42m: 4,
};

const RECEIVER_PATHS: Partial<Record<RadarSite, Record<string, number>>> = {
  UHF: { i: 1, ion: 1, '1': 1, p: 2, pla: 2, '2': 2 },
  VHF: { I: 1, A: 1, II: 2, B: 2 },
  ESR: ESR_PATHS,
};

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format seconds since the epoch as `DD-MM-YYYY hh:mm:ss.f` (UTC)
 */
export function formatTimestamp(seconds: number, options: readonly string[] = []): string {
  const date = new Date(Math.floor(seconds) * 1000);
  let decimals = 1;
  let text = '';

  if (!options.includes('-nodate')) {
    text += `${pad(date.getUTCDate())}-${pad(date.getUTCMonth() + 1)}`;
    if (!options.includes('-noyear')) {
      text += `-${date.getUTCFullYear()}`;
    }
    text += ' ';
  }
  text += `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

  for (const option of options) {
    if (/^-\d$/.test(option)) decimals = parseInt(option.slice(1), 10);
  }
  if (options.includes('-nofrac')) decimals = 0;
  if (decimals > 0) {
    const fraction = seconds - Math.floor(seconds);
    text += fraction.toFixed(decimals).slice(1);
  }
  return text;
}

// =============================================================================
// Catalog
// =============================================================================

export const EROS_COMMANDS: Record<string, ErosCommandDef> = {
  // Experiment structure
  runexperiment: {
    name: 'runexperiment',
    description: 'Run an experiment script: runexperiment <file> <start time> ?args ...?',
    category: 'experiment',
    stateful: true,
    handler: (args, ctx, { config, log }) => {
      requireArgs(args, 1, 'runexperiment file ?starttime? ?arg ...?');
      const file = findExperimentFile(args[0], '.elan', config.experimentRoots);
      ctx.scope.state.argv = args.slice(2);
      log.info(`Running experiment ${file.name} (${file.path})`);

      let completion = ctx.interp.evalIn(ctx.scope, readFileSync(file.path, 'utf-8'), file.path);
      for (let jumps = 1; completion.kind === 'gotoBlock'; jumps++) {
        if (jumps > config.maxBlockJumps) {
          throw new CommandUsageError(`Experiment jumped between blocks more than ${config.maxBlockJumps} times`);
        }
        // Each jump gets its own entry in the script's log
        const entry: CallLogEntry = { words: [...completion.words], result: '' };
        ctx.scope.log.push(entry);
        completion = callBlock(ctx, completion.words, entry);
      }
      return completion.kind === 'return' ? normal(completion.value) : completion;
    },
  },

  argv: {
    name: 'argv',
    description: 'Arguments given to runexperiment after the start time',
    category: 'experiment',
    stateful: false,
    handler: (_args, ctx) => ctx.scope.state.argv.join(' '),
  },

  block: {
    name: 'block',
    description: 'Define an experiment block: block name args body',
    category: 'experiment',
    stateful: true,
    handler: (args, { scope, command }, { log }) => {
      if (args.length !== 3) {
        throw new CommandUsageError('wrong # args: should be "block name args body"');
      }
      const [name, argList, body] = args;
      const { args: blockArgs, variadic } = parseProcArguments(argList);
      scope.procs.set(name, {
        name,
        args: blockArgs,
        variadic,
        body,
        filename: command.filename,
        line: command.words[3]?.line ?? command.line,
      });
      log.debug(`Defined BLOCK ${name}`);
    },
  },

  callblock: {
    name: 'callblock',
    description: 'Call an experiment block and keep what it loaded',
    category: 'experiment',
    stateful: true,
    handler: (args, ctx, { log }) => {
      requireArgs(args, 1, 'callblock name ?arg ...?');
      log.info(`Enters BLOCK ${args[0]}`);
      return callBlock(ctx, args, ctx.entry);
    },
  },

  gotoblock: {
    name: 'gotoblock',
    description: 'Terminate the running block and start another one',
    category: 'experiment',
    stateful: true,
    handler: (args, _ctx, { log }) => {
      requireArgs(args, 1, 'gotoblock name ?arg ...?');
      log.info(`Terminate current BLOCK and call ${args.join(' ')}`);
      return { kind: 'gotoBlock', words: args };
    },
  },

  loadfile: {
    name: 'loadfile',
    description: 'Run a script file in the calling scope',
    category: 'experiment',
    stateful: true,
    handler: (args, ctx) => {
      requireArgs(args, 1, 'loadfile fileName');
      return sourceFile(ctx, args[0]);
    },
  },

  // Radar controllers
  loadradar: {
    name: 'loadradar',
    description: 'Load a compiled controller program: loadradar <controller> -f <file> ?-l <loops>? ?-s <sync>?',
    category: 'radar',
    stateful: true,
    handler: (args, { scope }, { log }) => {
      requireArgs(args, 1, 'loadradar controller ?-option value ...?');
      const [which, ...options] = args;
      const controller = extend(CONTROLLERS, which);
      if (options.length % 2 !== 0) {
        throw new CommandUsageError(`Option ${options[options.length - 1]} of loadradar has no value`);
      }
      log.info(`Load ${controller} controller`);

      for (let i = 0; i < options.length; i += 2) {
        const option = options[i];
        const value = options[i + 1];
        switch (option.slice(1, 2)) {
          case 'f': {
            const binary = controller === 'transmitter' ? 'tbin' : 'rbin';
            scope.state.files[binary] = value;
            log.info(`Load compiled controller program ${value}`);
            break;
          }
          case 'l':
            log.info(`Set loop counter to ${value}`);
            break;
          case 's':
            // Given in units of 100 ns
            log.info(`Set synchronisation period to ${Number(value) / 10} µs`);
            break;
          default:
            throw new CommandUsageError(`Unknown option ${option} of loadradar`);
        }
      }
    },
  },

  armradar: {
    name: 'armradar',
    description: 'Arm a radar controller to wait for its start pulse',
    category: 'radar',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      requireArgs(args, 1, 'armradar controller');
      log.info(`Set ${args[0]} controller start address and registers and wait for a start pulse`);
    },
  },

  startradar: {
    name: 'startradar',
    description: 'Start the radar controllers at a time',
    category: 'radar',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      requireArgs(args, 1, 'startradar timespec ?integrationperiod?');
      const time = args[0].toUpperCase().startsWith('E') ? 'ETIME' : args[0];
      const period = args[1] === undefined ? '' : `, integration period ${args[1]} s`;
      log.info(`Radar controllers will start at ${time}${period}`);
    },
  },

  stopradar: {
    name: 'stopradar',
    description: 'Stop one or all radar controllers',
    category: 'radar',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      const controller = (args[0] ?? 'all').replace(/^-/, '');
      if ('all'.startsWith(controller)) {
        log.info('Stop all radar controllers');
      } else {
        log.info(`Stop ${extend(CONTROLLERS, controller)} controller`);
      }
    },
  },

  isradar: {
    name: 'isradar',
    description: 'Radar name without arguments, otherwise 1 if the radar is one of them',
    category: 'radar',
    stateful: false,
    handler: (args, ctx) => (args.length === 0 ? ctx.scope.state.radar : flag(args.some((site) => site === ctx.scope.state.radar))),
  },
  isuhf: { name: 'isuhf', description: '1 at the UHF radar', category: 'radar', stateful: false, handler: (_a, ctx) => flag(isRadar(ctx, 'UHF')) },
  isvhf: { name: 'isvhf', description: '1 at the VHF radar', category: 'radar', stateful: false, handler: (_a, ctx) => flag(isRadar(ctx, 'VHF')) },
  isesr: { name: 'isesr', description: '1 at the ESR radar', category: 'radar', stateful: false, handler: (_a, ctx) => flag(isRadar(ctx, 'ESR')) },
  iskir: { name: 'iskir', description: '1 at Kiruna', category: 'radar', stateful: false, handler: (_a, ctx) => flag(isRadar(ctx, 'KIR')) },
  issod: { name: 'issod', description: '1 at Sodankylä', category: 'radar', stateful: false, handler: (_a, ctx) => flag(isRadar(ctx, 'SOD')) },

  getstarttime: {
    name: 'getstarttime',
    description: 'Start time of a device, -1 when it has not started',
    category: 'radar',
    stateful: false,
    handler: (args, { scope }) => {
      requireArgs(args, 1, 'getstarttime device');
      const device = args[0].charAt(0).toLowerCase();
      const times = scope.state.startTimes;
      const known = Object.keys(times).find((key): key is StartTimeDevice => key === device);
      if (known === undefined) {
        throw new CommandUsageError(`Unknown device ${args[0]}`);
      }
      return String(times[known]);
    },
  },

  sync: {
    name: 'sync',
    description: 'Wait for a synchronisation point',
    category: 'radar',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      log.info(`Called SYNC ${args.join(' ')}`);
    },
  },

  // Oscillators and frequencies
  selectlo: {
    name: 'selectlo',
    description: 'Set a local oscillator frequency: selectlo ?lo1|lo2? <path> <MHz>',
    category: 'frequency',
    stateful: true,
    handler: (args, ctx, { log }) => {
      requireArgs(args, 2, 'selectlo ?oscillator? path frequency');
      const { state } = ctx.scope;
      const path = args[args.length - 2];
      const frequency = Number(args[args.length - 1]);
      if (!Number.isFinite(frequency)) {
        throw new CommandUsageError(`'${args[args.length - 1]}' is not a frequency`);
      }

      const paths = RECEIVER_PATHS[state.radar];
      if (paths === undefined) {
        throw new CommandUsageError(`Local oscillators cannot be selected at ${state.radar}`);
      }
      const pathNumber = paths[path];
      if (pathNumber === undefined) {
        throw new CommandUsageError(`Unknown receiver path ${path} at ${state.radar}`);
      }

      let oscillator: 'lo1' | 'lo2';
      if (args.length >= 3) {
        const digit = args[0].slice(-1);
        if (digit !== '1' && digit !== '2') {
          throw new CommandUsageError(`Unknown local oscillator ${args[0]}`);
        }
        oscillator = digit === '1' ? 'lo1' : 'lo2';
      } else if (state.radar === 'UHF') {
        oscillator = 'lo2';
      } else if (state.radar === 'ESR') {
        oscillator = 'lo1';
      } else {
        throw new CommandUsageError(`The local oscillator must be given at ${state.radar}`);
      }

      state.oscillators[oscillator][pathNumber - 1] = frequency;
      log.info(`Select local oscillator frequencies: ${oscillator}, path ${path}, frequency ${frequency} MHz`);
    },
  },

  loadfrequency: {
    name: 'loadfrequency',
    description: 'Load an NCO file into channels: loadfrequency ?options? ?receiver? <file> <channels>',
    category: 'frequency',
    stateful: true,
    handler: (args, ctx, { log }) => {
      requireArgs(args, 2, 'loadfrequency ?options? ?receiver? file channels');
      const { options, target, channels } = parseChannelArguments(args);
      for (const ch of channels) {
        ctx.scope.state.files.nco[ch] = target;
      }
      log.info(describeFrequencyChange(ctx, options, `frequencies from file ${target} into channels ${channels.join(', ')}`));
    },
  },

  readfrequencyfile: {
    name: 'readfrequencyfile',
    description: 'Frequency stored at an address of an NCO file',
    category: 'frequency',
    stateful: false,
    handler: (args, _ctx, { config, log }) => {
      requireArgs(args, 2, 'readfrequencyfile file address');
      const [file, address] = args;
      if (args.length > 2) {
        log.warn('Only one frequency address is read at a time');
      }

      let table: number[];
      try {
        const found = findExperimentFile(file, '.nco', config.experimentRoots);
        table = parseNcoFile(readFileSync(found.path, 'utf-8'));
      } catch (error) {
        log.warn(`Frequencies were not loaded from ${file}: ${errorMessage(error)}`);
        return '';
      }

      const index = Number(address);
      const frequency = Number.isInteger(index) ? table[index] : undefined;
      if (frequency === undefined) {
        throw new CommandUsageError(`Address ${address} is not in ${file} (${table.length} entries)`);
      }
      return formatValue({ type: 'double', value: frequency });
    },
  },

  setfrequency: {
    name: 'setfrequency',
    description: 'Set channel frequencies directly',
    category: 'frequency',
    stateful: false,
    handler: (args, ctx, { log }) => {
      requireArgs(args, 2, 'setfrequency ?options? ?receiver? channels frequency');
      // Channels come before the frequency here
      const swapped = [...args.slice(0, -2), args[args.length - 1], args[args.length - 2]];
      const { options, target, channels } = parseChannelArguments(swapped);
      log.info(describeFrequencyChange(ctx, options, `frequencies in channels ${channels.join(', ')} to ${target} MHz`));
    },
  },

  transferlo: {
    name: 'transferlo',
    description: 'Transfer control of the local oscillators',
    category: 'frequency',
    stateful: false,
    handler: (_args, _ctx, { log }) => {
      log.info('Transfers control of the local oscillators; not checked here');
    },
  },

  setpanelpath: {
    name: 'setpanelpath',
    description: 'Route VHF antenna panels to the AD converters',
    category: 'frequency',
    stateful: false,
    handler: (args, ctx, { log }) => {
      if (!isRadar(ctx, 'VHF')) return;
      const path = args[0]?.toLowerCase();
      if (path === undefined) {
        log.info('Query panel path');
      } else if (path === 'split') {
        log.info('Send data from panel I and II to ADC 1 and from III and IV to ADC 2');
      } else if (path === 'alla') {
        log.info('Send data from all panels to ADC 1');
      } else if (path === 'allb') {
        log.info('Send data from all panels to ADC 2');
      } else {
        log.warn(`Did not understand panel path ${args[0]}`);
      }
    },
  },

  // Data taking
  loadfilter: {
    name: 'loadfilter',
    description: 'Load a filter into channels: loadfilter ?receiver? <file> <channels> ?options?',
    category: 'data',
    stateful: true,
    handler: (args, { scope }, { log }) => {
      requireArgs(args, 2, 'loadfilter ?receiver? file channels ?options?');
      const line = receiverLine(args[0]);
      const offset = line === null ? 0 : 1;
      const file = args[offset];
      const list = args[offset + 1];
      if (list === undefined) {
        throw new CommandUsageError('wrong # args: should be "loadfilter ?receiver? file channels ?options?"');
      }
      scope.state.files.filter = file;
      const check = args.slice(offset + 2).includes('-T');
      log.info(
        `${check ? 'Would check (not load)' : 'Load'} filter ${file} for ${line ?? 'ionline'} into channels ${channelsIn(list).join(', ')}`
      );
    },
  },

  startdata: {
    name: 'startdata',
    description: 'Start correlator and recorder: startdata ?receiver? <corrfile> <expid> <iper> ?antenna?',
    category: 'data',
    stateful: true,
    handler: (args, ctx, { log }) => {
      const hasReceiver = ['ion', '-ion', 'pla', '-pla'].includes(args[0] ?? '');
      const receiver = hasReceiver ? args[0] : 'ion';
      const rest = hasReceiver ? args.slice(1) : args;
      requireArgs(rest, 3, 'startdata ?receiver? corrfile expid iper ?antenna?');
      const [corrFile, expId, period, antennaArg] = rest;
      const esr = isRadar(ctx, 'ESR');

      if (!esr && receiver.endsWith('pla')) return;
      if (esr && antennaArg === undefined) {
        throw new CommandUsageError('Must specify antenna (32m or 42m)!');
      }
      const antenna = antennaArg ?? ctx.scope.state.antenna;

      ctx.scope.state.files.fil = corrFile;
      log.info(`Loading ${corrFile} into correlator, expid ${expId}, integration time ${period}, antenna ${antenna}`);
    },
  },

  stopdata: {
    name: 'stopdata',
    description: 'Stop correlator and recorder',
    category: 'data',
    stateful: false,
    handler: (_args, _ctx, { log }) => {
      log.info('Stop data access by stopping both correlator and recorder');
    },
  },

  disablerecording: {
    name: 'disablerecording',
    description: 'Stop recording ion line, plasma line or both',
    category: 'data',
    stateful: false,
    handler: (args, ctx, { log }) => {
      const esr = isRadar(ctx, 'ESR');
      const which = esr && args[0] !== undefined ? args[0] : 'ion';
      if (!esr) {
        log.info('Disabled recording');
        return;
      }
      switch (which) {
        case 'pla':
          log.info('Disabled recording of plasma line');
          break;
        case 'ion':
          log.info('Disabled recording of ion line');
          break;
        case 'all':
          log.info('Disabled recording of both plasma and ion line');
          break;
        default:
          throw new CommandUsageError(`Wrong argument ${which}!`);
      }
    },
  },

  writeexperimentfile: {
    name: 'writeexperimentfile',
    description: 'Copy experiment files next to the data',
    category: 'data',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      requireArgs(args, 1, 'writeexperimentfile files ?directory?');
      log.info(`Copy files to ${args[1] ?? 'the data directory'}: ${splitList(args[0]).join(', ')}`);
    },
  },

  // Information
  upar: {
    name: 'upar',
    description: 'User parameters; reads always give 0',
    category: 'info',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      requireArgs(args, 1, 'upar ?index? name ?value?');
      if (args.length > 3) {
        throw new CommandUsageError('Not more than 3 arguments to upar!');
      }
      if (args[0] === 'alias') {
        log.info(`Create alias ${args[2] ?? ''} of user parameter ${args[1] ?? ''}`);
        return '';
      }
      if (args.length === 1) {
        log.info(`Return user parameter ${args[0]}; always zero here`);
        return '0';
      }
      log.info(args.length === 2 ? `Return user parameter ${args[1]}` : `Set user parameter ${args[1]} to ${args[2]}`);
      return '';
    },
  },

  timestamp: {
    name: 'timestamp',
    description: 'Format a time in seconds since 1970 (UTC)',
    category: 'info',
    stateful: false,
    handler: (args) => {
      requireArgs(args, 1, 'timestamp ?options? seconds');
      const seconds = Number(args[args.length - 1]);
      if (Number.isNaN(seconds)) {
        throw new CommandUsageError(`expected seconds but got "${args[args.length - 1]}"`);
      }
      return seconds < 0 ? '' : formatTimestamp(seconds, args.slice(0, -1));
    },
  },

  disp: {
    name: 'disp',
    description: 'Show text on the operator display',
    category: 'info',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      log.info(`Display: ${args.filter((arg) => !arg.startsWith('-')).join(' ')}`);
    },
  },

  logbook: {
    name: 'logbook',
    description: 'Write into the logbook',
    category: 'info',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      log.info(`Print into logbook: ${args.join(' ')}`);
    },
  },

  mount: {
    name: 'mount',
    description: 'Mount a disk; experiment scripts should not',
    category: 'info',
    stateful: false,
    handler: (args, _ctx, { log }) => {
      log.warn(`Mounts disk ${args.join(' ')}. This should not be done in an experiment script!`);
    },
  },
};

// =============================================================================
// Console
// =============================================================================

export interface ExperimentConsoleOptions {
  radar?: RadarSite;
  antenna?: string;
  config?: AnalyzerConfig;
  /** Receives `puts` output; defaults to stdout */
  output?: (text: string) => void;
  logger?: Logger;
}

export function createErosAdapter(options: ExperimentConsoleOptions = {}): DomainAdapter<ExperimentState> {
  const config = options.config ?? DEFAULT_CONFIG;
  const env: CatalogEnv = { config, log: options.logger ?? loggers.eros };
  const radar = options.radar ?? config.radar;
  const antenna = options.antenna ?? radar;

  const commands = new Map<string, DomainCommand<ExperimentState>>(
    Object.values(EROS_COMMANDS).map((def): [string, DomainCommand<ExperimentState>] => [
      def.name,
      (args, ctx) => def.handler(args, ctx, env),
    ])
  );

  return {
    initialState: () => createExperimentState(radar, antenna, config),
    clone: cloneExperimentState,
    merge: mergeExperimentState,
    commands,
  };
}

/**
 * Console interpreter with the operator commands installed
 */
export function createExperimentConsole(options: ExperimentConsoleOptions = {}): ConsoleInterpreter<ExperimentState> {
  const config = options.config ?? DEFAULT_CONFIG;
  const interp = new ConsoleInterpreter(createErosAdapter(options), {
    output: options.output,
    maxLoopIterations: config.maxLoopIterations,
    logger: options.logger?.child('tcl'),
  });

  // ESR scripts test which antenna they run on
  const antenna = options.antenna ?? options.radar ?? config.radar;
  interp.root.vars.set('32p', flag(antenna === '32p'));
  interp.root.vars.set('42p', flag(antenna === '42p'));
  return interp;
}
