/**
 * Controller Interpreter
 *
 * Replays a parsed controller program against the modeled hardware. The
 * program runs as one cycle split into subcycles by `SETTCR`; every time in
 * an `AT` statement is relative to the time control register (TCR) set by
 * the last `SETTCR`.
 *
 * Structural errors (double on/off, a stream left on across a subcycle
 * boundary, execution outside the cycle, a program that does not end with
 * REP) abort the replay. Unknown mnemonics are warned about and skipped.
 */

import { ControllerProgramError } from '../errors.js';
import { FrequencySeries } from '../frequency-series.js';
import { IntervalStream } from '../interval-stream.js';
import { loggers, type Logger } from '../logger.js';
import { Nco } from '../nco.js';
import { PhaseShifter } from '../phase-shifter.js';
import {
  CHANNEL_NUMBERS,
  DEFAULT_CONFIG,
  STREAM_NAMES,
  copyOscillators,
  type ChannelNumber,
  type LocalOscillators,
  type Phase,
  type PhaseStreamName,
  type ReceiverConfig,
  type StreamName,
} from '../types.js';
import { lookupMnemonic, type ReceiverPath } from './mnemonics.js';
import { parseProgram, parseProgramFile, type Command } from './parser.js';
import { SubcycleCollector } from './subcycles.js';

export interface ControllerWarning {
  line: number;
  mnemonic: string;
  message: string;
}

export interface TransmitterSelection {
  time: number;
  /** Entry of the transmitter frequency table, 0-15 */
  index: number;
}

export interface ControllerOptions {
  /** Local oscillators [MHz]; defaults to the UHF chain */
  oscillators?: LocalOscillators;
  /** NCO tables [MHz] per receive channel */
  channelTables?: Partial<Record<ChannelNumber, readonly number[]>>;
  logger?: Logger;
}

const PHASE_STREAM: Record<Phase, PhaseStreamName> = { 0: '+', 180: '-' };

function createStreams(): Map<StreamName, IntervalStream> {
  return new Map(STREAM_NAMES.map((name) => [name, new IntervalStream(name)]));
}

export class ControllerInterpreter {
  readonly cycle = new IntervalStream('CYCLE');
  readonly subcycles = new SubcycleCollector();
  readonly phaseShifter = new PhaseShifter();
  /** Center frequency of each receive channel [MHz] over the cycle */
  readonly frequencies: ReadonlyMap<ChannelNumber, FrequencySeries>;
  readonly warnings: ControllerWarning[] = [];
  /** Transmitter frequency entries chosen by F0-F15, in time order */
  readonly transmitterSelections: TransmitterSelection[] = [];

  private streams = createStreams();
  private ncos: Map<ChannelNumber, Nco>;
  private oscillators: LocalOscillators;
  private log: Logger;
  private tcr = 0;
  private filtersStarted: number | null = null;
  private finished = false;
  private end = 0;

  constructor(options: ControllerOptions = {}) {
    this.oscillators = copyOscillators(options.oscillators ?? DEFAULT_CONFIG.oscillators.UHF);
    this.log = options.logger ?? loggers.tarlan;

    const frequencies = new Map<ChannelNumber, FrequencySeries>();
    this.ncos = new Map();
    for (const ch of CHANNEL_NUMBERS) {
      frequencies.set(ch, new FrequencySeries());
      const table = options.channelTables?.[ch];
      this.ncos.set(ch, new Nco(table ? { table: [...table] } : {}));
    }
    this.frequencies = frequencies;
  }

  static fromReceiverConfig(config: ReceiverConfig, logger?: Logger): ControllerInterpreter {
    return new ControllerInterpreter({
      oscillators: { lo1: config.lo1, lo2: config.lo2 },
      channelTables: config.channelTables,
      logger,
    });
  }

  // ===========================================================================
  // State
  // ===========================================================================

  /** Current value of the time control register [s] */
  get timeControl(): number {
    return this.tcr;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Length of the cycle [s]; 0 until REP has run */
  get endTime(): number {
    return this.end;
  }

  /** Time the FIR filters were first started, if they were */
  get filtersStartedAt(): number | null {
    return this.filtersStarted;
  }

  /**
   * Stream of the running subcycle
   */
  stream(name: StreamName): IntervalStream {
    const stream = this.streams.get(name);
    if (stream === undefined) {
      throw new RangeError(`Unknown stream ${name}`);
    }
    return stream;
  }

  nco(channel: ChannelNumber): Nco {
    const nco = this.ncos.get(channel);
    if (nco === undefined) {
      throw new RangeError(`Unknown channel ${channel}`);
    }
    return nco;
  }

  /** Transmitter frequency entry in effect at `time`, or null before the first F command */
  transmitterFrequencyAt(time: number): number | null {
    let index: number | null = null;
    for (const selection of this.transmitterSelections) {
      if (selection.time > time) break;
      index = selection.index;
    }
    return index;
  }

  frequencySeries(channel: ChannelNumber): FrequencySeries {
    const series = this.frequencies.get(channel);
    if (series === undefined) {
      throw new RangeError(`Unknown channel ${channel}`);
    }
    return series;
  }

  // ===========================================================================
  // Running programs
  // ===========================================================================

  /**
   * Replay a whole program. The program must end with REP.
   */
  run(commands: readonly Command[]): this {
    commands.forEach((command, i) => {
      if (command.mnemonic === 'SETTCR' && command.time === 0) {
        const placed = i === 0 || commands[i + 1]?.mnemonic === 'REP';
        if (!placed) {
          this.warn(
            command,
            'SETTCR 0 is only valid as the first command or right before REP; treating it as a continuation'
          );
        }
      }
      this.step(command);
    });

    const last = commands[commands.length - 1];
    if (last === undefined || last.mnemonic !== 'REP') {
      throw new ControllerProgramError('The program must end with REP', last?.line ?? 0);
    }
    this.log.debug(`Program finished after ${this.subcycles.count} subcycle(s)`);
    return this;
  }

  runText(text: string): this {
    return this.run(parseProgram(text));
  }

  async runFile(path: string): Promise<this> {
    const commands = await parseProgramFile(path);
    this.log.debug(`Parsed ${commands.length} commands from ${path}`);
    return this.run(commands);
  }

  /**
   * Process one command, handling cycle and subcycle boundaries. The first
   * command of any kind opens the cycle and the first subcycle at time 0.
   */
  step(command: Command): void {
    if (this.finished) {
      throw new ControllerProgramError(`${command.mnemonic} follows REP`, command.line);
    }

    if (this.cycle.isOff) {
      this.cycle.turnOn(0, command.line);
      this.subcycles.open(0, command.line);
    }

    switch (command.mnemonic) {
      case 'SETTCR':
        if (command.time > 0) {
          this.closeSubcycle(command.time, command.line);
          this.subcycles.open(command.time, command.line);
          this.reopenPhaseStream(command.time, command.line);
        }
        this.tcr = command.time;
        return;

      case 'REP': {
        // Absolute, unlike AT
        const time = command.time;
        this.closeSubcycle(time, command.line);
        this.cycle.turnOff(time, command.line);
        this.finished = true;
        this.end = time;
        return;
      }

      default:
        this.executeCommand(command);
    }
  }

  /**
   * Execute one mnemonic at TCR + command.time.
   *
   * @throws ControllerProgramError outside a running cycle or subcycle
   */
  executeCommand(command: Command): void {
    if (this.cycle.isOff) {
      throw new ControllerProgramError('The cycle has not been started!', command.line);
    }
    if (this.subcycles.isOff) {
      throw new ControllerProgramError('No subcycle has been started yet!', command.line);
    }

    const action = lookupMnemonic(command.mnemonic);
    if (action === undefined) {
      this.warn(command, `Command ${command.mnemonic}, called from line ${command.line} is not implemented`);
      return;
    }

    const time = this.tcr + command.time;
    const line = command.line;

    switch (action.kind) {
      case 'turnOn':
        this.stream(action.stream).turnOn(time, line);
        break;
      case 'turnOff':
        this.stream(action.stream).turnOff(time, line);
        break;
      case 'phase':
        this.phaseShifter.setPhase(time, action.phase);
        this.trackPhase(time, action.phase, line);
        break;
      case 'allOff':
        for (const ch of CHANNEL_NUMBERS) {
          const stream = this.stream(`CH${ch}`);
          if (stream.isOn) stream.turnOff(time, line);
        }
        break;
      case 'route':
        this.route(time, line, action.path, action.channels);
        break;
      case 'ncoSelect':
        this.selectNco(time, action.index);
        break;
      case 'transmitterFrequency':
        this.selectTransmitterFrequency(time, action.index);
        break;
      case 'startFilters':
        if (this.filtersStarted !== null) {
          this.log.debug(`STFIR on line ${line}: filters already started`);
        } else {
          this.filtersStarted = time;
        }
        break;
      case 'noop':
        break;
    }
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  private route(time: number, line: number, path: ReceiverPath, channels: readonly ChannelNumber[]): void {
    const { lo1: lo1s, lo2: lo2s } = this.oscillators;
    // A single first oscillator feeds both paths; the split comes after it
    const lo1 = lo1s.length === 1 ? lo1s[0] : lo1s[path];
    const lo2 = lo2s[path];
    if (lo1 === undefined || lo2 === undefined) {
      throw new ControllerProgramError(`No local oscillators configured for receiver path ${path + 1}`, line);
    }

    for (const ch of channels) {
      const nco = this.nco(ch);
      nco.setLo1(lo1);
      nco.setLo2(lo2);
      this.recordFrequency(ch, time);
    }
  }

  private selectNco(time: number, index: number): void {
    for (const ch of CHANNEL_NUMBERS) {
      this.nco(ch).select(index);
      this.recordFrequency(ch, time);
    }
  }

  private selectTransmitterFrequency(time: number, index: number): void {
    const selections = this.transmitterSelections;
    const at = selections.findIndex((selection) => selection.time > time);
    selections.splice(at < 0 ? selections.length : at, 0, { time, index });
  }

  private recordFrequency(channel: ChannelNumber, time: number): void {
    const nco = this.nco(channel);
    if (nco.isReady) {
      this.frequencySeries(channel).set(time, nco.frequency());
    }
  }

  private trackPhase(time: number, phase: Phase, line: number): void {
    const active = PHASE_STREAM[phase];
    for (const name of Object.values(PHASE_STREAM)) {
      const stream = this.stream(name);
      if (name === active) {
        if (stream.isOff) stream.turnOn(time, line);
      } else if (stream.isOn) {
        stream.turnOff(time, line);
      }
    }
  }

  private reopenPhaseStream(time: number, line: number): void {
    const phase = this.phaseShifter.phaseAt(time);
    if (phase !== null) {
      this.stream(PHASE_STREAM[phase]).turnOn(time, line);
    }
  }

  private closeSubcycle(time: number, line: number): void {
    for (const name of Object.values(PHASE_STREAM)) {
      const stream = this.stream(name);
      if (stream.isOn) stream.turnOff(time, line);
    }
    const snapshot = this.subcycles.close(time, line, this.streams);
    this.log.debug(`Subcycle ${snapshot.index} closed at ${time} s`);
    // Fresh streams so that nothing leaks into the next subcycle
    this.streams = createStreams();
  }

  private warn(command: Command, message: string): void {
    this.warnings.push({ line: command.line, mnemonic: command.mnemonic, message });
    this.log.warn(message);
  }
}

/**
 * Parse and replay a controller program.
 */
export function interpretProgram(text: string, options: ControllerOptions = {}): ControllerInterpreter {
  return new ControllerInterpreter(options).runText(text);
}
