/**
 * Console Interpreter
 *
 * Runs console scripts against the scope arena. Every word of a command is
 * substituted once, left to right ($variables, [commands] and backslash
 * escapes); results are never rescanned. The first word then names the
 * handler, looked up in this order: built-ins, procedures visible from the
 * scope, the domain command catalog.
 *
 * Non-local control flow (return, break, continue, gotoblock) travels as a
 * Completion value. A procedure call is the boundary for `return`, loops are
 * the boundary for `break` and `continue`, and the domain layer decides
 * where `gotoBlock` stops.
 */

import { readFileSync } from 'node:fs';
import {
  CommandUsageError,
  ConsoleScriptError,
  ExpressionError,
  errorMessage,
  type SourceLocation,
} from '../errors.js';
import { loggers, type Logger } from '../logger.js';
import { DEFAULT_CONFIG } from '../types.js';
import { createBuiltins } from './builtins.js';
import { describeCompletion, isCompletion, normal, type Completion } from './completion.js';
import { evaluateExpression, type ExprContext } from './expr.js';
import { commandLocation, findCloseBracket, formatList, parseScript, type ParsedCommand, type Word } from './parser.js';
import { ScopeArena, type CallLogEntry, type ProcDefinition, type Scope } from './scope.js';

// =============================================================================
// Types
// =============================================================================

export { normal, type Completion } from './completion.js';

export interface CommandContext<D> {
  interp: ConsoleInterpreter<D>;
  scope: Scope<D>;
  command: ParsedCommand;
  /** Log entry of the running command; a nested call links its scope here */
  entry: CallLogEntry;
}

export type BuiltinCommand<D> = (args: string[], ctx: CommandContext<D>) => Completion;

/**
 * Domain command handler. Returns nothing or a string result; commands that
 * steer control flow return a Completion.
 */
export type DomainCommand<D> = (args: string[], ctx: CommandContext<D>) => string | void | Completion;

/**
 * Domain state carried by every scope, and the commands that act on it
 */
export interface DomainAdapter<D> {
  initialState(): D;
  /** State of a child scope, derived from its parent's */
  clone(state: D): D;
  /** Fold what a finished procedure call did back into the caller's state */
  merge(parent: D, child: D): void;
  commands: ReadonlyMap<string, DomainCommand<D>>;
}

export interface ConsoleOptions {
  /** Receives everything `puts` prints; defaults to stdout */
  output?: (text: string) => void;
  maxLoopIterations?: number;
  logger?: Logger;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  a: '\x07',
  b: '\b',
  f: '\f',
  r: '\r',
  t: '\t',
  v: '\v',
};

const VARIABLE_NAME = /^[A-Za-z0-9_]+(?:::[A-Za-z0-9_]+)*/;

// =============================================================================
// Interpreter
// =============================================================================

export class ConsoleInterpreter<D> {
  readonly scopes = new ScopeArena<D>();
  readonly root: Scope<D>;
  readonly maxLoopIterations: number;
  readonly log: Logger;

  private readonly domain: DomainAdapter<D>;
  private readonly builtins: ReadonlyMap<string, BuiltinCommand<D>> = createBuiltins<D>();
  private readonly output: (text: string) => void;

  constructor(domain: DomainAdapter<D>, options: ConsoleOptions = {}) {
    this.domain = domain;
    this.output = options.output ?? ((text) => process.stdout.write(text));
    this.maxLoopIterations = options.maxLoopIterations ?? DEFAULT_CONFIG.maxLoopIterations;
    this.log = options.logger ?? loggers.tcl;
    this.root = this.scopes.createRoot('Console', domain.initialState());
  }

  /**
   * Run a script in the root scope and return the result of its last command.
   *
   * @throws ConsoleScriptError
   */
  evaluate(script: string, filename: string = 'Console'): string {
    return this.topLevel(this.evalIn(this.root, script, filename), filename);
  }

  /**
   * Run a script file in the root scope.
   */
  evaluateFile(path: string): string {
    return this.evaluate(readFileSync(path, 'utf-8'), path);
  }

  /**
   * Run a script in a scope. Stops at the first command that completes
   * abnormally and hands that completion to the caller.
   */
  evalIn(scope: Scope<D>, script: string, filename: string = 'Console', startLine: number = 1): Completion {
    let last = normal();
    for (const command of parseScript(script, filename, startLine)) {
      last = this.runCommand(scope, command);
      if (last.kind !== 'normal') {
        return last;
      }
    }
    return last;
  }

  /**
   * Convert a completion that reached the outermost level into a value
   */
  topLevel(completion: Completion, filename: string): string {
    switch (completion.kind) {
      case 'normal':
      case 'return':
        return completion.value;
      default:
        throw new ConsoleScriptError(`invoked "${describeCompletion(completion)}" outside of its context`, {
          filename,
          line: 0,
          char1: 0,
          char2: 0,
        });
    }
  }

  write(text: string): void {
    this.output(text);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  runCommand(scope: Scope<D>, command: ParsedCommand): Completion {
    const words = command.words.map((word) => this.substituteWord(scope, word, command));
    const [name, ...args] = words;
    const entry: CallLogEntry = { words, result: '' };
    scope.log.push(entry);

    const ctx: CommandContext<D> = { interp: this, scope, command, entry };
    let completion: Completion;

    try {
      completion = this.dispatch(name, args, ctx);
    } catch (error) {
      if (error instanceof ConsoleScriptError) throw error;
      if (error instanceof CommandUsageError || error instanceof ExpressionError) {
        throw new ConsoleScriptError(error.message, commandLocation(command));
      }
      throw new ConsoleScriptError(`${name}: ${errorMessage(error)}`, commandLocation(command));
    }

    if (completion.kind === 'normal' || completion.kind === 'return') {
      entry.result = completion.value;
    }
    return completion;
  }

  private dispatch(name: string, args: string[], ctx: CommandContext<D>): Completion {
    const builtin = this.builtins.get(name);
    if (builtin !== undefined) {
      return builtin(args, ctx);
    }

    const proc = this.scopes.lookupProc(ctx.scope, name);
    if (proc !== undefined) {
      return this.callProc(ctx.scope, proc, args, ctx.entry);
    }

    const domainCommand = this.domain.commands.get(name);
    if (domainCommand !== undefined) {
      const result = domainCommand(args, ctx);
      if (isCompletion(result)) return result;
      return normal(typeof result === 'string' ? result : '');
    }

    throw new ConsoleScriptError(
      `Function '${name}' is not known in Tcl scope!`,
      commandLocation(ctx.command, ctx.command.words[0])
    );
  }

  /**
   * Call a procedure in a fresh child scope. The child's domain state is
   * merged back into the caller's once the body has run.
   */
  callProc(caller: Scope<D>, proc: ProcDefinition, args: string[], entry?: CallLogEntry): Completion {
    const positional = proc.args;
    const tooMany = !proc.variadic && args.length > positional.length;
    const missing = positional.some((arg, i) => args[i] === undefined && arg.default === undefined);
    if (tooMany || missing) {
      throw new CommandUsageError(`wrong # args: should be "${procUsage(proc)}"`);
    }

    const child = this.scopes.createChild(caller.id, `proc ${proc.name}`, this.domain.clone(caller.state));
    if (entry !== undefined) {
      entry.child = child.id;
    }
    positional.forEach((arg, i) => {
      child.vars.set(arg.name, args[i] ?? arg.default ?? '');
    });
    if (proc.variadic) {
      child.vars.set('args', formatList(args.slice(positional.length)));
    }

    const completion = this.evalIn(child, proc.body, proc.filename, proc.line);
    this.domain.merge(caller.state, child.state);

    switch (completion.kind) {
      case 'normal':
        return normal();
      case 'return':
        return normal(completion.value);
      case 'gotoBlock':
        return completion;
      default:
        throw new CommandUsageError(`invoked "${completion.kind}" outside of a loop`);
    }
  }

  // ===========================================================================
  // Substitution
  // ===========================================================================

  private substituteWord(scope: Scope<D>, word: Word, command: ParsedCommand): string {
    const location = commandLocation(command, word);
    switch (word.kind) {
      case 'braced':
        return word.text;
      case 'bracketed':
        return this.substituteCommand(scope, word.text, location);
      default:
        return this.substitute(scope, word.text, location);
    }
  }

  /**
   * Variable, command and backslash substitution in one pass
   *
   * @throws ConsoleScriptError for unknown variables and unsupported escapes
   */
  substitute(scope: Scope<D>, text: string, location: SourceLocation): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
      const c = text[i];

      if (c === '\\') {
        const next = text[i + 1];
        if (next === undefined) {
          out += '\\';
          i++;
        } else if (next === '\n') {
          i += 2;
          while (text[i] === ' ' || text[i] === '\t') i++;
          out += ' ';
        } else if (/^[xuU0-7]$/.test(next)) {
          throw new ConsoleScriptError(`Could not handle escape sequence \\${next}`, location);
        } else {
          out += SIMPLE_ESCAPES[next] ?? next;
          i += 2;
        }
      } else if (c === '$') {
        const rest = text.slice(i + 1);
        const braced = /^\{([^}]*)\}/.exec(rest);
        const plain = VARIABLE_NAME.exec(rest);
        if (braced) {
          out += this.variable(scope, braced[1], location);
          i += 1 + braced[0].length;
        } else if (plain) {
          out += this.variable(scope, plain[0], location);
          i += 1 + plain[0].length;
        } else {
          out += '$';
          i++;
        }
      } else if (c === '[') {
        const close = findCloseBracket(text, i);
        if (close < 0) {
          throw new ConsoleScriptError('Missing close-bracket', location);
        }
        out += this.substituteCommand(scope, text.slice(i + 1, close), location);
        i = close + 1;
      } else {
        out += c;
        i++;
      }
    }
    return out;
  }

  private substituteCommand(scope: Scope<D>, script: string, location: SourceLocation): string {
    let completion: Completion;
    try {
      completion = this.evalIn(scope, script, location.filename, location.line);
    } catch (error) {
      if (error instanceof ConsoleScriptError) {
        throw new ConsoleScriptError(`Error when substituting '[${script}]':\n${error.message}`, location);
      }
      throw error;
    }
    if (completion.kind === 'normal' || completion.kind === 'return') {
      return completion.value;
    }
    throw new ConsoleScriptError(
      `invoked "${describeCompletion(completion)}" inside command substitution`,
      location
    );
  }

  variable(scope: Scope<D>, name: string, location: SourceLocation): string {
    const value = scope.vars.get(name);
    if (value === undefined) {
      throw new ConsoleScriptError(`Variable '${name}' is not known in Tcl scope!`, location);
    }
    return value;
  }

  /**
   * Evaluate an expression in a scope
   */
  expr(scope: Scope<D>, expression: string, command: ParsedCommand): string {
    const location = commandLocation(command);
    const ctx: ExprContext = {
      variable: (name) => this.variable(scope, name, location),
      command: (script) => this.substituteCommand(scope, script, location),
      substitute: (text) => this.substitute(scope, text, location),
    };
    return evaluateExpression(expression, ctx);
  }
}

export function procUsage(proc: ProcDefinition): string {
  const parts = proc.args.map((arg) => (arg.default === undefined ? arg.name : `?${arg.name}?`));
  if (proc.variadic) {
    parts.push('?arg ...?');
  }
  return [proc.name, ...parts].join(' ');
}
