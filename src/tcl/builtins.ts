/**
 * Built-in Commands
 *
 * The subset of the console language that experiment scripts rely on.
 * Lists are plain strings; see splitList/formatList.
 */

import { readFileSync } from 'node:fs';
import { CommandUsageError, errorMessage } from '../errors.js';
import { normal, type Completion } from './completion.js';
import { isTrue } from './expr.js';
import type { BuiltinCommand, CommandContext } from './interpreter.js';
import { commandLocation, formatList, splitList } from './parser.js';
import type { ProcArgument } from './scope.js';

function usage(command: string): never {
  throw new CommandUsageError(`wrong # args: should be "${command}"`);
}

function parseInteger(text: string): number {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new CommandUsageError(`expected integer but got "${text}"`);
  }
  return parseInt(trimmed, 10);
}

/** Run a script at the location of the command that owns it */
function run<D>(ctx: CommandContext<D>, script: string): Completion {
  return ctx.interp.evalIn(ctx.scope, script, ctx.command.filename, ctx.command.line);
}

function condition<D>(ctx: CommandContext<D>, expression: string): boolean {
  return isTrue(ctx.interp.expr(ctx.scope, expression, ctx.command));
}

type LoopStep = 'next' | 'stop' | Completion;

/**
 * Run a loop body once. `break` stops the loop; `return` and `gotoblock`
 * leave it and travel further.
 */
function loopBody<D>(ctx: CommandContext<D>, body: string): LoopStep {
  const completion = run(ctx, body);
  switch (completion.kind) {
    case 'normal':
    case 'continue':
      return 'next';
    case 'break':
      return 'stop';
    default:
      return completion;
  }
}

function checkIterations<D>(ctx: CommandContext<D>, iterations: number, loop: string): void {
  if (iterations > ctx.interp.maxLoopIterations) {
    throw new CommandUsageError(`${loop} loop exceeded ${ctx.interp.maxLoopIterations} iterations`);
  }
}

function listIndex(index: string, length: number): number {
  const fromEnd = /^end(?:-(\d+))?$/.exec(index.trim());
  if (fromEnd) {
    return length - 1 - (fromEnd[1] === undefined ? 0 : parseInt(fromEnd[1], 10));
  }
  return parseInteger(index);
}

/**
 * Run a script file in the calling scope. A file that cannot be read is
 * skipped with a warning.
 */
export function sourceFile<D>({ interp, scope }: CommandContext<D>, path: string): Completion {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    interp.log.warn(`Not executing source file ${path}: ${errorMessage(error)}`);
    return normal();
  }
  const completion = interp.evalIn(scope, text, path);
  return completion.kind === 'return' ? normal(completion.value) : completion;
}

/**
 * Parse a procedure argument list. A trailing `args` collects the rest.
 */
export function parseProcArguments(argList: string): { args: ProcArgument[]; variadic: boolean } {
  const elements = splitList(argList);
  const args: ProcArgument[] = [];
  let variadic = false;

  elements.forEach((element, i) => {
    const parts = splitList(element);
    if (parts.length === 0 || parts.length > 2) {
      throw new CommandUsageError(`Argument '${element}' must be a name or a name and a default value`);
    }
    const [name, fallback] = parts;
    if (name === 'args' && i === elements.length - 1 && fallback === undefined) {
      variadic = true;
      return;
    }
    const previous = args[args.length - 1];
    if (fallback === undefined && previous?.default !== undefined) {
      throw new CommandUsageError(`non-default argument '${name}' follows default argument`);
    }
    args.push(fallback === undefined ? { name } : { name, default: fallback });
  });

  return { args, variadic };
}

// =============================================================================
// Command table
// =============================================================================

export function createBuiltins<D>(): ReadonlyMap<string, BuiltinCommand<D>> {
  const commands = new Map<string, BuiltinCommand<D>>();

  // --- Variables -------------------------------------------------------------

  commands.set('set', (args, { scope }) => {
    const [name, value] = args;
    if (name === undefined || args.length > 2) usage('set varName ?newValue?');
    if (value === undefined) {
      const current = scope.vars.get(name);
      if (current === undefined) {
        throw new CommandUsageError(`can't read "${name}": no such variable`);
      }
      return normal(current);
    }
    scope.vars.set(name, value);
    return normal(value);
  });

  commands.set('incr', (args, { scope }) => {
    const [name, increment] = args;
    if (name === undefined || args.length > 2) usage('incr varName ?increment?');
    const current = parseInteger(scope.vars.get(name) ?? '0');
    const next = String(current + (increment === undefined ? 1 : parseInteger(increment)));
    scope.vars.set(name, next);
    return normal(next);
  });

  commands.set('append', (args, { scope }) => {
    const [name, ...values] = args;
    if (name === undefined) usage('append varName ?value ...?');
    const next = (scope.vars.get(name) ?? '') + values.join('');
    scope.vars.set(name, next);
    return normal(next);
  });

  commands.set('lappend', (args, { scope }) => {
    const [name, ...values] = args;
    if (name === undefined) usage('lappend varName ?value ...?');
    const current = scope.vars.get(name) ?? '';
    const added = formatList(values);
    const next = current === '' ? added : added === '' ? current : `${current} ${added}`;
    scope.vars.set(name, next);
    return normal(next);
  });

  commands.set('global', (args, { interp }) => {
    // Scripts run with copies of their caller's variables; there is nothing to link
    interp.log.debug(`global ${args.join(' ')} ignored`);
    return normal();
  });

  commands.set('info', (args, { scope }) => {
    const [subcommand, name] = args;
    if (subcommand !== 'exists' || name === undefined || args.length !== 2) {
      throw new CommandUsageError(`info ${subcommand ?? ''} is not supported, only "info exists varName"`);
    }
    return normal(scope.vars.has(name) ? '1' : '0');
  });

  // --- Expressions and control flow ------------------------------------------

  commands.set('expr', (args, ctx) => {
    if (args.length === 0) usage('expr arg ?arg ...?');
    return normal(ctx.interp.expr(ctx.scope, args.join(' '), ctx.command));
  });

  commands.set('if', (args, ctx) => {
    let i = 0;
    while (true) {
      const test = args[i++];
      if (test === undefined) usage('if expr1 ?then? body1 elseif expr2 ?then? body2 ... ?else? ?bodyN?');
      if (args[i] === 'then') i++;
      const body = args[i++];
      if (body === undefined) {
        throw new CommandUsageError(`wrong # args: no script following "${test}" argument`);
      }
      if (condition(ctx, test)) {
        return run(ctx, body);
      }
      if (i >= args.length) {
        return normal();
      }
      if (args[i] === 'elseif') {
        i++;
        continue;
      }
      if (args[i] === 'else') i++;
      const otherwise = args[i];
      if (otherwise === undefined) {
        throw new CommandUsageError('wrong # args: no script following "else" argument');
      }
      if (i + 1 < args.length) {
        throw new CommandUsageError('wrong # args: extra words after "else" clause in "if" command');
      }
      return run(ctx, otherwise);
    }
  });

  commands.set('for', (args, ctx) => {
    if (args.length !== 4) usage('for start test next command');
    const [start, test, next, body] = args;

    const init = run(ctx, start);
    if (init.kind !== 'normal') return init;

    for (let iterations = 1; condition(ctx, test); iterations++) {
      checkIterations(ctx, iterations, 'for');
      const step = loopBody(ctx, body);
      if (step === 'stop') break;
      if (step !== 'next') return step;
      const advanced = run(ctx, next);
      if (advanced.kind !== 'normal') return advanced;
    }
    return normal();
  });

  commands.set('while', (args, ctx) => {
    if (args.length !== 2) usage('while test command');
    const [test, body] = args;

    for (let iterations = 1; condition(ctx, test); iterations++) {
      checkIterations(ctx, iterations, 'while');
      const step = loopBody(ctx, body);
      if (step === 'stop') break;
      if (step !== 'next') return step;
    }
    return normal();
  });

  commands.set('foreach', (args, ctx) => {
    if (args.length !== 3) usage('foreach varName list body');
    const [name, list, body] = args;

    for (const [i, element] of splitList(list).entries()) {
      checkIterations(ctx, i + 1, 'foreach');
      ctx.scope.vars.set(name, element);
      const step = loopBody(ctx, body);
      if (step === 'stop') break;
      if (step !== 'next') return step;
    }
    return normal();
  });

  commands.set('return', (args) => ({ kind: 'return', value: args[args.length - 1] ?? '' }));
  commands.set('break', () => ({ kind: 'break' }));
  commands.set('continue', () => ({ kind: 'continue' }));

  // --- Procedures and evaluation ---------------------------------------------

  commands.set('proc', (args, { scope, command }) => {
    if (args.length !== 3) usage('proc name args body');
    const [name, argList, body] = args;
    const { args: procArgs, variadic } = parseProcArguments(argList);
    const bodyWord = command.words[3];
    scope.procs.set(name, {
      name,
      args: procArgs,
      variadic,
      body,
      filename: command.filename,
      line: bodyWord?.line ?? command.line,
    });
    return normal();
  });

  commands.set('eval', (args, ctx) => {
    if (args.length === 0) usage('eval arg ?arg ...?');
    return run(ctx, args.join(' '));
  });

  commands.set('subst', (args, { interp, scope, command }) => {
    if (args.length !== 1) usage('subst string');
    return normal(interp.substitute(scope, args[0], commandLocation(command)));
  });

  commands.set('source', (args, ctx) => {
    if (args.length !== 1) usage('source fileName');
    return sourceFile(ctx, args[0]);
  });

  commands.set('exec', (args) => {
    throw new CommandUsageError(`exec is not allowed in experiment scripts (${args.join(' ')})`);
  });

  // --- Output ----------------------------------------------------------------

  commands.set('puts', (args, { interp }) => {
    const noNewline = args[0] === '-nonewline';
    const rest = noNewline ? args.slice(1) : args;
    // An explicit channel (stdout, stderr) goes to the same output
    if (rest.length === 0 || rest.length > 2) usage('puts ?-nonewline? ?channelId? string');
    const text = rest[rest.length - 1];
    interp.write(noNewline ? text : `${text}\n`);
    return normal();
  });

  // --- Lists and strings -----------------------------------------------------

  commands.set('list', (args) => normal(formatList(args)));

  commands.set('llength', (args) => {
    if (args.length !== 1) usage('llength list');
    return normal(String(splitList(args[0]).length));
  });

  commands.set('lindex', (args) => {
    const [list, index] = args;
    if (list === undefined || args.length > 2) usage('lindex list ?index?');
    if (index === undefined) return normal(list);
    const elements = splitList(list);
    return normal(elements[listIndex(index, elements.length)] ?? '');
  });

  commands.set('join', (args) => {
    const [list, separator] = args;
    if (list === undefined || args.length > 2) usage('join list ?joinString?');
    return normal(splitList(list).join(separator ?? ' '));
  });

  commands.set('split', (args) => {
    const [text, separators] = args;
    if (text === undefined || args.length > 2) usage('split string ?splitChars?');
    if (separators === '') {
      return normal(formatList([...text]));
    }
    // Every character of splitChars separates
    const chars = [...(separators ?? ' \t\n\r')];
    const parts: string[] = [];
    let current = '';
    for (const c of text) {
      if (chars.includes(c)) {
        parts.push(current);
        current = '';
      } else {
        current += c;
      }
    }
    parts.push(current);
    return normal(formatList(parts));
  });

  commands.set('string', (args) => {
    const [subcommand, text, extra] = args;
    if (subcommand === undefined || text === undefined) usage('string subcommand string ?arg ...?');
    switch (subcommand) {
      case 'tolower':
        return normal(text.toLowerCase());
      case 'toupper':
        return normal(text.toUpperCase());
      case 'length':
        return normal(String([...text].length));
      case 'trim': {
        if (extra === undefined) return normal(text.trim());
        const chars = [...extra];
        let begin = 0;
        let end = text.length;
        while (begin < end && chars.includes(text[begin])) begin++;
        while (end > begin && chars.includes(text[end - 1])) end--;
        return normal(text.slice(begin, end));
      }
      case 'equal':
        if (extra === undefined) usage('string equal string1 string2');
        return normal(text === extra ? '1' : '0');
      default:
        throw new CommandUsageError(
          `unknown or unsupported subcommand "${subcommand}": must be equal, length, tolower, toupper or trim`
        );
    }
  });

  return commands;
}
