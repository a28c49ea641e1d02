/**
 * Controller Program Parser
 *
 * Splits controller program lines into timed commands. Two statement forms:
 *
 *   AT <µs> <mnemonic>[,<mnemonic>...] [<mnemonic>...]
 *   SETTCR <µs>
 *
 * Everything after `%` is a comment.
 */

import { readFile } from 'node:fs/promises';
import { ControllerProgramError } from '../errors.js';
import { US } from '../types.js';

export interface Command {
  /** Seconds, relative to the time control register */
  time: number;
  mnemonic: string;
  /** 1-based source line, 0 when unknown */
  line: number;
}

export const COMMENT_MARKER = '%';

function parseTime(token: string | undefined, line: number): number {
  const value = token === undefined ? NaN : Number(token);
  if (token === undefined || token.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ControllerProgramError(`'${token ?? ''}' is not a valid time`, line);
  }
  return value * US;
}

/**
 * Parse one line. Blank and comment-only lines yield no commands.
 *
 * @throws ControllerProgramError for anything but AT and SETTCR statements
 */
export function parseLine(source: string, line: number = 0): Command[] {
  const code = source.split(COMMENT_MARKER)[0];
  const args = code.split(/\s+/).filter((token) => token !== '');

  if (args.length === 0) {
    return [];
  }

  switch (args[0]) {
    case 'AT': {
      if (args.length < 3) {
        throw new ControllerProgramError("Line starting with 'AT' must include time and command(s)!", line);
      }
      const time = parseTime(args[1], line);
      return args
        .slice(2)
        .flatMap((token) => token.split(','))
        .filter((mnemonic) => mnemonic !== '')
        .map((mnemonic) => ({ time, mnemonic, line }));
    }

    case 'SETTCR':
      return [{ time: parseTime(args[1], line), mnemonic: 'SETTCR', line }];

    default:
      throw new ControllerProgramError(
        "Line must start with 'AT' or 'SETTCR'. Use '%' for comments.",
        line
      );
  }
}

/**
 * Parse a whole program in file order. Parsing stops at the first REP: what
 * follows it never runs on the hardware.
 */
export function parseProgram(text: string): Command[] {
  const commands: Command[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    for (const command of parseLine(lines[i], i + 1)) {
      commands.push(command);
      if (command.mnemonic === 'REP') {
        return commands;
      }
    }
  }
  return commands;
}

export async function parseProgramFile(path: string): Promise<Command[]> {
  return parseProgram(await readFile(path, 'utf-8'));
}

export function formatCommand(command: Command): string {
  return `${command.mnemonic} at ${command.time / US} µs (line ${command.line})`;
}
