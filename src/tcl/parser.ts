/**
 * Console Script Parser
 *
 * Splits console scripts into commands and words. A word is bare, quoted
 * ("..."), braced ({...}) or bracketed ([...]). Braced words are taken
 * literally; everything else is substituted by the interpreter when the
 * command runs. Commands end at a newline or `;` outside a word.
 *
 * Also holds the list helpers, since lists are strings in this language.
 */

import { ConsoleScriptError, type SourceLocation } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export type WordKind = 'bare' | 'quoted' | 'braced' | 'bracketed';

export interface Word {
  kind: WordKind;
  /** Text between the delimiters; the whole text for bare words */
  text: string;
  line: number;
  /** Column of the first character, 1-based */
  start: number;
  /** Column of the last character */
  end: number;
}

export interface ParsedCommand {
  words: Word[];
  filename: string;
  line: number;
  char1: number;
  char2: number;
}

export function commandLocation(command: ParsedCommand, word?: Word): SourceLocation {
  if (word !== undefined) {
    return { filename: command.filename, line: word.line, char1: word.start, char2: word.end };
  }
  return { filename: command.filename, line: command.line, char1: command.char1, char2: command.char2 };
}

export function formatWord(word: Word): string {
  switch (word.kind) {
    case 'quoted':
      return `"${word.text}"`;
    case 'braced':
      return `{${word.text}}`;
    default:
      return word.text;
  }
}

export function formatCommand(command: ParsedCommand): string {
  return command.words.map(formatWord).join(' ');
}

// =============================================================================
// Scanning helpers
// =============================================================================

const isSpace = (c: string | undefined): boolean => c === ' ' || c === '\t' || c === '\r';

/**
 * Index of the bracket closing the one at `open`. Braced regions inside are
 * skipped, as are characters escaped with a backslash.
 *
 * @returns -1 when the bracket is never closed
 */
export function findCloseBracket(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const c = text[i];
    if (c === '\\') {
      i++;
    } else if (c === '[') {
      depth++;
    } else if (c === ']') {
      depth--;
      if (depth === 0) return i;
    } else if (c === '{') {
      const close = findCloseBrace(text, i);
      if (close < 0) return -1;
      i = close;
    }
  }
  return -1;
}

/**
 * Index of the brace closing the one at `open`, honoring nesting and
 * backslash-escaped braces.
 *
 * @returns -1 when the brace is never closed
 */
export function findCloseBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const c = text[i];
    if (c === '\\') {
      i++;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// =============================================================================
// Parser
// =============================================================================

class ScriptScanner {
  private pos = 0;
  private line: number;
  private column = 1;
  private commands: ParsedCommand[] = [];
  private words: Word[] = [];

  constructor(
    private readonly text: string,
    private readonly filename: string,
    startLine: number
  ) {
    this.line = startLine;
  }

  parse(): ParsedCommand[] {
    while (this.pos < this.text.length) {
      const c = this.text[this.pos];

      if (isSpace(c)) {
        this.advance();
      } else if (this.atContinuation()) {
        this.skipContinuation();
      } else if (c === '\n' || c === ';') {
        this.endCommand();
        this.advance();
      } else if (c === '#') {
        if (this.words.length > 0) {
          throw this.error('Cannot start a comment here!');
        }
        this.skipComment();
      } else if (c === '{') {
        this.words.push(this.readBraced());
      } else if (c === '"') {
        this.words.push(this.readQuoted());
      } else {
        this.words.push(this.readBare());
      }
    }
    this.endCommand();
    return this.commands;
  }

  private advance(count: number = 1): void {
    for (let n = 0; n < count && this.pos < this.text.length; n++) {
      if (this.text[this.pos] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private atContinuation(): boolean {
    return this.text[this.pos] === '\\' && this.text[this.pos + 1] === '\n';
  }

  /** Skip a backslash, the newline and the indentation that follows */
  private skipContinuation(): void {
    this.advance(2);
    while (isSpace(this.text[this.pos])) this.advance();
  }

  private skipComment(): void {
    while (this.pos < this.text.length && this.text[this.pos] !== '\n') {
      if (this.atContinuation()) {
        this.skipContinuation();
      } else {
        this.advance();
      }
    }
  }

  private endCommand(): void {
    if (this.words.length === 0) return;
    const first = this.words[0];
    const last = this.words[this.words.length - 1];
    this.commands.push({
      words: this.words,
      filename: this.filename,
      line: first.line,
      char1: first.start,
      char2: last.end,
    });
    this.words = [];
  }

  private error(detail: string, line: number = this.line, column: number = this.column): ConsoleScriptError {
    return new ConsoleScriptError(detail, { filename: this.filename, line, char1: column, char2: column });
  }

  /** A word may only be followed by a separator */
  private expectSeparator(closing: string): void {
    const c = this.text[this.pos];
    if (c === undefined || isSpace(c) || c === '\n' || c === ';' || this.atContinuation()) return;
    throw this.error(`Extra characters after close-${closing}`);
  }

  private readBraced(): Word {
    const line = this.line;
    const start = this.column;
    let depth = 1;
    let text = '';
    this.advance();

    while (true) {
      const c = this.text[this.pos];
      if (c === undefined) {
        throw this.error('Missing close-brace', line, start);
      }
      if (this.atContinuation()) {
        this.skipContinuation();
        text += ' ';
        continue;
      }
      if (c === '\\') {
        text += c + (this.text[this.pos + 1] ?? '');
        this.advance(2);
        continue;
      }
      if (c === '{') depth++;
      if (c === '}') {
        depth--;
        if (depth === 0) break;
      }
      text += c;
      this.advance();
    }

    const end = this.column;
    this.advance();
    this.expectSeparator('brace');
    return { kind: 'braced', text, line, start, end };
  }

  private readQuoted(): Word {
    const line = this.line;
    const start = this.column;
    let text = '';
    this.advance();

    while (true) {
      const c = this.text[this.pos];
      if (c === undefined) {
        throw this.error('Missing close-quote', line, start);
      }
      if (this.atContinuation()) {
        this.skipContinuation();
        text += ' ';
        continue;
      }
      if (c === '\\') {
        text += c + (this.text[this.pos + 1] ?? '');
        this.advance(2);
        continue;
      }
      if (c === '[') {
        text += this.readBracketText(line, start);
        continue;
      }
      if (c === '"') break;
      text += c;
      this.advance();
    }

    const end = this.column;
    this.advance();
    this.expectSeparator('quote');
    return { kind: 'quoted', text, line, start, end };
  }

  private readBare(): Word {
    const line = this.line;
    const start = this.column;
    let text = '';
    let onlyBracket = this.text[this.pos] === '[';

    while (this.pos < this.text.length) {
      const c = this.text[this.pos];
      if (isSpace(c) || c === '\n' || c === ';' || this.atContinuation()) break;
      if (c === '\\') {
        text += c + (this.text[this.pos + 1] ?? '');
        this.advance(2);
      } else if (c === '[') {
        const group = this.readBracketText(line, start);
        if (text !== '') onlyBracket = false;
        text += group;
      } else {
        text += c;
        onlyBracket = false;
        this.advance();
      }
    }

    if (onlyBracket) {
      return { kind: 'bracketed', text: text.slice(1, -1), line, start, end: this.column - 1 };
    }
    return { kind: 'bare', text, line, start, end: this.column - 1 };
  }

  /** Raw text of a bracket group, delimiters included */
  private readBracketText(line: number, start: number): string {
    const close = findCloseBracket(this.text, this.pos);
    if (close < 0) {
      throw this.error('Missing close-bracket', line, start);
    }
    const group = this.text.slice(this.pos, close + 1);
    this.advance(group.length);
    return group;
  }
}

/**
 * Parse a script into commands. Empty commands and comments are dropped.
 *
 * @throws ConsoleScriptError on syntax errors
 */
export function parseScript(text: string, filename: string = 'Console', startLine: number = 1): ParsedCommand[] {
  return new ScriptScanner(text, filename, startLine).parse();
}

// =============================================================================
// Lists
// =============================================================================

/**
 * Split a list into its elements. Elements may be braced or quoted; braced
 * elements are taken literally.
 *
 * @throws Error for unbalanced braces or quotes
 */
export function splitList(list: string): string[] {
  const elements: string[] = [];
  let i = 0;

  while (i < list.length) {
    while (i < list.length && /\s/.test(list[i])) i++;
    if (i >= list.length) break;

    if (list[i] === '{') {
      const close = findCloseBrace(list, i);
      if (close < 0) throw new Error('unmatched open brace in list');
      elements.push(list.slice(i + 1, close));
      i = close + 1;
    } else if (list[i] === '"') {
      let j = i + 1;
      while (j < list.length && list[j] !== '"') {
        if (list[j] === '\\') j++;
        j++;
      }
      if (j >= list.length) throw new Error('unmatched open quote in list');
      elements.push(list.slice(i + 1, j));
      i = j + 1;
    } else {
      let j = i;
      while (j < list.length && !/\s/.test(list[j])) {
        if (list[j] === '\\') j++;
        j++;
      }
      elements.push(list.slice(i, j));
      i = j;
    }
  }
  return elements;
}

function quoteElement(element: string): string {
  if (element === '') return '{}';
  if (/[\s{}"[\]$;\\]/.test(element) || element.startsWith('#')) {
    return `{${element}}`;
  }
  return element;
}

/** Build a list from elements, bracing the ones that need it */
export function formatList(elements: readonly string[]): string {
  return elements.map(quoteElement).join(' ');
}
