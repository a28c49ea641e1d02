/**
 * Completion of a console command. Anything but `normal` unwinds to the
 * boundary that handles it.
 */
export type Completion =
  | { kind: 'normal'; value: string }
  | { kind: 'return'; value: string }
  | { kind: 'break' }
  | { kind: 'continue' }
  | { kind: 'gotoBlock'; words: string[] };

export const normal = (value: string = ''): Completion => ({ kind: 'normal', value });

export function describeCompletion(completion: Completion): string {
  return completion.kind === 'gotoBlock' ? 'gotoblock' : completion.kind;
}

export function isCompletion(value: unknown): value is Completion {
  return typeof value === 'object' && value !== null && 'kind' in value;
}
