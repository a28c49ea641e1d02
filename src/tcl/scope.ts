/**
 * Scope Arena
 *
 * Every scope lives in one arena and refers to its parent by index. A child
 * starts with a copy of its parent's variables (never an alias) and a copy
 * of the procedures visible to the parent at creation time. Each scope keeps
 * a log of the commands it ran; a log entry for a procedure call points at
 * the child scope the call ran in, so callers can recover what the callee
 * did.
 */

export interface ProcArgument {
  name: string;
  default?: string;
}

export interface ProcDefinition {
  name: string;
  args: ProcArgument[];
  /** Trailing `args` collector present */
  variadic: boolean;
  body: string;
  filename: string;
  line: number;
}

export interface CallLogEntry {
  words: string[];
  result: string;
  /** Scope a procedure call ran in */
  child?: number;
}

export interface Scope<D> {
  readonly id: number;
  readonly parent: number | null;
  readonly name: string;
  readonly vars: Map<string, string>;
  /** Procedures visible from the parent when this scope was created */
  readonly inheritedProcs: ReadonlyMap<string, ProcDefinition>;
  readonly procs: Map<string, ProcDefinition>;
  readonly log: CallLogEntry[];
  /** Domain state owned by this scope */
  state: D;
}

export class ScopeArena<D> {
  private scopes: Scope<D>[] = [];

  /**
   * Create a scope without parent
   */
  createRoot(name: string, state: D, vars: Iterable<[string, string]> = []): Scope<D> {
    return this.push({
      id: this.scopes.length,
      parent: null,
      name,
      vars: new Map(vars),
      inheritedProcs: new Map(),
      procs: new Map(),
      log: [],
      state,
    });
  }

  createChild(parentId: number, name: string, state: D): Scope<D> {
    const parent = this.get(parentId);
    return this.push({
      id: this.scopes.length,
      parent: parentId,
      name,
      vars: new Map(parent.vars),
      inheritedProcs: this.visibleProcs(parent),
      procs: new Map(),
      log: [],
      state,
    });
  }

  get(id: number): Scope<D> {
    const scope = this.scopes[id];
    if (scope === undefined) {
      throw new RangeError(`No scope with id ${id}`);
    }
    return scope;
  }

  get size(): number {
    return this.scopes.length;
  }

  lookupProc(scope: Scope<D>, name: string): ProcDefinition | undefined {
    return scope.procs.get(name) ?? scope.inheritedProcs.get(name);
  }

  visibleProcs(scope: Scope<D>): Map<string, ProcDefinition> {
    return new Map([...scope.inheritedProcs, ...scope.procs]);
  }

  /**
   * Words of every logged call to one of `commands`, in execution order.
   * With `recursive`, calls made inside procedure bodies are included where
   * they happened.
   */
  callsTo(scope: Scope<D>, commands: readonly string[], recursive: boolean = true): string[][] {
    const calls: string[][] = [];
    for (const entry of scope.log) {
      if (commands.includes(entry.words[0])) {
        calls.push(entry.words);
      }
      if (recursive && entry.child !== undefined) {
        calls.push(...this.callsTo(this.get(entry.child), commands, true));
      }
    }
    return calls;
  }

  private push(scope: Scope<D>): Scope<D> {
    this.scopes.push(scope);
    return scope;
  }
}
