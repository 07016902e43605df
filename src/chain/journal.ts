/** Anything holding state that must roll back when a call fails. */
export interface Snapshottable<S> {
  snapshot(): S;
  restore(state: S): void;
}

type Capture = () => () => void;

/**
 * All-or-nothing execution over every registered participant: the in-process
 * stand-in for a reverting transaction. Frames nest; only the outermost commit
 * releases deferred callbacks.
 */
export class StateJournal {
  private readonly captures: Capture[] = [];
  private readonly frames: Array<Array<() => void>> = [];

  register<S>(participant: Snapshottable<S>): void {
    this.captures.push(() => {
      const state = participant.snapshot();
      return () => participant.restore(state);
    });
  }

  get depth(): number {
    return this.frames.length;
  }

  atomically<T>(fn: () => T): T {
    const restorers = this.captures.map((capture) => capture());
    this.frames.push([]);
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.frames.pop();
      for (let i = restorers.length - 1; i >= 0; i -= 1) restorers[i]();
      throw err;
    }
    const committed = this.frames.pop() ?? [];
    const parent = this.frames[this.frames.length - 1];
    if (parent) {
      parent.push(...committed);
    } else {
      for (const callback of committed) callback();
    }
    return result;
  }

  // Runs `callback` once the outermost frame commits; dropped if any enclosing frame fails.
  afterCommit(callback: () => void): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.push(callback);
    else callback();
  }
}
