/**
 * Critical Section
 *
 * Single-holder guard around a synchronous block. Engine state is only
 * touched from synchronous code, so the hazard is re-entry: a host callback
 * invoked mid-pass that calls back into the same registry or recorder.
 * `run` nests (the outer holder already owns the state); `tryRun` refuses
 * to enter while held.
 */
export class CriticalSection {
  private depth = 0;

  get held(): boolean {
    return this.depth > 0;
  }

  run<T>(fn: () => T): T {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  tryRun<T>(fn: () => T): { entered: true; value: T } | { entered: false } {
    if (this.held) {
      return { entered: false };
    }
    return { entered: true, value: this.run(fn) };
  }
}
