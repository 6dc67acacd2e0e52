/**
 * Explicit mutual exclusion for synchronous state.
 *
 * JavaScript runs a synchronous section to completion, so no other caller can
 * interleave with it. What can still happen is re-entry from a callback
 * invoked inside the section; that is rejected rather than allowed to observe
 * half-updated state.
 */
export class CriticalSection {
  private held = false;

  constructor(private readonly name: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  run<T>(body: () => T): T {
    if (this.held) {
      throw new Error(`Re-entrant access to '${this.name}' is not allowed.`);
    }
    this.held = true;
    try {
      return body();
    } finally {
      this.held = false;
    }
  }
}
