/**
 * Run-once guard with a lifetime independent of any generator.
 *
 * `run` is synchronous, so within one isolate nothing can observe the action
 * half-done: every caller after the first sees it completed. Worker threads
 * load their own copy of this module, and with it their own random source,
 * so each isolate seeds its own source once.
 */
export class OnceGuard {
  #state: 'idle' | 'running' | 'done' = 'idle';

  /**
   * Runs `action` if no earlier call has completed it. Returns whether the
   * action ran.
   *
   * A throwing action leaves the guard idle and the error propagates, so the
   * next call tries again. Calls made from inside the action are skipped.
   */
  run(action: () => void): boolean {
    if (this.#state !== 'idle') {
      return false;
    }
    this.#state = 'running';
    try {
      action();
    } catch (error) {
      this.#state = 'idle';
      throw error;
    }
    this.#state = 'done';
    return true;
  }

  get done(): boolean {
    return this.#state === 'done';
  }
}
