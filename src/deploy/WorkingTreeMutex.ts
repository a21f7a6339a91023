/**
 * Async mutex guarding the deployed working tree.
 *
 * Promise chain, not an OS lock: the pipeline, update checks, secret
 * refreshes and drift checks all run in this process and take turns here.
 */
export class WorkingTreeMutex {
  private held: Promise<void> | null = null;

  /**
   * Wait for exclusive access.
   * Returns a release function that MUST be called in a finally block.
   */
  async acquire(): Promise<() => void> {
    while (this.held) {
      await this.held;
    }
    return this.take();
  }

  /**
   * Take the lock only if it is free right now; null otherwise.
   */
  tryAcquire(): (() => void) | null {
    if (this.held) return null;
    return this.take();
  }

  isLocked(): boolean {
    return this.held !== null;
  }

  private take(): () => void {
    let release: () => void = () => {};
    const promise = new Promise<void>(r => {
      release = () => {
        // A second call is a no-op
        if (this.held === promise) this.held = null;
        r();
      };
    });
    this.held = promise;
    return release;
  }
}
