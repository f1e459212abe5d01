/**
 * Interruptible bounded wait. The loop parks on wait(ms) between passes;
 * wake() from anywhere (a human message, stop()) resolves it early.
 * A wake with nobody waiting is remembered until the next wait.
 */
export class WakeSignal {
  private resolveWait: (() => void) | null = null;
  private pending = false;

  wait(ms: number): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.resolveWait = null;
        resolve();
      };
      this.resolveWait = done;
      const timer = setTimeout(done, ms);
    });
  }

  wake(): void {
    if (this.resolveWait) {
      this.resolveWait();
    } else {
      this.pending = true;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
