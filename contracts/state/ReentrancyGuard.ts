import { ReentrancyGuardReentrantCall } from '../errors';

/**
 * One flag per guarded instance. Entering while the flag is set throws; the
 * flag is cleared on every exit path, failures included.
 */
export class ReentrancyGuard {
  private entered = false;

  nonReentrant<T>(fn: () => T): T {
    if (this.entered) throw new ReentrancyGuardReentrantCall();
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }

  get isEntered(): boolean {
    return this.entered;
  }
}
