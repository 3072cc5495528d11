import { LedgerError } from '../utils/errors.js';

type Release = () => void;

/**
 * Single-flight guard shared by every ledger operation. It never queues:
 * entering while another operation holds it throws `ReentrantCall`.
 */
export class ExecutionGuard {
  private holder: string | null = null;

  get busy(): boolean {
    return this.holder !== null;
  }

  get currentHolder(): string | null {
    return this.holder;
  }

  acquire(label: string): Release {
    if (this.holder !== null) {
      throw new LedgerError('ReentrantCall', `${label} called while ${this.holder} is in progress`, {
        attempted: label,
        holder: this.holder,
      });
    }
    this.holder = label;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.holder = null;
    };
  }

  runExclusive<T>(label: string, fn: () => T): T {
    const release = this.acquire(label);
    try {
      return fn();
    } finally {
      release();
    }
  }
}
