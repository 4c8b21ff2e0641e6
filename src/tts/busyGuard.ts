import { BackendBusyError } from './errors.js';

/**
 * Single-slot mutual exclusion for one provider instance.
 *
 * `run` never waits: if the slot is taken it rejects with BackendBusyError so a
 * second request can't interleave its audio chunks with the first.
 */
export class BusyGuard {
  private busy = false;

  constructor(private readonly owner: string) {}

  get isBusy(): boolean {
    return this.busy;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new BackendBusyError(this.owner);
    }
    this.busy = true;
    try {
      return await operation();
    } finally {
      this.busy = false;
    }
  }
}
