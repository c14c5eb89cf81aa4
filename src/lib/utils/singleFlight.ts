import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorCode, TradingError } from '../errors';

/**
 * Serializes state-mutating entry points.
 *
 * Independent callers queue in arrival order and run one at a time. A call
 * made from inside a guarded operation (a collaborator calling back in) is
 * rejected before it can read or write anything, since queueing it would
 * wait on its own caller.
 */
export class SingleFlightGuard {
  private readonly context = new AsyncLocalStorage<string>();
  private active: string | null = null;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  get busy(): boolean {
    return this.active !== null;
  }

  get current(): string | null {
    return this.active;
  }

  /** Operations waiting behind the active one. */
  get waiting(): number {
    return this.queued;
  }

  /** For synchronous mutators: reject when called from inside a guarded operation. */
  assertIdle(operation: string): void {
    const outer = this.context.getStore();
    if (outer !== undefined) {
      throw new TradingError(
        ErrorCode.REENTRANT_CALL,
        `${operation} rejected: ${outer} is in progress`,
        { operation, active: outer }
      );
    }
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.assertIdle(operation);

    const previous = this.tail;
    let done: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      done = resolve;
    });

    this.queued += 1;
    await previous;
    this.queued -= 1;

    this.active = operation;
    try {
      return await this.context.run(operation, fn);
    } finally {
      this.active = null;
      done();
    }
  }
}
