import { CancelledError } from './errors.js';

/**
 * Operator-triggered cancellation, honored between remote calls.
 */
export class CancellationToken {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    this.controller.abort();
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError();
    }
  }

  /**
   * Cancel on the first Ctrl+C; a second Ctrl+C exits immediately
   */
  static fromProcessSignals(): CancellationToken {
    const token = new CancellationToken();
    const onSigint = () => {
      if (token.isCancelled) {
        process.exit(130);
      }
      console.warn('\n⚠️  Cancellation requested - finishing the current remote call (Ctrl+C again to force exit)');
      token.cancel();
    };
    process.on('SIGINT', onSigint);
    return token;
  }
}
