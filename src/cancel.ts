/**
 * Cooperative cancellation of a bootstrap run.
 */

import { BootstrapCancelledError } from './errors.js';

export class CancelToken {
  private _cancelled: boolean = false;
  private _reason: string | null = null;

  get isCancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | null {
    return this._reason;
  }

  cancel(reason?: string): void {
    this._cancelled = true;
    this._reason = reason ?? null;
  }

  check(): void {
    if (this._cancelled) {
      throw new BootstrapCancelledError(
        this._reason ? `Bootstrap was cancelled: ${this._reason}` : undefined,
      );
    }
  }

  reset(): void {
    this._cancelled = false;
    this._reason = null;
  }
}
