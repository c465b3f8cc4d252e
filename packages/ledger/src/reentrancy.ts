/**
 * @twinledger/ledger — Reentrancy guard.
 *
 * One guard per contract. While a guarded entry point of that contract
 * is running, any other guarded entry point of the same contract is
 * rejected. Unguarded functions (views, governance) are unaffected.
 */

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  /**
   * Run `fn` unless the guard is already held; otherwise call
   * `onReentry`, which is expected to throw the caller's own error.
   */
  run<T>(fn: () => T, onReentry: () => never): T {
    if (this._entered) onReentry();
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }
}
