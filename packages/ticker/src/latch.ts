/**
 * One-shot completion latch: `wait()` resolves once `release()` has been
 * called, for every waiter, before or after the release.
 */
export class Latch {
  private _released = false;
  private readonly _promise: Promise<void>;
  private _resolve: () => void = () => {};

  constructor() {
    this._promise = new Promise<void>((resolve) => {
      this._resolve = resolve;
    });
  }

  get released(): boolean {
    return this._released;
  }

  release(): void {
    if (this._released) return;
    this._released = true;
    this._resolve();
  }

  wait(): Promise<void> {
    return this._promise;
  }
}
