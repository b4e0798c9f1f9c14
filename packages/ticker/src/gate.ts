/**
 * Wake gate for the control loop.
 *
 * `open()` releases the parked `wait()`, or, when nobody is parked, leaves a
 * pending wake so the next `wait()` returns at once. Multiple opens before a
 * wait collapse into one wake; the loop re-checks its inputs after every wake.
 */
export class WakeGate {
  private _pending = false;
  private _resolve: (() => void) | undefined;

  open(): void {
    const resolve = this._resolve;
    if (resolve) {
      this._resolve = undefined;
      resolve();
      return;
    }
    this._pending = true;
  }

  wait(): Promise<void> {
    if (this._pending) {
      this._pending = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._resolve = resolve;
    });
  }
}
