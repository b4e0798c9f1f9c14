/**
 * Cancellation scopes: a tree of one-shot cancellation tokens.
 *
 * Cancelling a scope cancels every scope derived from it. Children register
 * with their parent on creation and unregister once cancelled, so a
 * long-lived parent does not retain retired children.
 */

export type CancelListener = (reason: unknown) => void;

export class CancellationScope {
  private _cancelled = false;
  private _reason: unknown = undefined;
  private readonly _listeners = new Set<CancelListener>();
  private readonly _children = new Set<CancellationScope>();
  private readonly _parent: CancellationScope | undefined;
  private readonly _settled: Promise<unknown>;
  private _resolveSettled: (reason: unknown) => void = () => {};

  /**
   * @param parent - Scope whose cancellation propagates to this one.
   *   Omit for a detached root that only cancels when told to.
   */
  constructor(parent?: CancellationScope) {
    this._settled = new Promise<unknown>((resolve) => {
      this._resolveSettled = resolve;
    });
    this._parent = parent;

    if (parent === undefined) return;
    if (parent.isCancelled) {
      this.cancel(parent.reason);
      return;
    }
    parent._children.add(this);
  }

  /**
   * Adopt an AbortSignal as the parent of a new scope.
   * The abort listener is removed again once the scope cancels.
   */
  static fromSignal(signal: AbortSignal): CancellationScope {
    const scope = new CancellationScope();
    if (signal.aborted) {
      scope.cancel(signal.reason);
      return scope;
    }

    const onAbort = (): void => {
      scope.cancel(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    scope.onCancel(() => {
      signal.removeEventListener("abort", onAbort);
    });
    return scope;
  }

  get isCancelled(): boolean {
    return this._cancelled;
  }

  /** Reason passed to the `cancel()` call that fired this scope (or its ancestor). */
  get reason(): unknown {
    return this._reason;
  }

  /** Resolves with the cancellation reason once the scope fires. Never rejects. */
  whenCancelled(): Promise<unknown> {
    return this._settled;
  }

  /** Derive a child scope. */
  child(): CancellationScope {
    return new CancellationScope(this);
  }

  /**
   * Register a listener run once on cancellation. Runs synchronously right
   * away if the scope is already cancelled.
   *
   * @returns unsubscribe function
   */
  onCancel(listener: CancelListener): () => void {
    if (this._cancelled) {
      listener(this._reason);
      return () => {};
    }
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  /**
   * Fire the scope. Idempotent: only the first call has any effect.
   *
   * @returns true if this call cancelled the scope
   * @throws {AggregateError} if any listener (here or in a descendant) threw;
   *   every listener still runs
   */
  cancel(reason?: unknown): boolean {
    if (this._cancelled) return false;
    this._cancelled = true;
    this._reason = reason;
    this._parent?._children.delete(this);

    const errors: unknown[] = [];

    const children = [...this._children];
    this._children.clear();
    for (const child of children) {
      try {
        child.cancel(reason);
      } catch (error) {
        errors.push(error);
      }
    }

    const listeners = [...this._listeners];
    this._listeners.clear();
    for (const listener of listeners) {
      try {
        listener(reason);
      } catch (error) {
        errors.push(error);
      }
    }

    this._resolveSettled(reason);

    if (errors.length > 0) {
      throw new AggregateError(errors, "CancellationScope listener failed");
    }
    return true;
  }

  /** Number of live child scopes (diagnostics). */
  get childCount(): number {
    return this._children.size;
  }
}
