/**
 * Request-scoped, cancellable key/value carrier.
 *
 * A Context is immutable: values are added and cancellation is scoped by
 * deriving a child. Children observe their parent's cancellation; cancelling a
 * child never affects the parent. Cancellation is exposed through a native
 * AbortSignal so it can be handed straight to fetch, timers, streams, etc.
 *
 *   const [ctx, cancel] = withCancel(background());
 *   const scoped = withValue(ctx, userKey, user);
 *   try { await work(scoped) } finally { cancel() }
 */

import { ContextCanceledError, DeadlineExceededError } from '../errors.js';

export type CancelFunc = () => void;

/** Largest delay setTimeout honours (2^31 - 1). */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

interface ContextInit {
  parent: Context | null;
  signal: AbortSignal;
  cancellable: boolean;
  deadline: Date | null;
}

export class Context {
  readonly parent: Context | null;
  /** Aborts when this context is cancelled. The abort reason is the context error. */
  readonly signal: AbortSignal;
  /** False for contexts that can never be cancelled (background and its value children). */
  readonly cancellable: boolean;
  readonly deadline: Date | null;

  /** @internal Use background() and the with* functions. */
  constructor(init: ContextInit) {
    this.parent = init.parent;
    this.signal = init.signal;
    this.cancellable = init.cancellable;
    this.deadline = init.deadline;
  }

  get done(): boolean {
    return this.signal.aborted;
  }

  /** Why the context was cancelled, or null while it is still live. */
  err(): Error | null {
    if (!this.signal.aborted) return null;
    const reason: unknown = this.signal.reason;
    return reason instanceof Error ? reason : new ContextCanceledError();
  }

  throwIfDone(): void {
    const err = this.err();
    if (err) throw err;
  }

  value<T>(key: ContextKey<T>): T | undefined {
    return key.lookup(this);
  }
}

/**
 * Typed context key. Keys compare by identity, so two keys with the same
 * name never collide.
 */
export class ContextKey<T> {
  private readonly bindings = new WeakMap<Context, T>();

  constructor(readonly name: string) {}

  /** Derive a child of `parent` that binds this key to `value`. */
  bind(parent: Context, value: T): Context {
    const child = new Context({
      parent,
      signal: parent.signal,
      cancellable: parent.cancellable,
      deadline: parent.deadline,
    });
    this.bindings.set(child, value);
    return child;
  }

  /** Nearest binding from `ctx` up through its ancestors. */
  lookup(ctx: Context): T | undefined {
    for (let node: Context | null = ctx; node; node = node.parent) {
      if (this.bindings.has(node)) return this.bindings.get(node);
    }
    return undefined;
  }

  toString(): string {
    return `ContextKey(${this.name})`;
  }
}

const backgroundContext = new Context({
  parent: null,
  signal: new AbortController().signal,
  cancellable: false,
  deadline: null,
});

/** The root context. Never cancelled, carries no values and no deadline. */
export function background(): Context {
  return backgroundContext;
}

export function createContextKey<T>(name: string): ContextKey<T> {
  return new ContextKey<T>(name);
}

export function withValue<T>(parent: Context, key: ContextKey<T>, value: T): Context {
  return key.bind(parent, value);
}

export function withCancel(parent: Context): [Context, CancelFunc] {
  const { ctx, abort } = cancellableChild(parent, parent.deadline);
  return [ctx, () => abort(new ContextCanceledError())];
}

/**
 * Like withCancel, but also cancels with DeadlineExceededError once `deadline`
 * passes. An earlier parent deadline takes precedence.
 */
export function withDeadline(parent: Context, deadline: Date): [Context, CancelFunc] {
  if (parent.deadline && parent.deadline.getTime() <= deadline.getTime()) {
    return withCancel(parent);
  }

  const { ctx, abort } = cancellableChild(parent, deadline);
  const cancel: CancelFunc = () => abort(new ContextCanceledError());
  if (ctx.done) return [ctx, cancel];

  let timer: NodeJS.Timeout | undefined;
  // setTimeout fires after 1ms for delays it cannot represent; wait in steps instead
  const arm = (): void => {
    const remaining = deadline.getTime() - Date.now();
    if (remaining <= 0) {
      abort(new DeadlineExceededError());
      return;
    }
    timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_DELAY_MS));
    timer.unref();
  };

  ctx.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
  arm();

  return [ctx, cancel];
}

export function withTimeout(parent: Context, timeoutMs: number): [Context, CancelFunc] {
  return withDeadline(parent, new Date(Date.now() + timeoutMs));
}

function cancellableChild(
  parent: Context,
  deadline: Date | null
): { ctx: Context; abort: (reason: Error) => void } {
  const controller = new AbortController();
  const ctx = new Context({
    parent,
    signal: controller.signal,
    cancellable: true,
    deadline,
  });

  const onParentAbort = (): void => {
    abort(parent.err() ?? new ContextCanceledError());
  };

  const abort = (reason: Error): void => {
    if (controller.signal.aborted) return;
    // Detach so long-lived parents don't accumulate listeners from finished children
    parent.signal.removeEventListener('abort', onParentAbort);
    controller.abort(reason);
  };

  if (parent.done) {
    abort(parent.err() ?? new ContextCanceledError());
  } else if (parent.cancellable) {
    parent.signal.addEventListener('abort', onParentAbort, { once: true });
  }

  return { ctx, abort };
}
