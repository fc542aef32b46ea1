import { AsyncLocalStorage } from 'async_hooks';

import { TransactionContext } from './transaction-context';

/**
 * Ambient metadata keys projected from the bound context.
 * Keys outside this set (and outside the annotation namespace) belong to
 * application code and survive `clear()`.
 */
export const CORRELATION_ID_KEY = 'correlation.id';
export const USER_ID_KEY = 'user.id';
export const SERVICE_ID_KEY = 'service.id';
export const ANNOTATION_PREFIX = 'context.';

export type AmbientMetadata = ReadonlyMap<string, string>;

/**
 * State for one logical unit of work. A fresh scope is created per request
 * (`runIsolated`) and per nesting level (`runScoped`) and is written in place.
 *
 * A `detached` scope was entered by a write made outside any run. Flows started
 * afterwards from the same caller inherit it, so it is never written in place:
 * each write enters a copy.
 */
interface ExecutionScope {
  context?: TransactionContext;
  readonly metadata: Map<string, string>;
  readonly detached?: boolean;
}

/**
 * Handle to the scope a context was bound into. Lets callbacks that fire outside
 * the request's async flow (response `finish`/`close` listeners) still reach it.
 */
export interface ContextBinding {
  readonly context: TransactionContext;
  run<T>(fn: () => T): T;
  release(): void;
}

const isOwnedKey = (key: string): boolean =>
  key === CORRELATION_ID_KEY ||
  key === USER_ID_KEY ||
  key === SERVICE_ID_KEY ||
  key.startsWith(ANNOTATION_PREFIX);

const removeOwnedKeys = (metadata: Map<string, string>): void => {
  for (const key of [...metadata.keys()]) {
    if (isOwnedKey(key)) {
      metadata.delete(key);
    }
  }
};

const project = (scope: ExecutionScope, context: TransactionContext): void => {
  removeOwnedKeys(scope.metadata);
  scope.metadata.set(CORRELATION_ID_KEY, context.correlationId);
  scope.metadata.set(SERVICE_ID_KEY, context.serviceId);
  if (context.userId !== undefined) {
    scope.metadata.set(USER_ID_KEY, context.userId);
  }
  for (const [key, value] of Object.entries(context.annotations)) {
    scope.metadata.set(`${ANNOTATION_PREFIX}${key}`, value);
  }
};

const releaseScope = (scope: ExecutionScope): void => {
  scope.context = undefined;
  removeOwnedKeys(scope.metadata);
};

/**
 * Binds a TransactionContext to the current async execution flow and mirrors it
 * into ambient metadata read by the record assembler.
 *
 * Backed by AsyncLocalStorage, so the binding follows the logical task across
 * awaits, timers and callbacks rather than any particular tick of the event loop.
 */
export class ContextPropagationStore {
  private readonly storage = new AsyncLocalStorage<ExecutionScope>();

  /**
   * Replace the binding for the current scope. Outside any scope a new one is
   * entered for the remainder of the current async flow.
   */
  bind(context: TransactionContext): ContextBinding {
    const scope = this.writableScope();
    scope.context = context;
    project(scope, context);
    return this.bindingFor(scope, context);
  }

  current(): TransactionContext | undefined {
    return this.storage.getStore()?.context;
  }

  correlationId(): string | undefined {
    return this.current()?.correlationId;
  }

  /**
   * Remove the binding and the metadata keys projected from it. Safe to repeat.
   */
  clear(): void {
    if (this.storage.getStore()) {
      releaseScope(this.writableScope());
    }
  }

  /**
   * Run `body` with `context` bound. Whatever was bound before is observed again
   * once `body` returns or throws; for async bodies the inner binding stays with
   * the promise chain `body` started.
   */
  runScoped<T>(context: TransactionContext, body: () => T): T {
    const parent = this.storage.getStore();
    const scope: ExecutionScope = { metadata: new Map(parent?.metadata) };
    scope.context = context;
    project(scope, context);
    return this.storage.run(scope, body);
  }

  /**
   * Run `body` in a fresh scope with no binding and no inherited metadata
   */
  runIsolated<T>(body: () => T): T {
    return this.storage.run({ metadata: new Map() }, body);
  }

  /**
   * Derive a new context from the bound one and rebind it. Returns undefined,
   * leaving the scope untouched, when nothing is bound.
   */
  update(derive: (context: TransactionContext) => TransactionContext): TransactionContext | undefined {
    const existing = this.current();
    if (!existing) {
      return undefined;
    }
    const next = derive(existing);
    this.bind(next);
    return next;
  }

  putMetadata(key: string, value: string): void {
    this.writableScope().metadata.set(key, value);
  }

  removeMetadata(key: string): void {
    if (this.storage.getStore()?.metadata.has(key)) {
      this.writableScope().metadata.delete(key);
    }
  }

  metadata(): AmbientMetadata {
    return new Map(this.storage.getStore()?.metadata);
  }

  /**
   * Run `body` with extra ambient entries visible to every record it logs
   */
  runWithMetadata<T>(entries: Readonly<Record<string, string>>, body: () => T): T {
    const parent = this.storage.getStore();
    const scope: ExecutionScope = {
      context: parent?.context,
      metadata: new Map(parent?.metadata),
    };
    for (const [key, value] of Object.entries(entries)) {
      scope.metadata.set(key, value);
    }
    return this.storage.run(scope, body);
  }

  private writableScope(): ExecutionScope {
    const existing = this.storage.getStore();
    if (existing && !existing.detached) {
      return existing;
    }
    const scope: ExecutionScope = {
      context: existing?.context,
      metadata: new Map(existing?.metadata),
      detached: true,
    };
    this.storage.enterWith(scope);
    return scope;
  }

  private bindingFor(scope: ExecutionScope, context: TransactionContext): ContextBinding {
    const storage = this.storage;
    return {
      context,
      run: <T>(fn: () => T): T => storage.run(scope, fn),
      release: (): void => releaseScope(scope),
    };
  }
}

/**
 * Process-wide store shared by the middleware, loggers and outbound helpers
 */
export const contextStore = new ContextPropagationStore();
