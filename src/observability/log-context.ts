import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields merged into every log line written while the
 * request is handled
 */
export interface LogContext {
  correlationId: string;
  /** Set once a sale has been recorded for the request */
  transactionId?: string;
  eventId?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with a fresh log context; everything it awaits shares the context
 */
export const runWithLogContext = <T>(context: LogContext, fn: () => T): T =>
  asyncLocalStorage.run({ ...context }, fn);

export const getCorrelationId = (): string | undefined => asyncLocalStorage.getStore()?.correlationId;

export const getLogContext = (): LogContext | undefined => asyncLocalStorage.getStore();

/**
 * Attach sale ids to the current request's context. Outside a request this
 * does nothing.
 */
export const addLogContext = (fields: Omit<Partial<LogContext>, 'correlationId'>): void => {
  const store = asyncLocalStorage.getStore();
  if (!store) {
    return;
  }
  if (fields.transactionId !== undefined) store.transactionId = fields.transactionId;
  if (fields.eventId !== undefined) store.eventId = fields.eventId;
};
