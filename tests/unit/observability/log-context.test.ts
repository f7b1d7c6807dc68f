/**
 * Log Context Unit Tests
 */

import {
  addLogContext,
  getCorrelationId,
  getLogContext,
  runWithLogContext,
} from '../../../src/observability/log-context';

describe('Log context', () => {
  it('should expose the correlation id inside a context only', () => {
    runWithLogContext({ correlationId: 'corr-1' }, () => {
      expect(getCorrelationId()).toBe('corr-1');
    });

    expect(getCorrelationId()).toBeUndefined();
  });

  it('should keep the context across awaits', async () => {
    await runWithLogContext({ correlationId: 'corr-2' }, async () => {
      await Promise.resolve();
      expect(getCorrelationId()).toBe('corr-2');
    });
  });

  it('should attach sale ids to the current context', () => {
    runWithLogContext({ correlationId: 'corr-3' }, () => {
      addLogContext({ transactionId: 't1', eventId: 'e1' });

      expect(getLogContext()).toEqual({ correlationId: 'corr-3', transactionId: 't1', eventId: 'e1' });
    });
  });

  it('should ignore additions outside a request', () => {
    addLogContext({ transactionId: 't1' });

    expect(getLogContext()).toBeUndefined();
  });

  it('should not share state between contexts', () => {
    const base = { correlationId: 'corr-4' };

    runWithLogContext(base, () => addLogContext({ eventId: 'e1' }));

    expect(base).toEqual({ correlationId: 'corr-4' });
  });
});
