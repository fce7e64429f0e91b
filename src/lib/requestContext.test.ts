import { describe, expect, it } from 'vitest';
import { currentRequestId, withRequestId } from './requestContext';

describe('request id context', () => {
  it('is visible across awaits inside the request', async () => {
    const seen = await withRequestId('req-1', async () => {
      await Promise.resolve();
      return currentRequestId();
    });
    expect(seen).toBe('req-1');
  });

  it('is empty outside a request', () => {
    expect(currentRequestId()).toBeUndefined();
  });
});
