import fc from 'fast-check';
import { retryWithBackoff } from '../src/utils/retryHelper';

describe('retryWithBackoff', () => {
  it('Property: succeeds after at most maxRetries failures', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 4 }),
        fc.integer({ min: 0, max: 3 }),
        async (failuresBeforeSuccess, maxRetries) => {
          let attempts = 0;
          const operation = async () => {
            attempts++;
            if (attempts <= failuresBeforeSuccess) throw new Error('Network timeout');
            return 'success';
          };

          const run = retryWithBackoff(operation, { maxRetries, baseDelay: 0 });

          if (failuresBeforeSuccess <= maxRetries) {
            await expect(run).resolves.toBe('success');
            expect(attempts).toBe(failuresBeforeSuccess + 1);
          } else {
            await expect(run).rejects.toThrow('Network timeout');
            expect(attempts).toBe(maxRetries + 1);
          }
        },
      ),
      { numRuns: 40 },
    );
  });

  it('does not retry errors the predicate rejects', async () => {
    let attempts = 0;
    const run = retryWithBackoff(
      async () => {
        attempts++;
        throw new Error('forbidden');
      },
      { maxRetries: 3, baseDelay: 0, shouldRetry: () => false },
    );

    await expect(run).rejects.toThrow('forbidden');
    expect(attempts).toBe(1);
  });

  it('stops once the signal is aborted', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const run = retryWithBackoff(
      async () => {
        attempts++;
        controller.abort();
        throw new Error('unreachable');
      },
      { maxRetries: 3, baseDelay: 0, signal: controller.signal },
    );

    await expect(run).rejects.toThrow('unreachable');
    expect(attempts).toBe(1);
  });
});
