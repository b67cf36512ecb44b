import { describe, it, expect, vi } from 'vitest';
import { runChecks } from '../verification-runner';
import { VerificationCheck } from '../types';

function check(name: string, run: VerificationCheck['run']): VerificationCheck {
  return { name, run };
}

describe('runChecks', () => {
  it('should pass when every check passes', async () => {
    const report = await runChecks([
      check('health', async () => ({ passed: true, detail: 'GET /health -> HTTP 200' })),
      check('tools', async () => ({ passed: true, detail: 'GET /tools -> HTTP 200' }))
    ]);

    expect(report).toEqual({
      passed: true,
      results: [
        { name: 'health', passed: true, detail: 'GET /health -> HTTP 200' },
        { name: 'tools', passed: true, detail: 'GET /tools -> HTTP 200' }
      ]
    });
  });

  it('should run the remaining checks after a failure', async () => {
    const last = vi.fn(async () => ({ passed: true, detail: 'ok' }));

    const report = await runChecks([
      check('first', async () => ({ passed: false, detail: 'GET /tools -> HTTP 401' })),
      check('second', last)
    ]);

    expect(report.passed).toBe(false);
    expect(last).toHaveBeenCalledTimes(1);
    expect(report.results.map(result => result.passed)).toEqual([false, true]);
  });

  it('should record a throwing check as failed with its message', async () => {
    const report = await runChecks([
      check('health', async () => {
        throw new Error('Request to https://localhost:4444/health timed out after 2000ms');
      })
    ]);

    expect(report.results).toEqual([
      { name: 'health', passed: false, detail: 'Request to https://localhost:4444/health timed out after 2000ms' }
    ]);
  });

  it('should treat an empty check list as passed', async () => {
    expect(await runChecks([])).toEqual({ passed: true, results: [] });
  });
});
