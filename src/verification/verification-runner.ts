import { CheckResult, VerificationCheck, VerificationReport } from './types';

/**
 * Runs every check in order. A failing or throwing check is recorded and the
 * next one still runs.
 */
export async function runChecks(checks: VerificationCheck[]): Promise<VerificationReport> {
  const results: CheckResult[] = [];

  for (const check of checks) {
    try {
      const outcome = await check.run();
      results.push({ name: check.name, passed: outcome.passed, detail: outcome.detail });
    } catch (error) {
      results.push({
        name: check.name,
        passed: false,
        detail: error instanceof Error ? error.message : String(error)
      });
    }
  }

  return {
    passed: results.every(result => result.passed),
    results
  };
}
