import type { Disposition, Finding, RiskPolicy, Vote } from '../work-item/types.js';

export interface AggregateOptions {
  /** Number of configured voters; cast votes may be fewer when some did not respond. */
  expectedVoters: number;
  humanConfirmed?: boolean;
}

export interface AggregateResult {
  disposition: Disposition;
  passes: number;
  fails: number;
  /** Configured voters that did not respond. */
  missing: number;
  findings: Finding[];
  reason: string;
}

/**
 * Turn the votes cast for one attempt into a disposition.
 *
 * Non-responding voters reduce the denominator; they count as neither pass nor fail.
 * Findings are returned whatever the outcome.
 */
export function aggregate(votes: readonly Vote[], policy: RiskPolicy, opts: AggregateOptions): AggregateResult {
  const passes = votes.filter((v) => v.verdict === 'pass').length;
  const fails = votes.length - passes;
  const missing = Math.max(0, opts.expectedVoters - votes.length);
  const findings = votes.flatMap((v) => v.findings);
  const result = (disposition: Disposition, reason: string): AggregateResult => ({
    disposition,
    passes,
    fails,
    missing,
    findings,
    reason
  });

  switch (policy.kind) {
    case 'skip':
      return result('approved', 'verification skipped by policy');

    case 'majority': {
      if (votes.length === 0) return result('rejected', 'no votes cast');
      // Strictly more than half; a tie fails closed.
      if (passes * 2 <= votes.length) return result('rejected', `${passes}/${votes.length} passed, majority not reached`);
      if (policy.escalateOnCritical && findings.some((f) => f.severity === 'critical')) {
        return result('needs_review', 'majority passed with critical findings');
      }
      return result('approved', `${passes}/${votes.length} passed`);
    }

    case 'unanimous': {
      if (fails > 0) return result('rejected', `${fails} voter(s) failed`);
      if (opts.expectedVoters === 0) return result('needs_review', 'no voters configured');
      if (votes.length < opts.expectedVoters) {
        return result('needs_review', `${missing} of ${opts.expectedVoters} voter(s) did not respond`);
      }
      if (policy.requiresHumanConfirmation && !opts.humanConfirmed) {
        return result('needs_review', 'awaiting human confirmation');
      }
      return result('approved', `all ${passes} voter(s) passed`);
    }
  }
}
