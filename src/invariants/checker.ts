import type { InvariantCheckResult, InvariantSubject, InvariantViolation } from './types.js';
import { invariantsFor } from './registry.js';
import { logger } from '../observability/logger.js';
import { InvariantViolationError, summarizeViolations } from './violations.js';

/** What to log about a subject; group members and id lists stay out. */
function describeSubject(subject: InvariantSubject): Record<string, unknown> {
  switch (subject.kind) {
    case 'queue':
      return { breakdown: subject.breakdown, totalReviewable: subject.totalReviewable };
    case 'partition':
      return { scheme: subject.scheme, reviewable: subject.reviewableIds.length, groups: subject.groupMembers.length };
    case 'cursor':
      return { selector: subject.selector, index: subject.index, hunkCount: subject.hunkCount, completed: subject.completed };
  }
}

/**
 * Evaluate every invariant of the subject's kind. A rule that throws cannot
 * vouch for the state and is reported as a fatal violation.
 */
export function checkInvariants(subject: InvariantSubject): InvariantCheckResult {
  const violations: InvariantViolation[] = [];

  for (const invariant of invariantsFor(subject)) {
    let holds: boolean;
    let severity = invariant.severity;
    try {
      holds = invariant.evaluate();
    } catch (error) {
      logger.error('invariant_check_error', 'Error evaluating invariant', {
        invariantId: invariant.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      holds = false;
      severity = 'fatal';
    }
    if (holds) continue;

    violations.push({
      invariantId: invariant.id,
      subject: subject.kind,
      description: invariant.description,
      severity,
      timestamp: new Date().toISOString(),
    });
  }

  return { passed: violations.length === 0, violations };
}

/** Check and throw on fatal violations. Warn and error violations are logged. */
export function enforceInvariants(subject: InvariantSubject): void {
  const { passed, violations } = checkInvariants(subject);
  if (passed) return;

  const fatal = violations.filter(v => v.severity === 'fatal');
  const level = fatal.length > 0 ? 'error' : 'warn';
  logger[level]('invariant_violation', `${subject.kind} invariants violated`, {
    ...describeSubject(subject),
    summary: summarizeViolations(violations),
    violations: violations.map(v => ({ id: v.invariantId, severity: v.severity })),
  });

  if (fatal.length > 0) {
    throw new InvariantViolationError(fatal);
  }
}
