import {
  PostconditionContext,
  PostconditionCheckResult,
  PostconditionViolation,
  PostconditionID,
} from './types.js';
import { getAllPostconditions, getPostconditionsByIds } from './registry.js';
import { logger } from '../observability/logger.js';
import { summarizeViolations } from './violations.js';

export function checkPostconditions(
  context: PostconditionContext,
  postconditionIds?: PostconditionID[]
): PostconditionCheckResult {
  const postconditions = postconditionIds
    ? getPostconditionsByIds(postconditionIds)
    : getAllPostconditions();

  const violations: PostconditionViolation[] = [];

  for (const postcondition of postconditions) {
    if (postcondition.evaluate(context)) continue;

    violations.push({
      postconditionId: postcondition.id,
      description: postcondition.description,
      severity: postcondition.severity,
      finalState: context.finalState,
      timestamp: new Date().toISOString(),
    });

    logger.error('postcondition_violation', `Postcondition violated: ${postcondition.id}`, {
      postconditionId: postcondition.id,
      severity: postcondition.severity,
      description: postcondition.description,
      finalState: context.finalState,
      mutations: context.mutations,
    });
  }

  const result: PostconditionCheckResult = {
    passed: violations.length === 0,
    violations,
    totalChecked: postconditions.length,
  };

  if (!result.passed) {
    logger.warn('postcondition_check_summary', 'Postcondition check completed with violations', {
      totalChecked: postconditions.length,
      summary: summarizeViolations(violations),
    });
  } else {
    logger.info('postcondition_check_summary', 'All postconditions passed', {
      totalChecked: postconditions.length,
    });
  }

  return result;
}
