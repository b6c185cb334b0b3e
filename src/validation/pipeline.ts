import { logger } from '../observability/logger.js';
import { checkVersion, checkMetadata, checkStyle } from './checks.js';
import type {
  CheckOutcome,
  ValidationInput,
  ValidationResult,
  ValidationSettings,
} from './types.js';

/**
 * Runs the release gates in order: version, metadata, style. Stops at the
 * first failing check; later checks are not run. Warnings never stop it.
 */
export async function runValidationPipeline(
  input: ValidationInput,
  settings: ValidationSettings
): Promise<ValidationResult> {
  const checks: CheckOutcome[] = [];
  const warnings: string[] = [];

  const steps: Array<() => CheckOutcome | Promise<CheckOutcome>> = [
    () => checkVersion(input.candidateVersion, input.baselineVersion),
    () => checkMetadata(settings.workingDirectory, settings.metadataFile),
    () => checkStyle(settings.linter, settings.workingDirectory, settings.lintMode),
  ];

  for (const step of steps) {
    const outcome = await step();
    checks.push(outcome);

    switch (outcome.status) {
      case 'fail':
        logger.error('validation', `Check failed: ${outcome.check}`, {
          code: outcome.error.code,
          error: outcome.error.message,
          details: outcome.error.details,
        });
        return { passed: false, checks, error: outcome.error };

      case 'warning':
        warnings.push(outcome.reason);
        logger.warn('validation', `Check passed with warning: ${outcome.check}`, {
          reason: outcome.reason,
        });
        break;

      case 'pass':
        logger.info('validation', `Check passed: ${outcome.check}`);
        break;
    }
  }

  logger.info('validation_complete', 'All release checks passed', {
    from: input.baselineVersion,
    to: input.candidateVersion,
    warnings: warnings.length,
  });

  return { passed: true, checks, warnings };
}
