import { existsSync } from 'fs';
import path from 'path';
import { ReleaseError } from '../errors.js';
import { compareVersions } from '../versioning/comparator.js';
import { logger } from '../observability/logger.js';
import type { Linter } from '../lint/linter.js';
import type { CheckOutcome } from './types.js';

export function checkVersion(candidate: string, baseline: string): CheckOutcome {
  const comparison = compareVersions(candidate, baseline);
  if (!comparison.ok) {
    return { check: 'version', status: 'fail', error: comparison.error };
  }

  if (!comparison.value.aIsGreater) {
    return {
      check: 'version',
      status: 'fail',
      error: new ReleaseError(
        'VERSION_NOT_ADVANCED',
        `New version '${candidate}' is not greater than old version '${baseline}'`,
        { candidate, baseline }
      ),
    };
  }

  if (comparison.value.aIsPrerelease) {
    return {
      check: 'version',
      status: 'warning',
      reason: `New version '${candidate}' is a pre-release`,
    };
  }

  return { check: 'version', status: 'pass' };
}

export function checkMetadata(workingDirectory: string, metadataFile: string): CheckOutcome {
  const metadataPath = path.join(workingDirectory, metadataFile);
  if (!existsSync(metadataPath)) {
    return {
      check: 'metadata',
      status: 'fail',
      error: new ReleaseError('MISSING_METADATA', `${metadataFile} file is missing`, {
        path: metadataPath,
      }),
    };
  }
  return { check: 'metadata', status: 'pass' };
}

export async function checkStyle(
  linter: Linter,
  workingDirectory: string,
  mode: string
): Promise<CheckOutcome> {
  const result = await linter.run(workingDirectory, mode);

  if (!result.passed) {
    return {
      check: 'style',
      status: 'fail',
      error: new ReleaseError('STYLE_VIOLATION', 'Code style validation failed', {
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      }),
    };
  }

  if (result.stdout) {
    logger.info('style_check', 'Linter output', { stdout: result.stdout });
  }
  return { check: 'style', status: 'pass' };
}
