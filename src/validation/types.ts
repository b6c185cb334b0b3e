import type { ReleaseError } from '../errors.js';
import type { Linter } from '../lint/linter.js';

export type CheckName = 'version' | 'metadata' | 'style';

export type CheckOutcome =
  | { check: CheckName; status: 'pass' }
  | { check: CheckName; status: 'warning'; reason: string }
  | { check: CheckName; status: 'fail'; error: ReleaseError };

export interface ValidationInput {
  candidateVersion: string;
  baselineVersion: string;
}

export interface ValidationSettings {
  workingDirectory: string;
  metadataFile: string;
  lintMode: string;
  linter: Linter;
}

export type ValidationResult =
  | { passed: true; checks: CheckOutcome[]; warnings: string[] }
  | { passed: false; checks: CheckOutcome[]; error: ReleaseError };
