import { PostconditionViolation } from './types.js';

export function summarizeViolations(violations: PostconditionViolation[]): {
  total: number;
  warn: number;
  error: number;
  fatal: number;
} {
  return {
    total: violations.length,
    warn: violations.filter(v => v.severity === 'warn').length,
    error: violations.filter(v => v.severity === 'error').length,
    fatal: violations.filter(v => v.severity === 'fatal').length,
  };
}
