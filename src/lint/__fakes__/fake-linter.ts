import type { LintResult, Linter } from '../linter.js';

export class FakeLinter implements Linter {
  readonly runs: Array<{ workingDirectory: string; mode: string }> = [];

  constructor(private readonly result: Partial<LintResult> = {}) {}

  async run(workingDirectory: string, mode: string): Promise<LintResult> {
    this.runs.push({ workingDirectory, mode });
    const passed = this.result.passed ?? true;
    return {
      passed,
      exitCode: this.result.exitCode ?? (passed ? 0 : 1),
      stdout: this.result.stdout ?? '',
      stderr: this.result.stderr ?? '',
    };
  }
}
