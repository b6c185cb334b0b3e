import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFilePromise = promisify(execFile);

export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const OUTPUT_OVERFLOW_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

interface ExecFailure extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && 'code' in error;
}

export interface LintResult {
  passed: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Style checker for a library working tree. Implementations must not
 * modify the tree.
 */
export interface Linter {
  run(workingDirectory: string, mode: string): Promise<LintResult>;
}

export interface CommandLinterOptions {
  /** Per-stream output cap; a linter that exceeds it is killed and fails. */
  maxOutputBytes?: number;
}

/**
 * Runs `<command> --library-manager <mode>` in the working tree. A non-zero
 * exit resolves as a failed result; only a missing executable or similar
 * spawn error is reported through stderr with exit code 1. Output
 * past `maxOutputBytes` kills the linter and fails the check, keeping what
 * was captured.
 */
export class CommandLinter implements Linter {
  constructor(
    private readonly command: string = 'arduino-lint',
    private readonly options: CommandLinterOptions = {}
  ) {}

  async run(workingDirectory: string, mode: string): Promise<LintResult> {
    try {
      const { stdout, stderr } = await execFilePromise(
        this.command,
        ['--library-manager', mode],
        { cwd: workingDirectory, maxBuffer: this.options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES }
      );
      return {
        passed: true,
        exitCode: 0,
        stdout: String(stdout).trim(),
        stderr: String(stderr).trim(),
      };
    } catch (error: unknown) {
      if (isExecFailure(error)) {
        if (error.code === OUTPUT_OVERFLOW_CODE) {
          // output captured so far is kept
          return {
            passed: false,
            exitCode: 1,
            stdout: String(error.stdout ?? '').trim(),
            stderr: [String(error.stderr ?? '').trim(), error.message].filter(Boolean).join('\n'),
          };
        }
        // other string codes (ENOENT, EACCES) mean the process never ran
        const ran = typeof error.code === 'number';
        return {
          passed: false,
          exitCode: ran ? Number(error.code) : 1,
          stdout: String(error.stdout ?? '').trim(),
          stderr: ran ? String(error.stderr ?? '').trim() : error.message,
        };
      }
      throw error;
    }
  }
}
