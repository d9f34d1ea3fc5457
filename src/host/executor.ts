/**
 * PowerShell Executor
 *
 * Spawns powershell.exe to run host-control scripts and parses their JSON output.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi, type ScriptKind } from './verbose.js';

/**
 * Error codes for host operations
 */
export type HostErrorCode =
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'INVALID_RESPONSE'
  | 'EXECUTION_FAILED'
  | 'POWERSHELL_NOT_AVAILABLE';

/**
 * Error thrown when a PowerShell script fails
 */
export class HostError extends Error {
  constructor(
    message: string,
    public readonly code: HostErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly script: string
  ) {
    super(message);
    this.name = 'HostError';
  }
}

/**
 * Options for executing PowerShell scripts
 */
export interface ExecuteOptions {
  /** Timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Whether the script changes host state (affects verbose tagging) */
  kind?: ScriptKind;
}

/**
 * Options for constructing a PowerShellExecutor
 */
export interface PowerShellExecutorOptions {
  /** Path to PowerShell executable (default: 'powershell.exe') */
  powershellPath?: string;
  /** Print scripts to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Runs PowerShell scripts against the local host.
 */
export class PowerShellExecutor {
  private readonly powershellPath: string;
  private readonly verbose: boolean;

  constructor(options?: PowerShellExecutorOptions) {
    this.powershellPath = options?.powershellPath ?? 'powershell.exe';
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Execute a PowerShell script and return its parsed JSON output.
   *
   * Empty output and a literal `null` both resolve to `null`.
   *
   * @throws HostError if the script cannot be spawned, exits non-zero,
   *   times out or prints something that is not JSON
   */
  async execute<T>(script: string, options: ExecuteOptions = {}): Promise<T | null> {
    const { timeout = 60000, kind = 'probe' } = options;

    if (this.verbose) {
      process.stderr.write(formatCommand(script, supportsAnsi(), kind));
    }

    return new Promise<T | null>((resolve, reject) => {
      const ps = spawn(this.powershellPath, [
        '-NoProfile',
        '-NonInteractive',
        '-ExecutionPolicy',
        'Bypass',
        '-Command',
        script,
      ]);

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        ps.kill('SIGTERM');
        reject(
          new HostError(
            `PowerShell execution timed out after ${timeout}ms`,
            'EXECUTION_FAILED',
            null,
            stderr,
            script
          )
        );
      }, timeout);

      ps.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      ps.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ps.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          reject(
            new HostError(
              `Failed to spawn PowerShell: ${error.message}`,
              'POWERSHELL_NOT_AVAILABLE',
              null,
              stderr,
              script
            )
          );
        }
      });

      ps.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        if (code !== 0) {
          reject(
            new HostError(
              formatErrorMessage(stderr, code),
              classifyError(stderr),
              code,
              stderr,
              script
            )
          );
          return;
        }

        const trimmedOutput = stdout.trim();
        if (trimmedOutput === '' || trimmedOutput === 'null') {
          resolve(null);
          return;
        }

        try {
          resolve(JSON.parse(trimmedOutput) as T);
        } catch {
          reject(
            new HostError(
              `Invalid JSON response from PowerShell: ${trimmedOutput.slice(0, 200)}`,
              'INVALID_RESPONSE',
              code,
              stderr,
              script
            )
          );
        }
      });
    });
  }

  /**
   * Execute a mutating script whose output is not needed.
   *
   * @throws HostError if execution fails
   */
  async executeVoid(script: string, options: Omit<ExecuteOptions, 'kind'> = {}): Promise<void> {
    await this.execute<unknown>(script, { ...options, kind: 'mutate' });
  }
}

/**
 * Classify a failed script by what PowerShell wrote to stderr.
 */
export function classifyError(stderr: string): HostErrorCode {
  const lowerStderr = stderr.toLowerCase();

  if (
    lowerStderr.includes('access denied') ||
    lowerStderr.includes('access is denied') ||
    lowerStderr.includes('requested registry access is not allowed') ||
    lowerStderr.includes('unauthorizedaccess')
  ) {
    return 'ACCESS_DENIED';
  }

  if (
    lowerStderr.includes('cannot find any service') ||
    lowerStderr.includes('cannot find a process') ||
    lowerStderr.includes('does not exist') ||
    lowerStderr.includes('cannot find path')
  ) {
    return 'NOT_FOUND';
  }

  return 'EXECUTION_FAILED';
}

/**
 * Pick the most informative line out of PowerShell's stderr.
 */
export function formatErrorMessage(stderr: string, exitCode: number | null): string {
  // eslint-disable-next-line no-control-regex
  const clean = stderr.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
  const lines = clean
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Cmdlet errors look like "Stop-Service : Cannot open WSearch service..."
  const errorLine = lines.find(
    (line) =>
      line.includes(' : ') ||
      line.includes('Exception') ||
      line.includes('Cannot')
  );
  if (errorLine) {
    return errorLine;
  }

  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }

  return `PowerShell exited with code ${exitCode}`;
}
