/**
 * In-process runner for CLI contract tests.
 *
 * Runs the commander program with `process.exit`, `console.log` and
 * `console.error` stubbed, so a command's output and exit code can be asserted
 * without spawning the built binary.
 */

import { mock } from 'node:test';

import { createProgram } from '@/program.js';

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

class ProcessExit extends Error {
  constructor(readonly exitCode: number) {
    super(`process.exit(${exitCode})`);
  }
}

const ENV_PREFIX = 'PWVAULT_';

function toExitCode(code: number | string | null | undefined): number {
  if (code === undefined || code === null) return 0;
  return typeof code === 'number' ? code : Number.parseInt(code, 10);
}

/**
 * Replace every PWVAULT_* variable with `env` until the returned restore runs.
 */
function isolateEnvironment(env: Record<string, string>): () => void {
  const saved = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));
  for (const [key] of saved) {
    delete process.env[key];
  }
  for (const [key, value] of Object.entries(env)) {
    process.env[key] = value;
  }

  return () => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith(ENV_PREFIX)) delete process.env[key];
    }
    for (const [key, value] of saved) {
      process.env[key] = value;
    }
  };
}

/**
 * Run `pwvault <args...>` in this process.
 *
 * @example
 * ```typescript
 * const result = await runCli(['--no-tls', 'sources', 'alice'], { PWVAULT_HOME: home });
 * assert.equal(result.exitCode, 0);
 * ```
 */
export async function runCli(args: string[], env: Record<string, string> = {}): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const restoreEnvironment = isolateEnvironment(env);
  const mocks = [
    mock.method(console, 'log', (...values: unknown[]) => {
      stdout.push(`${values.map(String).join(' ')}\n`);
    }),
    mock.method(console, 'error', (...values: unknown[]) => {
      stderr.push(`${values.map(String).join(' ')}\n`);
    }),
    mock.method(process, 'exit', (code?: number | string | null): never => {
      throw new ProcessExit(toExitCode(code));
    }),
  ];

  let exitCode = 0;
  try {
    await createProgram().parseAsync(args, { from: 'user' });
  } catch (error) {
    if (!(error instanceof ProcessExit)) {
      throw error;
    }
    exitCode = error.exitCode;
  } finally {
    mocks.forEach((mocked) => mocked.mock.restore());
    restoreEnvironment();
  }

  return { exitCode, stdout: stdout.join(''), stderr: stderr.join('') };
}
