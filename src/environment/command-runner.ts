import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';

const execFile = promisify(execFileCb);

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: { timeoutMs?: number }): Promise<CommandResult>;
}

function stringField(error: unknown, key: 'stdout' | 'stderr'): string | undefined {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Runs local tools (the Azure CLI) and returns their output without throwing
 */
export class ExecFileRunner implements CommandRunner {
  async run(command: string, args: string[], options: { timeoutMs?: number } = {}): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFile(command, args, {
        timeout: options.timeoutMs ?? 300_000,
        maxBuffer: 50 * 1024 * 1024,
        // az is a .cmd shim on Windows
        shell: process.platform === 'win32',
      });
      return { success: true, stdout, stderr, exitCode: 0 };
    } catch (error) {
      const code: unknown = typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
      return {
        success: false,
        stdout: stringField(error, 'stdout') ?? '',
        stderr: stringField(error, 'stderr') ?? (error instanceof Error ? error.message : String(error)),
        exitCode: typeof code === 'number' ? code : null,
      };
    }
  }
}
