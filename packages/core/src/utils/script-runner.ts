import { execFile } from 'child_process';
import { chmod, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { promisify } from 'util';

import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface ScriptResult {
  success: boolean;
  exitCode: number | null;
  output: string;
}

/**
 * Runs a shell script held in a string. The script is written to a scoped
 * temp file which is removed once the script exits.
 */
export interface ScriptRunner {
  run(script: string, cwd?: string): Promise<ScriptResult>;
}

function readExitCode(error: unknown): number | null {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

function readOutput(error: unknown): string {
  if (!error || typeof error !== 'object') {
    return '';
  }
  const parts: string[] = [];
  for (const key of ['stdout', 'stderr'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'string' && value.length > 0) {
        parts.push(value);
      }
    }
  }
  return parts.join('');
}

export function createShellScriptRunner(shell: string = 'bash'): ScriptRunner {
  return {
    async run(script: string, cwd?: string): Promise<ScriptResult> {
      const scriptDir = await mkdtemp(join(tmpdir(), 'depsource-script-'));
      const scriptPath = join(scriptDir, 'script.sh');
      try {
        await writeFile(scriptPath, script, 'utf8');
        await chmod(scriptPath, 0o755);
        const { stdout, stderr } = await execFileAsync(shell, [scriptPath], {
          cwd: cwd ?? tmpdir(),
          maxBuffer: 16 * 1024 * 1024
        });
        return { success: true, exitCode: 0, output: `${stdout}${stderr}` };
      } catch (error) {
        const exitCode = readExitCode(error);
        logger.debug(`Script exited with ${exitCode ?? 'no exit code'}`, { cwd });
        return { success: false, exitCode, output: readOutput(error) };
      } finally {
        await rm(scriptDir, { recursive: true, force: true });
      }
    }
  };
}
