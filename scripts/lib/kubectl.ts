// kubectl invocation

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface KubectlOptions {
  kubeconfigPath?: string;
  timeoutMs?: number;
}

/**
 * Run kubectl and return stdout. Rejects with kubectl's stderr on failure.
 */
export async function kubectl(args: string[], options: KubectlOptions = {}): Promise<string> {
  const env = options.kubeconfigPath
    ? { ...process.env, KUBECONFIG: options.kubeconfigPath }
    : process.env;

  try {
    const { stdout } = await execFileAsync('kubectl', args, {
      env,
      timeout: options.timeoutMs ?? 30000,
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout;
  } catch (error) {
    const stderr = typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
    const message = stderr || (error instanceof Error ? error.message : String(error));
    throw new Error(`kubectl ${args.join(' ')} failed: ${message}`);
  }
}

/**
 * Run kubectl with `-o json` and parse the result
 */
export async function kubectlJson(args: string[], options: KubectlOptions = {}): Promise<unknown> {
  const output = await kubectl([...args, '-o', 'json'], options);
  return JSON.parse(output);
}

/**
 * Check whether a binary answers its version command
 */
export async function commandAvailable(command: string, args: string[]): Promise<boolean> {
  try {
    await execFileAsync(command, args, { timeout: 15000 });
    return true;
  } catch {
    return false;
  }
}
