// Local kubeconfig files for provisioned clusters

import { copyFileSync, existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { kubectl } from './kubectl';

export function kubeDir(): string {
  return join(process.env.HOME || homedir(), '.kube');
}

/**
 * Path of the standalone kubeconfig written for a cluster label
 */
export function kubeconfigPath(clusterLabel: string): string {
  return join(kubeDir(), clusterLabel);
}

export function writeKubeconfig(clusterLabel: string, kubeconfig: string): string {
  const dir = kubeDir();
  mkdirSync(dir, { recursive: true });

  const path = kubeconfigPath(clusterLabel);
  writeFileSync(path, kubeconfig, { mode: 0o600 });
  return path;
}

export function removeKubeconfig(clusterLabel: string): boolean {
  const path = kubeconfigPath(clusterLabel);
  if (!existsSync(path)) {
    return false;
  }
  rmSync(path);
  return true;
}

/**
 * Merge standalone kubeconfigs into ~/.kube/config, backing the old one up first.
 * Returns the backup path, if a config existed.
 */
export async function mergeKubeconfigs(paths: string[]): Promise<string | undefined> {
  const mainConfig = join(kubeDir(), 'config');
  let backupPath: string | undefined;

  if (existsSync(mainConfig)) {
    backupPath = join(kubeDir(), `config.backup.${Date.now()}`);
    copyFileSync(mainConfig, backupPath);
  }

  const sources = existsSync(mainConfig) ? [mainConfig, ...paths] : paths;
  const merged = await kubectl(['config', 'view', '--flatten'], {
    kubeconfigPath: sources.join(':'),
  });

  const tmpPath = `${mainConfig}.tmp`;
  writeFileSync(tmpPath, merged, { mode: 0o600 });
  renameSync(tmpPath, mainConfig);

  return backupPath;
}

/**
 * LKE names kubeconfig entries after the cluster id: cluster lke<id>,
 * user lke<id>-admin and context lke<id>-ctx
 */
export function lkeContextName(clusterId: string): string {
  return `lke${clusterId}-ctx`;
}

export function lkeClusterName(clusterId: string): string {
  return `lke${clusterId}`;
}

export function lkeUserName(clusterId: string): string {
  return `lke${clusterId}-admin`;
}

export type ConfigRunner = (args: string[]) => Promise<string>;

/**
 * Delete an LKE cluster's context, cluster and user from the merged kubeconfig.
 * Returns the entries that were removed; absent entries are skipped.
 */
export async function removeLkeKubeconfigEntries(
  clusterId: string,
  run: ConfigRunner = (args) => kubectl(args)
): Promise<string[]> {
  const entries: Array<[string, string]> = [
    ['delete-context', lkeContextName(clusterId)],
    ['delete-cluster', lkeClusterName(clusterId)],
    ['delete-user', lkeUserName(clusterId)],
  ];

  const removed: string[] = [];
  for (const [command, name] of entries) {
    try {
      await run(['config', command, name]);
      removed.push(name);
    } catch {
      // not present in this kubeconfig
    }
  }
  return removed;
}
