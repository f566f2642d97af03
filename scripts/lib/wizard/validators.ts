// Input Validation Functions

import { CLUSTER_NAME_MAX_LENGTH, CLUSTER_NAME_PATTERN } from '@/infra/config';
import { commandAvailable } from '@/lib/kubectl';
import { logInfo, logWarning } from '@/lib/prompts';

/**
 * Validate worker cluster name format
 */
export function validateClusterName(val: string | undefined): string | undefined {
  if (!val || val.length < 2) {
    return 'Cluster name must be at least 2 characters';
  }
  if (val.length > CLUSTER_NAME_MAX_LENGTH) {
    return `Cluster name must be at most ${CLUSTER_NAME_MAX_LENGTH} characters`;
  }
  if (!CLUSTER_NAME_PATTERN.test(val)) {
    if (val.startsWith('-') || val.endsWith('-')) {
      return 'Cannot start or end with hyphen';
    }
    return 'Use lowercase letters, numbers, and hyphens only';
  }
  if (val.includes('--')) {
    return 'Cannot contain consecutive hyphens';
  }
  if (val === 'controller') {
    return "'controller' is reserved for the controller cluster";
  }
  return undefined;
}

/**
 * Validate a node count typed as text
 */
export function validateNodeCount(val: string | undefined): string | undefined {
  if (!val || !/^\d+$/.test(val.trim())) {
    return 'Enter a whole number';
  }
  const count = Number(val.trim());
  if (count < 1) {
    return 'At least one node is required';
  }
  if (count > 100) {
    return 'LKE node pools are limited to 100 nodes';
  }
  return undefined;
}

export function validateEmail(val: string | undefined): string | undefined {
  if (!val || !/^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(val)) {
    return 'Enter a valid email address';
  }
  return undefined;
}

export function validateRequired(val: string | undefined): string | undefined {
  if (!val || val.trim().length === 0) {
    return 'Value is required';
  }
  return undefined;
}

/**
 * Check if the Linode token is configured
 */
export function checkLinodeToken(env: NodeJS.ProcessEnv = process.env): boolean {
  if (!env.LINODE_TOKEN) {
    logWarning('Linode token not detected');
    logInfo('Set LINODE_TOKEN environment variable');
    logInfo('Get token: https://cloud.linode.com/profile/tokens');
    return false;
  }

  return true;
}

/**
 * Check if the Pulumi CLI is installed
 */
export async function checkPulumi(): Promise<boolean> {
  if (await commandAvailable('pulumi', ['version'])) {
    return true;
  }
  logWarning('pulumi not found');
  logInfo('Install: curl -fsSL https://get.pulumi.com | sh');
  return false;
}

/**
 * Check if kubectl is installed
 */
export async function checkKubectl(): Promise<boolean> {
  if (await commandAvailable('kubectl', ['version', '--client', '--output=json'])) {
    return true;
  }
  logWarning('kubectl not found');
  logInfo('Install kubectl: https://kubernetes.io/docs/tasks/tools/');
  return false;
}

/**
 * Check everything provisioning needs; returns the names of what is missing
 */
export async function checkPrerequisites(): Promise<Array<'linode' | 'pulumi' | 'kubectl'>> {
  const missing: Array<'linode' | 'pulumi' | 'kubectl'> = [];

  if (!(await checkPulumi())) {
    missing.push('pulumi');
  }
  if (!(await checkKubectl())) {
    missing.push('kubectl');
  }
  if (!checkLinodeToken()) {
    missing.push('linode');
  }

  return missing;
}
