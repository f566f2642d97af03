// Stack Configuration File Generation

import { stringify as stringifyYaml } from 'yaml';
import type { StackConfigDocument } from '@/infra/config';

export const PULUMI_PROJECT_NAME = 'kubeslice-lke';

export function stackConfigFileName(stack: string): string {
  return `Pulumi.${stack}.yaml`;
}

/**
 * Drop the enterprise password; it belongs in Pulumi secret config, never in the file
 */
export function withoutSecrets(document: StackConfigDocument): StackConfigDocument {
  if (!document.kubeslice_enterprise) {
    return document;
  }
  const { password: _password, ...enterprise } = document.kubeslice_enterprise;
  return { ...document, kubeslice_enterprise: enterprise };
}

/**
 * Render Pulumi.<stack>.yaml for a configuration document
 */
export function generateStackConfigYaml(
  document: StackConfigDocument,
  projectName: string = PULUMI_PROJECT_NAME
): string {
  const config: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(withoutSecrets(document))) {
    if (value !== undefined) {
      config[`${projectName}:${key}`] = value;
    }
  }

  const header = [
    '# Generated by the stack configuration wizard.',
    '# Secrets live in Pulumi secret config:',
    '#   pulumi config set --secret linode_token <token>',
    '#   pulumi config set --secret kubeslice_enterprise_password <password>',
  ].join('\n');

  return `${header}\n${stringifyYaml({ config })}`;
}
