// Stack outputs as read back through the Automation API

import type { OutputMap } from '@pulumi/pulumi/automation';
import { z } from 'zod';

const workerOutputSchema = z.object({
  id: z.coerce.string(),
  label: z.string(),
  region: z.string(),
  kubeconfig: z.string(),
  applicationBackend: z.boolean().default(false),
});

const stackOutputsSchema = z.object({
  controllerClusterId: z.coerce.string(),
  controllerKubeconfig: z.string(),
  workerClusters: z.record(z.string(), workerOutputSchema),
  projectNamespace: z.string(),
  sliceName: z.string(),
  applicationNamespace: z.string(),
});

export type StackOutputs = z.infer<typeof stackOutputsSchema>;

/**
 * Unwrap and validate the program's exports. Throws if the stack has not been
 * provisioned yet or was provisioned by a different program.
 */
export function parseStackOutputs(outputs: OutputMap): StackOutputs {
  const values = Object.fromEntries(Object.entries(outputs).map(([key, output]) => [key, output.value] as const));

  if (Object.keys(values).length === 0) {
    throw new Error('Stack has no outputs. Provision it first.');
  }

  const result = stackOutputsSchema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Unexpected stack outputs:\n  - ${issues.join('\n  - ')}`);
  }

  return result.data;
}
