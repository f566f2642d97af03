// Configuration Collection Functions

import { confirm, multiselect, password, select, text } from '@clack/prompts';
import {
  DEFAULT_CONTROLLER_NODE_COUNT,
  DEFAULT_CONTROLLER_NODE_TYPE,
  DEFAULT_LKE_VERSION,
  DEFAULT_WORKER_NODE_COUNT,
  DEFAULT_WORKER_NODE_TYPE,
  type StackConfigDocument,
} from '@/infra/config';
import { ensureAnswered, logInfo } from '@/lib/prompts';
import { LINODE_REGIONS, LKE_VERSIONS, NODE_TYPES } from './providers';
import { validateClusterName, validateEmail, validateNodeCount, validateRequired } from './validators';
import type { WizardFlags } from './index';

export type WorkerClusterInput = StackConfigDocument['worker_clusters'][string];

export interface ControllerInput {
  region_lke_controller: string;
  lke_version: string;
  lke_controller_node_type: string;
  lke_controller_node_count: number;
}

export interface EnterpriseInput {
  enabled: boolean;
  username?: string;
  email?: string;
  /** Kept out of the generated file */
  password?: string;
}

const MAX_WORKERS = 10;

/**
 * Parse `--workers name:region[,name:region...]`. The first worker gets the
 * frontend; the others (or the only one) get the backend.
 */
export function parseWorkersFlag(value: string): Record<string, WorkerClusterInput> {
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    throw new Error('--workers needs at least one name:region pair');
  }

  const workers: Record<string, WorkerClusterInput> = {};

  entries.forEach((entry, index) => {
    const [name, region, ...rest] = entry.split(':');
    if (!name || !region || rest.length > 0) {
      throw new Error(`Invalid worker '${entry}'. Expected name:region`);
    }

    const nameError = validateClusterName(name);
    if (nameError) {
      throw new Error(`Invalid worker name '${name}': ${nameError}`);
    }
    if (workers[name]) {
      throw new Error(`Duplicate worker name '${name}'`);
    }

    workers[name] = {
      region,
      application_frontend: index === 0,
      application_backend: index > 0 || entries.length === 1,
    };
  });

  return workers;
}

type SelectOption = { value: string; label: string; hint?: string };

async function selectRegion(message: string): Promise<string> {
  const result = await select<SelectOption[], string>({
    message,
    options: LINODE_REGIONS.map((r) => ({ value: r.value, label: r.label })),
  });
  return ensureAnswered(result);
}

async function selectNodeType(message: string, initialValue: string): Promise<string> {
  const result = await select<SelectOption[], string>({
    message,
    initialValue,
    options: NODE_TYPES.map((t) => ({ value: t.value, label: t.label, hint: t.hint })),
  });
  return ensureAnswered(result);
}

async function promptNodeCount(message: string, initialValue: number): Promise<number> {
  const result = await text({
    message,
    initialValue: String(initialValue),
    validate: validateNodeCount,
  });
  return Number(ensureAnswered(result).trim());
}

/**
 * Collect controller cluster configuration
 */
export async function collectControllerConfig(flags: WizardFlags = {}): Promise<ControllerInput> {
  let region: string;

  if (flags.controllerRegion) {
    logInfo(`Using controller region: ${flags.controllerRegion}`);
    region = flags.controllerRegion;
  } else {
    region = await selectRegion('Controller cluster region');
  }

  let lkeVersion: string;

  if (flags.lkeVersion) {
    logInfo(`Using LKE version: ${flags.lkeVersion}`);
    lkeVersion = flags.lkeVersion;
  } else {
    const result = await select<SelectOption[], string>({
      message: 'Kubernetes version',
      initialValue: DEFAULT_LKE_VERSION,
      options: LKE_VERSIONS.map((v) => ({ value: v, label: v })),
    });
    lkeVersion = ensureAnswered(result);
  }

  if (flags.yes) {
    return {
      region_lke_controller: region,
      lke_version: lkeVersion,
      lke_controller_node_type: DEFAULT_CONTROLLER_NODE_TYPE,
      lke_controller_node_count: DEFAULT_CONTROLLER_NODE_COUNT,
    };
  }

  const nodeType = await selectNodeType('Controller node type', DEFAULT_CONTROLLER_NODE_TYPE);
  const nodeCount = await promptNodeCount('Controller node count', DEFAULT_CONTROLLER_NODE_COUNT);

  return {
    region_lke_controller: region,
    lke_version: lkeVersion,
    lke_controller_node_type: nodeType,
    lke_controller_node_count: nodeCount,
  };
}

/**
 * Collect one worker cluster interactively
 */
export async function collectWorkerCluster(existing: string[]): Promise<[string, WorkerClusterInput]> {
  const nameResult = await text({
    message: 'Worker cluster name',
    placeholder: `worker-${existing.length + 1}`,
    initialValue: `worker-${existing.length + 1}`,
    validate: (val) => validateClusterName(val) ?? (existing.includes(val ?? '') ? 'Name already used' : undefined),
  });
  const name = ensureAnswered(nameResult);

  const region = await selectRegion(`Region for ${name}`);
  const nodeType = await selectNodeType(`Worker node type for ${name}`, DEFAULT_WORKER_NODE_TYPE);
  const nodeCount = await promptNodeCount(`Worker node count for ${name}`, DEFAULT_WORKER_NODE_COUNT);

  const roles = ensureAnswered(
    await multiselect<SelectOption[], string>({
      message: `Sample application services on ${name}`,
      options: [
        { value: 'frontend', label: 'Frontend', hint: 'productpage' },
        { value: 'backend', label: 'Backend', hint: 'details, reviews, ratings (exported)' },
      ],
      required: false,
    })
  );

  const mesh = ensureAnswered(
    await confirm({
      message: `Install Istio on ${name}?`,
      initialValue: true,
    })
  );

  return [
    name,
    {
      region,
      worker_node_type: nodeType,
      worker_node_count: nodeCount,
      mesh,
      application_frontend: roles.includes('frontend'),
      application_backend: roles.includes('backend'),
    },
  ];
}

/**
 * Collect all worker clusters
 */
export async function collectWorkerClusters(flags: WizardFlags = {}): Promise<Record<string, WorkerClusterInput>> {
  if (flags.workers) {
    const workers = parseWorkersFlag(flags.workers);
    logInfo(`Using worker clusters: ${Object.keys(workers).join(', ')}`);
    return workers;
  }

  const workers: Record<string, WorkerClusterInput> = {};

  for (;;) {
    const [name, worker] = await collectWorkerCluster(Object.keys(workers));
    workers[name] = worker;

    if (Object.keys(workers).length >= MAX_WORKERS) {
      logInfo(`Reached ${MAX_WORKERS} worker clusters`);
      break;
    }

    const addAnother = ensureAnswered(
      await confirm({
        message: 'Add another worker cluster?',
        initialValue: Object.keys(workers).length < 2,
      })
    );

    if (!addAnother) {
      break;
    }
  }

  return workers;
}

/**
 * Collect enterprise edition settings
 */
export async function collectEnterpriseConfig(flags: WizardFlags = {}): Promise<EnterpriseInput> {
  let enabled: boolean;

  if (flags.enterprise !== undefined) {
    enabled = flags.enterprise;
  } else if (flags.yes) {
    enabled = false;
  } else {
    enabled = ensureAnswered(
      await confirm({
        message: 'Use the KubeSlice enterprise edition (trial licence)?',
        initialValue: false,
      })
    );
  }

  if (!enabled) {
    return { enabled: false };
  }

  const username = ensureAnswered(
    await text({ message: 'Enterprise registry username', validate: validateRequired })
  );
  const email = ensureAnswered(await text({ message: 'Enterprise registration email', validate: validateEmail }));

  let enterprisePassword = process.env.KUBESLICE_ENTERPRISE_PASSWORD;
  if (enterprisePassword) {
    logInfo('Using enterprise password from KUBESLICE_ENTERPRISE_PASSWORD');
  } else {
    enterprisePassword = ensureAnswered(
      await password({ message: 'Enterprise registry password', validate: validateRequired })
    );
  }

  return { enabled: true, username, email, password: enterprisePassword };
}
