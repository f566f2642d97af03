/**
 * Stack Configuration
 *
 * Reads the configuration document from Pulumi stack config, validates it and
 * fills in defaults. Keys keep the snake_case names used in Pulumi.<stack>.yaml;
 * the parsed result is camelCase.
 */

import * as pulumi from "@pulumi/pulumi";
import { z } from "zod";

// ===== Defaults =====

export const DEFAULT_LKE_VERSION = "1.31";
export const DEFAULT_CONTROLLER_NODE_TYPE = "g6-standard-1";
export const DEFAULT_CONTROLLER_NODE_COUNT = 3;
export const DEFAULT_WORKER_NODE_TYPE = "g6-standard-2";
export const DEFAULT_WORKER_NODE_COUNT = 3;
export const DEFAULT_GATEWAY_NODE_TYPE = "g6-standard-2";
export const DEFAULT_GATEWAY_NODE_COUNT = 1;

export const DEFAULT_PROJECT_NAME = "bookinfo-project";
export const DEFAULT_APPLICATION_NAMESPACE = "bookinfo";

/** Cluster labels become `kubeslice-<name>`, so names follow DNS-1123 label rules. */
export const CLUSTER_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
export const CLUSTER_NAME_MAX_LENGTH = 40;

/** Prefix shared by every LKE cluster label and KubeSlice cluster name. */
export const CLUSTER_LABEL_PREFIX = "kubeslice-";

// ===== Types =====

export interface NodePoolConfig {
  type: string;
  count: number;
}

export interface WorkerClusterConfig {
  /** Key under `worker_clusters` */
  name: string;
  /** LKE label and KubeSlice cluster name */
  label: string;
  region: string;
  workerPool: NodePoolConfig;
  gatewayPool: NodePoolConfig;
  highAvailability: boolean;
  mesh: boolean;
  applicationFrontend: boolean;
  applicationBackend: boolean;
}

export interface EnterpriseCredentials {
  username: string;
  email: string;
  password: pulumi.Input<string>;
}

export interface ProjectConfig {
  name: string;
  /** `kubeslice-<name>`, created by the controller for the project */
  namespace: string;
  applicationNamespace: string;
  readOnlyUsers: string[];
  readWriteUsers: string[];
}

export interface SliceSettings {
  name: string;
  subnet: string;
  maxClusters: number;
  gatewayType: "OpenVPN" | "Wireguard";
  bandwidthCeilingKbps: number;
  bandwidthGuaranteedKbps: number;
  isolationEnabled: boolean;
}

export interface StackConfig {
  lkeVersion: string;
  controller: {
    region: string;
    pool: NodePoolConfig;
  };
  workers: WorkerClusterConfig[];
  /** Present only when the enterprise edition is enabled */
  enterprise?: EnterpriseCredentials;
  project: ProjectConfig;
  slice: SliceSettings;
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid stack configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

// ===== Schema =====

const nodeType = z.string().trim().min(1, "node type must not be empty");
const nodeCount = z.coerce.number().int("must be a whole number").min(1, "must be at least 1");

const clusterName = z
  .string()
  .max(CLUSTER_NAME_MAX_LENGTH, `must be at most ${CLUSTER_NAME_MAX_LENGTH} characters`)
  .regex(CLUSTER_NAME_PATTERN, "use lowercase letters, numbers and hyphens, starting and ending with a letter or number")
  .refine((name) => name !== "controller", "'controller' is reserved for the controller cluster");

const workerClusterSchema = z.object({
  region: z.string().trim().min(1, "region is required"),
  worker_node_type: nodeType.optional(),
  worker_node_count: nodeCount.optional(),
  gw_node_type: nodeType.optional(),
  gw_node_count: nodeCount.optional(),
  high_availability: z.boolean().default(true),
  mesh: z.boolean().default(true),
  application_frontend: z.boolean().default(false),
  application_backend: z.boolean().default(false),
});

const enterpriseSchema = z.object({
  enabled: z.boolean().default(false),
  username: z.string().min(1).optional(),
  email: z.string().email().optional(),
  password: z.string().min(1).optional(),
});

const projectSchema = z
  .object({
    name: clusterName.default(DEFAULT_PROJECT_NAME),
    application_namespace: z
      .string()
      .regex(CLUSTER_NAME_PATTERN, "must be a valid namespace name")
      .default(DEFAULT_APPLICATION_NAMESPACE),
    read_only_users: z.array(z.string().min(1)).default(["readonly-user1", "readonly-user2"]),
    read_write_users: z.array(z.string().min(1)).default(["readwrite-user1", "readwrite-user2"]),
  })
  .default({});

const sliceSchema = z
  .object({
    name: z.string().regex(CLUSTER_NAME_PATTERN, "must be a valid resource name").optional(),
    subnet: z
      .string()
      .regex(/^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/, "must be an IPv4 CIDR such as 10.11.0.0/16")
      .default("10.11.0.0/16"),
    max_clusters: z.coerce.number().int().min(2).max(32).default(10),
    gateway_type: z.enum(["OpenVPN", "Wireguard"]).default("OpenVPN"),
    qos: z
      .object({
        bandwidth_ceiling_kbps: z.coerce.number().int().positive().default(5120),
        bandwidth_guaranteed_kbps: z.coerce.number().int().positive().default(2560),
      })
      .default({}),
    isolation_enabled: z.boolean().default(false),
  })
  .default({});

export const stackConfigSchema = z
  .object({
    region_lke_controller: z.string().trim().min(1, "region_lke_controller is required"),
    lke_version: z.string().trim().min(1).default(DEFAULT_LKE_VERSION),
    lke_controller_node_type: nodeType.default(DEFAULT_CONTROLLER_NODE_TYPE),
    lke_controller_node_count: nodeCount.default(DEFAULT_CONTROLLER_NODE_COUNT),
    lke_worker_node_type: nodeType.default(DEFAULT_WORKER_NODE_TYPE),
    lke_worker_node_count: nodeCount.default(DEFAULT_WORKER_NODE_COUNT),
    lke_gw_node_type: nodeType.default(DEFAULT_GATEWAY_NODE_TYPE),
    lke_gw_node_count: nodeCount.default(DEFAULT_GATEWAY_NODE_COUNT),
    worker_clusters: z.record(z.string(), workerClusterSchema),
    kubeslice_enterprise: enterpriseSchema.optional(),
    project: projectSchema,
    slice: sliceSchema,
  })
  .superRefine((doc, ctx) => {
    const names = Object.keys(doc.worker_clusters);

    if (names.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["worker_clusters"],
        message: "at least one worker cluster is required",
      });
    }

    for (const name of names) {
      const result = clusterName.safeParse(name);
      if (!result.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["worker_clusters", name],
          message: `invalid cluster name: ${result.error.issues[0]?.message ?? "unknown error"}`,
        });
      }
    }

    if (names.length > doc.slice.max_clusters) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["slice", "max_clusters"],
        message: `must be at least the number of worker clusters (${names.length})`,
      });
    }

    if (doc.slice.qos.bandwidth_guaranteed_kbps > doc.slice.qos.bandwidth_ceiling_kbps) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["slice", "qos", "bandwidth_guaranteed_kbps"],
        message: "must not exceed bandwidth_ceiling_kbps",
      });
    }

    const enterprise = doc.kubeslice_enterprise;
    if (enterprise?.enabled) {
      if (!enterprise.username) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["kubeslice_enterprise", "username"],
          message: "required when the enterprise edition is enabled",
        });
      }
      if (!enterprise.email) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["kubeslice_enterprise", "email"],
          message: "required when the enterprise edition is enabled",
        });
      }
    }
  });

export type StackConfigDocument = z.input<typeof stackConfigSchema>;

// ===== Parsing =====

export interface ParseOptions {
  /** Enterprise password held outside the document, e.g. as a Pulumi secret */
  enterprisePassword?: pulumi.Input<string>;
}

/**
 * Validate a raw configuration document and resolve defaults.
 */
export function parseStackConfig(raw: unknown, options: ParseOptions = {}): StackConfig {
  const result = stackConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const doc = result.data;

  let enterprise: EnterpriseCredentials | undefined;
  if (doc.kubeslice_enterprise?.enabled) {
    const password = doc.kubeslice_enterprise.password ?? options.enterprisePassword;
    if (password === undefined) {
      throw new ConfigValidationError([
        "kubeslice_enterprise.password: required when the enterprise edition is enabled (set it in the object or as the kubeslice_enterprise_password secret)",
      ]);
    }
    // Both are checked by the schema refinement when enabled
    enterprise = {
      username: doc.kubeslice_enterprise.username ?? "",
      email: doc.kubeslice_enterprise.email ?? "",
      password,
    };
  }

  const workers = Object.entries(doc.worker_clusters).map(
    ([name, worker]): WorkerClusterConfig => ({
      name,
      label: `${CLUSTER_LABEL_PREFIX}${name}`,
      region: worker.region,
      workerPool: {
        type: worker.worker_node_type ?? doc.lke_worker_node_type,
        count: worker.worker_node_count ?? doc.lke_worker_node_count,
      },
      gatewayPool: {
        type: worker.gw_node_type ?? doc.lke_gw_node_type,
        count: worker.gw_node_count ?? doc.lke_gw_node_count,
      },
      highAvailability: worker.high_availability,
      mesh: worker.mesh,
      applicationFrontend: worker.application_frontend,
      applicationBackend: worker.application_backend,
    })
  );

  const applicationNamespace = doc.project.application_namespace;

  return {
    lkeVersion: doc.lke_version,
    controller: {
      region: doc.region_lke_controller,
      pool: {
        type: doc.lke_controller_node_type,
        count: doc.lke_controller_node_count,
      },
    },
    workers,
    enterprise,
    project: {
      name: doc.project.name,
      namespace: `${CLUSTER_LABEL_PREFIX}${doc.project.name}`,
      applicationNamespace,
      readOnlyUsers: doc.project.read_only_users,
      readWriteUsers: doc.project.read_write_users,
    },
    slice: {
      name: doc.slice.name ?? `slice-${applicationNamespace}`,
      subnet: doc.slice.subnet,
      maxClusters: doc.slice.max_clusters,
      gatewayType: doc.slice.gateway_type,
      bandwidthCeilingKbps: doc.slice.qos.bandwidth_ceiling_kbps,
      bandwidthGuaranteedKbps: doc.slice.qos.bandwidth_guaranteed_kbps,
      isolationEnabled: doc.slice.isolation_enabled,
    },
  };
}

// ===== Loading =====

const SCALAR_KEYS = [
  "region_lke_controller",
  "lke_version",
  "lke_controller_node_type",
  "lke_controller_node_count",
  "lke_worker_node_type",
  "lke_worker_node_count",
  "lke_gw_node_type",
  "lke_gw_node_count",
] as const;

const OBJECT_KEYS = ["worker_clusters", "kubeslice_enterprise", "project", "slice"] as const;

export interface LoadedStackConfig {
  linodeToken: pulumi.Output<string>;
  stack: StackConfig;
}

/**
 * Read the configuration document from Pulumi stack config.
 */
export function loadStackConfig(config: pulumi.Config = new pulumi.Config()): LoadedStackConfig {
  const raw: Record<string, unknown> = {};

  for (const key of SCALAR_KEYS) {
    const value = config.get(key);
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  for (const key of OBJECT_KEYS) {
    const value = config.getObject<unknown>(key);
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const stack = parseStackConfig(raw, {
    enterprisePassword: config.getSecret("kubeslice_enterprise_password"),
  });

  return {
    linodeToken: config.requireSecret("linode_token"),
    stack,
  };
}
