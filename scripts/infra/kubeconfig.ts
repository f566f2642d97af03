/**
 * Kubeconfig helpers
 *
 * LKE hands back kubeconfigs base64-encoded. The controller endpoint, CA and
 * token feed the worker agent's controllerSecret; worker endpoints feed the
 * worker's own cluster registration.
 */

import { parse as parseYaml } from "yaml";

export interface KubeconfigCredentials {
  server: string;
  /** Base64-encoded, exactly as it appears in the kubeconfig */
  certificateAuthorityData: string;
  token: string;
}

export class KubeconfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KubeconfigError";
  }
}

/**
 * Decode a base64 kubeconfig into YAML text
 */
export function decodeKubeconfig(encoded: string): string {
  const decoded = Buffer.from(encoded, "base64").toString("utf-8");

  if (!decoded.includes("apiVersion")) {
    throw new KubeconfigError("Decoded kubeconfig is not a kubeconfig document");
  }

  return decoded;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstEntry(doc: Record<string, unknown>, listKey: string, entryKey: string): Record<string, unknown> {
  const list = doc[listKey];
  if (!Array.isArray(list) || list.length === 0) {
    throw new KubeconfigError(`Kubeconfig has no ${listKey}`);
  }

  const entry: unknown = list[0];
  const block = isRecord(entry) ? entry[entryKey] : undefined;
  if (!isRecord(block)) {
    throw new KubeconfigError(`Kubeconfig ${listKey}[0] has no ${entryKey} block`);
  }

  return block;
}

function requireString(block: Record<string, unknown>, field: string, where: string): string {
  const value = block[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new KubeconfigError(`Kubeconfig ${where} is missing ${field}`);
  }
  return value;
}

/**
 * Extract the API server, CA and bearer token from the first cluster and user
 */
export function parseKubeconfig(kubeconfig: string): KubeconfigCredentials {
  const doc: unknown = parseYaml(kubeconfig);
  if (!isRecord(doc)) {
    throw new KubeconfigError("Kubeconfig is not a YAML mapping");
  }

  const cluster = firstEntry(doc, "clusters", "cluster");
  const user = firstEntry(doc, "users", "user");

  return {
    server: requireString(cluster, "server", "clusters[0].cluster"),
    certificateAuthorityData: requireString(cluster, "certificate-authority-data", "clusters[0].cluster"),
    token: requireString(user, "token", "users[0].user"),
  };
}

/**
 * API server URL of the first cluster
 */
export function clusterEndpoint(kubeconfig: string): string {
  const doc: unknown = parseYaml(kubeconfig);
  if (!isRecord(doc)) {
    throw new KubeconfigError("Kubeconfig is not a YAML mapping");
  }
  return requireString(firstEntry(doc, "clusters", "cluster"), "server", "clusters[0].cluster");
}
