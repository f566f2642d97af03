/**
 * KubeSlice chart sources and Helm values
 */

import type { EnterpriseCredentials } from "./config";

export const COMMUNITY_CHART_REPOSITORY = "https://kubeslice.github.io/kubeslice/";
export const COMMUNITY_CHART_VERSION = "1.3.1";
export const ENTERPRISE_CHART_REPOSITORY = "https://kubeslice.aveshalabs.io/repository/kubeslice-helm-ent-prod/";
export const ENTERPRISE_CHART_VERSION = "1.15.0";

export const CONTROLLER_NAMESPACE = "kubeslice-controller";
export const WORKER_NAMESPACE = "kubeslice-system";
export const ISTIO_NAMESPACE = "istio-system";
export const MONITORING_NAMESPACE = "monitoring";

/** LKE nodes expose their primary interface as eth0 */
export const NETWORK_INTERFACE = "eth0";

export interface ChartSource {
  repository: string;
  version: string;
}

export function chartSource(enterprise: boolean): ChartSource {
  return enterprise
    ? { repository: ENTERPRISE_CHART_REPOSITORY, version: ENTERPRISE_CHART_VERSION }
    : { repository: COMMUNITY_CHART_REPOSITORY, version: COMMUNITY_CHART_VERSION };
}

export interface ImagePullSecrets {
  username: string;
  password: string;
  email: string;
}

function imagePullSecrets(enterprise: ResolvedEnterprise): ImagePullSecrets {
  return {
    username: enterprise.username,
    password: enterprise.password,
    email: enterprise.email,
  };
}

/** Enterprise credentials with the password already resolved */
export type ResolvedEnterprise = Omit<EnterpriseCredentials, "password"> & { password: string };

const encode = (value: string): string => Buffer.from(value, "utf-8").toString("base64");

// ===== Controller =====

export function controllerValues(endpoint: string, enterprise?: ResolvedEnterprise): Record<string, unknown> {
  if (!enterprise) {
    return {
      kubeslice: {
        controller: { endpoint },
      },
    };
  }

  return {
    kubeslice: {
      controller: { endpoint },
      license: {
        type: "kubeslice-trial-license",
        mode: "auto",
        customerName: enterprise.email,
      },
    },
    imagePullSecrets: imagePullSecrets(enterprise),
  };
}

export function uiValues(enterprise: ResolvedEnterprise): Record<string, unknown> {
  return {
    imagePullSecrets: imagePullSecrets(enterprise),
  };
}

// ===== Worker =====

export interface WorkerValuesInput {
  /** KubeSlice cluster name, `kubeslice-<worker>` */
  clusterName: string;
  /** Namespace the controller created for the project */
  projectNamespace: string;
  controllerServer: string;
  controllerCaData: string;
  controllerToken: string;
  workerServer: string;
  enterprise?: ResolvedEnterprise;
}

export function workerValues(input: WorkerValuesInput): Record<string, unknown> {
  const values: Record<string, unknown> = {
    controllerSecret: {
      namespace: encode(input.projectNamespace),
      endpoint: encode(input.controllerServer),
      // already base64 in the kubeconfig
      "ca.crt": input.controllerCaData,
      token: encode(input.controllerToken),
    },
    cluster: {
      name: input.clusterName,
      endpoint: input.workerServer,
    },
    netop: {
      networkInterface: NETWORK_INTERFACE,
    },
  };

  if (input.enterprise) {
    values.imagePullSecrets = imagePullSecrets(input.enterprise);
    values.kubesliceNetworking = { enabled: true };
    values.metrics = { insecure: true };
  }

  return values;
}
