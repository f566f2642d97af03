/**
 * KubeSlice custom resources applied on the controller cluster
 */

import type { ProjectConfig, SliceSettings, WorkerClusterConfig } from "./config";
import { CONTROLLER_NAMESPACE, NETWORK_INTERFACE } from "./helm";

export const KUBESLICE_API_VERSION = "controller.kubeslice.io/v1alpha1";
export const CLOUD_PROVIDER = "linode";

/** Pulumi waits on this before treating a registration as created */
export const CLUSTER_HEALTH_WAIT_FOR = "jsonpath={.status.clusterHealth.clusterHealthStatus}=Normal";

export interface KubernetesManifest {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  spec: Record<string, unknown>;
}

export function projectManifest(project: ProjectConfig): KubernetesManifest {
  return {
    apiVersion: KUBESLICE_API_VERSION,
    kind: "Project",
    metadata: {
      name: project.name,
      namespace: CONTROLLER_NAMESPACE,
    },
    spec: {
      serviceAccount: {
        readOnly: [...project.readOnlyUsers],
        readWrite: [...project.readWriteUsers],
      },
    },
  };
}

export function clusterRegistrationManifest(
  worker: Pick<WorkerClusterConfig, "label" | "region">,
  projectNamespace: string
): KubernetesManifest {
  return {
    apiVersion: KUBESLICE_API_VERSION,
    kind: "Cluster",
    metadata: {
      name: worker.label,
      namespace: projectNamespace,
      annotations: {
        "pulumi.com/waitFor": CLUSTER_HEALTH_WAIT_FOR,
      },
    },
    spec: {
      networkInterface: NETWORK_INTERFACE,
      clusterProperty: {
        geoLocation: {
          cloudProvider: CLOUD_PROVIDER,
          cloudRegion: worker.region,
        },
      },
    },
  };
}

export function sliceConfigManifest(
  slice: SliceSettings,
  projectNamespace: string,
  applicationNamespace: string,
  clusterNames: string[]
): KubernetesManifest {
  return {
    apiVersion: KUBESLICE_API_VERSION,
    kind: "SliceConfig",
    metadata: {
      name: slice.name,
      namespace: projectNamespace,
    },
    spec: {
      sliceSubnet: slice.subnet,
      maxClusters: slice.maxClusters,
      sliceType: "Application",
      sliceGatewayProvider: {
        sliceGatewayType: slice.gatewayType,
        sliceCaType: "Local",
      },
      sliceIpamType: "Local",
      clusters: [...clusterNames],
      qosProfileDetails: {
        queueType: "HTB",
        priority: 1,
        tcType: "BANDWIDTH_CONTROL",
        bandwidthCeilingKbps: slice.bandwidthCeilingKbps,
        bandwidthGuaranteedKbps: slice.bandwidthGuaranteedKbps,
        dscpClass: "AF11",
      },
      namespaceIsolationProfile: {
        applicationNamespaces: [
          {
            namespace: applicationNamespace,
            clusters: ["*"],
          },
        ],
        isolationEnabled: slice.isolationEnabled,
      },
    },
  };
}
