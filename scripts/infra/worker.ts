/**
 * KubeSlice worker cluster
 *
 * An LKE cluster with a general worker pool and a dedicated gateway pool, the
 * Istio control plane when the cluster joins the mesh, Prometheus for the
 * enterprise dashboards, and the KubeSlice worker agent pointed at the
 * controller.
 */

import * as k8s from "@pulumi/kubernetes";
import * as linode from "@pulumi/linode";
import * as pulumi from "@pulumi/pulumi";
import type { EnterpriseCredentials, WorkerClusterConfig } from "./config";
import {
  ISTIO_NAMESPACE,
  MONITORING_NAMESPACE,
  WORKER_NAMESPACE,
  workerValues,
  type ChartSource,
} from "./helm";
import { clusterEndpoint, decodeKubeconfig, type KubeconfigCredentials } from "./kubeconfig";

/** Node label the KubeSlice gateway pods are scheduled onto */
export const GATEWAY_NODE_LABEL = "kubeslice.io/node-type";

export interface KubeSliceWorkerArgs {
  worker: WorkerClusterConfig;
  lkeVersion: string;
  chart: ChartSource;
  projectNamespace: string;
  controllerCredentials: pulumi.Output<KubeconfigCredentials>;
  enterprise?: EnterpriseCredentials;
  linodeProvider: linode.Provider;
}

export class KubeSliceWorker extends pulumi.ComponentResource {
  readonly config: WorkerClusterConfig;
  readonly cluster: linode.LkeCluster;
  /** Decoded kubeconfig YAML */
  readonly kubeconfig: pulumi.Output<string>;
  readonly provider: k8s.Provider;
  readonly istioBase?: k8s.helm.v3.Release;
  readonly istioDiscovery?: k8s.helm.v3.Release;
  readonly prometheus?: k8s.helm.v3.Release;
  readonly release: k8s.helm.v3.Release;

  constructor(name: string, args: KubeSliceWorkerArgs, opts?: pulumi.ComponentResourceOptions) {
    super("kubeslice:index:Worker", name, {}, opts);

    const worker = args.worker;
    this.config = worker;

    this.cluster = new linode.LkeCluster(
      worker.label,
      {
        label: worker.label,
        k8sVersion: args.lkeVersion,
        region: worker.region,
        tags: ["app:kubeslice-worker"],
        controlPlane: {
          highAvailability: worker.highAvailability,
        },
        pools: [
          {
            type: worker.workerPool.type,
            count: worker.workerPool.count,
          },
          {
            type: worker.gatewayPool.type,
            count: worker.gatewayPool.count,
            labels: { [GATEWAY_NODE_LABEL]: "gateway" },
          },
        ],
      },
      { parent: this, provider: args.linodeProvider }
    );

    this.kubeconfig = pulumi.secret(this.cluster.kubeconfig.apply(decodeKubeconfig));

    this.provider = new k8s.Provider(
      `worker-provider-${worker.name}`,
      {
        kubeconfig: this.kubeconfig,
        enableServerSideApply: true,
      },
      { parent: this }
    );

    const repositoryOpts = { repo: args.chart.repository };
    const agentDependencies: pulumi.Resource[] = [];

    if (worker.mesh) {
      this.istioBase = new k8s.helm.v3.Release(
        `istio-base-${worker.name}`,
        {
          chart: "istio-base",
          repositoryOpts,
          namespace: ISTIO_NAMESPACE,
          createNamespace: true,
        },
        { parent: this, provider: this.provider }
      );

      this.istioDiscovery = new k8s.helm.v3.Release(
        `istio-d-${worker.name}`,
        {
          chart: "istio-discovery",
          repositoryOpts,
          namespace: ISTIO_NAMESPACE,
        },
        { parent: this, provider: this.provider, dependsOn: [this.istioBase] }
      );

      agentDependencies.push(this.istioDiscovery);
    }

    const enterprise = args.enterprise;

    if (enterprise) {
      this.prometheus = new k8s.helm.v3.Release(
        `prometheus-${worker.name}`,
        {
          chart: "prometheus",
          repositoryOpts,
          namespace: MONITORING_NAMESPACE,
          createNamespace: true,
        },
        { parent: this, provider: this.provider }
      );
    }

    const values = pulumi
      .all([args.controllerCredentials, this.kubeconfig, enterprise?.password ?? ""])
      .apply(([controller, kubeconfig, password]) =>
        workerValues({
          clusterName: worker.label,
          projectNamespace: args.projectNamespace,
          controllerServer: controller.server,
          controllerCaData: controller.certificateAuthorityData,
          controllerToken: controller.token,
          workerServer: clusterEndpoint(kubeconfig),
          enterprise: enterprise ? { ...enterprise, password } : undefined,
        })
      );

    this.release = new k8s.helm.v3.Release(
      worker.label,
      {
        chart: "kubeslice-worker",
        repositoryOpts,
        version: args.chart.version,
        namespace: WORKER_NAMESPACE,
        values,
        createNamespace: true,
      },
      { parent: this, provider: this.provider, dependsOn: agentDependencies }
    );

    this.registerOutputs({
      clusterId: this.cluster.id,
      kubeconfig: this.kubeconfig,
    });
  }
}
