/**
 * KubeSlice controller cluster
 *
 * The LKE cluster hosting the KubeSlice control plane, the controller (and,
 * for the enterprise edition, UI) Helm releases and the project every worker
 * registers into.
 */

import * as k8s from "@pulumi/kubernetes";
import * as linode from "@pulumi/linode";
import * as pulumi from "@pulumi/pulumi";
import * as time from "@pulumiverse/time";
import type { EnterpriseCredentials, NodePoolConfig, ProjectConfig } from "./config";
import { CLUSTER_LABEL_PREFIX } from "./config";
import { CONTROLLER_NAMESPACE, controllerValues, uiValues, type ChartSource } from "./helm";
import { decodeKubeconfig, parseKubeconfig, type KubeconfigCredentials } from "./kubeconfig";
import { projectManifest } from "./manifests";

export const CONTROLLER_CLUSTER_LABEL = `${CLUSTER_LABEL_PREFIX}controller`;

export interface KubeSliceControllerArgs {
  lkeVersion: string;
  region: string;
  pool: NodePoolConfig;
  project: ProjectConfig;
  chart: ChartSource;
  enterprise?: EnterpriseCredentials;
  linodeProvider: linode.Provider;
}

export class KubeSliceController extends pulumi.ComponentResource {
  readonly cluster: linode.LkeCluster;
  /** Decoded kubeconfig YAML */
  readonly kubeconfig: pulumi.Output<string>;
  readonly credentials: pulumi.Output<KubeconfigCredentials>;
  readonly provider: k8s.Provider;
  readonly release: k8s.helm.v3.Release;
  readonly uiRelease?: k8s.helm.v3.Release;
  readonly project: k8s.yaml.v2.ConfigGroup;

  constructor(name: string, args: KubeSliceControllerArgs, opts?: pulumi.ComponentResourceOptions) {
    super("kubeslice:index:Controller", name, {}, opts);

    this.cluster = new linode.LkeCluster(
      CONTROLLER_CLUSTER_LABEL,
      {
        label: CONTROLLER_CLUSTER_LABEL,
        k8sVersion: args.lkeVersion,
        region: args.region,
        tags: ["app:kubeslice-controller"],
        pools: [
          {
            type: args.pool.type,
            count: args.pool.count,
          },
        ],
      },
      { parent: this, provider: args.linodeProvider }
    );

    this.kubeconfig = pulumi.secret(this.cluster.kubeconfig.apply(decodeKubeconfig));
    this.credentials = this.kubeconfig.apply(parseKubeconfig);

    this.provider = new k8s.Provider(
      CONTROLLER_CLUSTER_LABEL,
      {
        kubeconfig: this.kubeconfig,
        enableServerSideApply: true,
      },
      { parent: this }
    );

    const namespace = new k8s.core.v1.Namespace(
      CONTROLLER_NAMESPACE,
      {
        metadata: { name: CONTROLLER_NAMESPACE },
      },
      { parent: this, provider: this.provider }
    );

    const enterprise = args.enterprise;
    const password: pulumi.Input<string> = enterprise?.password ?? "";

    const values = pulumi.all([this.credentials, password]).apply(([credentials, resolvedPassword]) =>
      controllerValues(
        credentials.server,
        enterprise ? { ...enterprise, password: resolvedPassword } : undefined
      )
    );

    this.release = new k8s.helm.v3.Release(
      "kubeslice-controller",
      {
        chart: "kubeslice-controller",
        namespace: CONTROLLER_NAMESPACE,
        repositoryOpts: { repo: args.chart.repository },
        version: args.chart.version,
        values,
        skipAwait: false,
      },
      {
        parent: this,
        provider: this.provider,
        dependsOn: [namespace],
        ignoreChanges: ["*"],
      }
    );

    if (enterprise) {
      this.uiRelease = new k8s.helm.v3.Release(
        "kubeslice-ui",
        {
          chart: "kubeslice-ui",
          namespace: CONTROLLER_NAMESPACE,
          repositoryOpts: { repo: args.chart.repository },
          version: args.chart.version,
          values: pulumi.output(enterprise.password).apply((resolvedPassword) =>
            uiValues({ ...enterprise, password: resolvedPassword })
          ),
          skipAwait: false,
        },
        {
          parent: this,
          provider: this.provider,
          dependsOn: [namespace],
          ignoreChanges: ["*"],
        }
      );
    }

    // The controller's webhooks take a while to answer after the release reports ready
    const settle = new time.Sleep(
      "wait30Seconds",
      { createDuration: "30s" },
      { parent: this, dependsOn: [this.release] }
    );

    this.project = new k8s.yaml.v2.ConfigGroup(
      "kubeslice-project",
      { objs: [projectManifest(args.project)] },
      { parent: this, provider: this.provider, dependsOn: [this.release, settle] }
    );

    this.registerOutputs({
      clusterId: this.cluster.id,
      kubeconfig: this.kubeconfig,
    });
  }
}
