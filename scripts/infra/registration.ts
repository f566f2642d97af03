/**
 * Worker registration and slice
 *
 * Registers every worker as a KubeSlice Cluster in the project namespace and
 * joins them all into one application slice.
 */

import * as k8s from "@pulumi/kubernetes";
import * as pulumi from "@pulumi/pulumi";
import * as time from "@pulumiverse/time";
import type { ProjectConfig, SliceSettings } from "./config";
import type { KubeSliceController } from "./controller";
import { clusterRegistrationManifest, sliceConfigManifest } from "./manifests";
import type { KubeSliceWorker } from "./worker";

export interface SliceRegistrationArgs {
  controller: KubeSliceController;
  workers: KubeSliceWorker[];
  project: ProjectConfig;
  slice: SliceSettings;
}

export class SliceRegistration extends pulumi.ComponentResource {
  readonly registrations: Record<string, k8s.yaml.v2.ConfigGroup> = {};
  readonly sliceConfig: k8s.yaml.v2.ConfigGroup;
  /** Every registration and every worker agent release */
  readonly sliceDependencies: pulumi.Resource[];
  readonly sliceName: string;
  readonly projectNamespace: string;
  readonly applicationNamespace: string;

  constructor(name: string, args: SliceRegistrationArgs, opts?: pulumi.ComponentResourceOptions) {
    super("kubeslice:index:SliceRegistration", name, {}, opts);

    const { controller, workers, project, slice } = args;
    this.sliceName = slice.name;
    this.projectNamespace = project.namespace;
    this.applicationNamespace = project.applicationNamespace;

    for (const worker of workers) {
      const workerName = worker.config.name;

      // The project namespace shows up a little after the Project resource
      const projectReady = new time.Sleep(
        `wait15Seconds_project_${workerName}`,
        { createDuration: "15s" },
        { parent: this, dependsOn: [controller.project] }
      );

      this.registrations[workerName] = new k8s.yaml.v2.ConfigGroup(
        `registration-${workerName}`,
        { objs: [clusterRegistrationManifest(worker.config, project.namespace)] },
        {
          parent: this,
          provider: controller.provider,
          dependsOn: [controller.project, projectReady],
        }
      );
    }

    this.sliceDependencies = [...Object.values(this.registrations), ...workers.map((worker) => worker.release)];

    this.sliceConfig = new k8s.yaml.v2.ConfigGroup(
      "kubeslice-slice-config",
      {
        objs: [
          sliceConfigManifest(
            slice,
            project.namespace,
            project.applicationNamespace,
            workers.map((worker) => worker.config.label)
          ),
        ],
      },
      {
        parent: this,
        provider: controller.provider,
        dependsOn: this.sliceDependencies,
      }
    );

    this.registerOutputs({
      sliceName: slice.name,
      clusters: workers.map((worker) => worker.config.label),
    });
  }
}
