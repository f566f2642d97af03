/**
 * KubeSlice on LKE
 *
 * Declares the whole topology: controller cluster → controller components →
 * worker clusters → mesh and worker agents → registrations and slice →
 * sample application. Ordering comes from resource dependencies; Pulumi's
 * engine does the rest.
 */

import * as linode from "@pulumi/linode";
import * as pulumi from "@pulumi/pulumi";
import { BookinfoApplication } from "./application";
import type { LoadedStackConfig } from "./config";
import { KubeSliceController } from "./controller";
import { chartSource } from "./helm";
import { SliceRegistration } from "./registration";
import { KubeSliceWorker } from "./worker";

export interface KubeSliceDeployment {
  controller: KubeSliceController;
  workers: KubeSliceWorker[];
  registration: SliceRegistration;
  applications: BookinfoApplication[];
}

export function deployKubeSlice({ linodeToken, stack }: LoadedStackConfig): KubeSliceDeployment {
  const chart = chartSource(stack.enterprise !== undefined);

  pulumi.log.info(
    `KubeSlice ${stack.enterprise ? "enterprise" : "community"} ${chart.version}: ` +
      `controller in ${stack.controller.region}, ${stack.workers.length} worker cluster(s)`
  );

  const linodeProvider = new linode.Provider("linode-provider", { token: linodeToken });

  const controller = new KubeSliceController("controller", {
    lkeVersion: stack.lkeVersion,
    region: stack.controller.region,
    pool: stack.controller.pool,
    project: stack.project,
    chart,
    enterprise: stack.enterprise,
    linodeProvider,
  });

  const workers = stack.workers.map(
    (worker) =>
      new KubeSliceWorker(worker.name, {
        worker,
        lkeVersion: stack.lkeVersion,
        chart,
        projectNamespace: stack.project.namespace,
        controllerCredentials: controller.credentials,
        enterprise: stack.enterprise,
        linodeProvider,
      })
  );

  const registration = new SliceRegistration("slice", {
    controller,
    workers,
    project: stack.project,
    slice: stack.slice,
  });

  const workerReleases = workers.map((worker) => worker.release);

  const applications = workers.map(
    (worker) =>
      new BookinfoApplication(worker.config.name, {
        worker: worker.config,
        provider: worker.provider,
        namespace: stack.project.applicationNamespace,
        sliceName: stack.slice.name,
        sliceConfig: registration.sliceConfig,
        workerReleases,
      })
  );

  return { controller, workers, registration, applications };
}
