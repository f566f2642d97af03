import { deployKubeSlice } from "./scripts/infra";
import { loadStackConfig } from "./scripts/infra/config";

const deployment = deployKubeSlice(loadStackConfig());

export const controllerClusterId = deployment.controller.cluster.id;
export const controllerKubeconfig = deployment.controller.kubeconfig;

export const workerClusters = Object.fromEntries(
  deployment.workers.map((worker) => [
    worker.config.name,
    {
      id: worker.cluster.id,
      label: worker.config.label,
      region: worker.config.region,
      kubeconfig: worker.kubeconfig,
      applicationBackend: worker.config.applicationBackend,
    },
  ] as const)
);

export const projectNamespace = deployment.registration.projectNamespace;
export const sliceName = deployment.registration.sliceName;
export const applicationNamespace = deployment.registration.applicationNamespace;
