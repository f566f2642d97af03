/**
 * Slice Status Module
 * Verify worker registration, slice membership and service exports after provisioning
 */

import { kubectlJson, type KubectlOptions } from '@/lib/kubectl';

/**
 * Runs `kubectl <args> -o json` against a kubeconfig
 */
export type JsonRunner = (args: string[], options: KubectlOptions) => Promise<unknown>;

/**
 * KubeSlice Cluster registration status
 */
export interface ClusterRegistrationStatus {
  name: string;
  namespace: string;
  exists: boolean;
  registered: boolean;
  healthy: boolean;
  registrationStatus?: string;
  healthStatus?: string;
  errorMessage?: string;
}

/**
 * ServiceExport status on a worker
 */
export interface ServiceExportStatus {
  name: string;
  cluster: string;
  exportStatus?: string;
  availableEndpoints: number;
  ready: boolean;
  errorMessage?: string;
}

/** ServiceExports every backend worker applies from bookinfo-app/ */
export const BOOKINFO_SERVICE_EXPORTS: readonly string[] = ['details', 'reviews'];

export interface SliceConfigStatus {
  name: string;
  exists: boolean;
  clusters: string[];
  errorMessage?: string;
}

/**
 * Overall slice validation result
 */
export interface SliceValidationResult {
  success: boolean;
  clusters: ClusterRegistrationStatus[];
  sliceConfig: SliceConfigStatus;
  serviceExports: ServiceExportStatus[];
  healthyCount: number;
  errorCount: number;
}

export interface SliceTarget {
  controllerKubeconfigPath: string;
  projectNamespace: string;
  sliceName: string;
  applicationNamespace: string;
  /** Cluster label → kubeconfig path, for every worker */
  workers: Array<{ label: string; kubeconfigPath: string; exportsServices: boolean }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(value: unknown, ...path: string[]): string | undefined {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return typeof current === 'string' ? current : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Interpret a KubeSlice Cluster object
 */
export function parseClusterStatus(name: string, namespace: string, resource: unknown): ClusterRegistrationStatus {
  const registrationStatus = stringAt(resource, 'status', 'registrationStatus');
  const healthStatus = stringAt(resource, 'status', 'clusterHealth', 'clusterHealthStatus');
  const registered = registrationStatus === 'Registered';
  const healthy = healthStatus === 'Normal';

  let message: string | undefined;
  if (!registered) {
    message = `Registration ${registrationStatus ?? 'not reported yet'}`;
  } else if (!healthy) {
    message = `Cluster health ${healthStatus ?? 'not reported yet'}`;
  }

  return {
    name,
    namespace,
    exists: true,
    registered,
    healthy,
    registrationStatus,
    healthStatus,
    errorMessage: message,
  };
}

/**
 * Interpret a ServiceExport list from one worker
 */
export function parseServiceExports(cluster: string, list: unknown): ServiceExportStatus[] {
  const items = isRecord(list) && Array.isArray(list.items) ? list.items : [];

  return items.map((item: unknown): ServiceExportStatus => {
    const exportStatus = stringAt(item, 'status', 'exportStatus');
    const status = isRecord(item) && isRecord(item.status) ? item.status : {};
    const endpoints = typeof status.availableEndpoints === 'number' ? status.availableEndpoints : 0;

    return {
      name: stringAt(item, 'metadata', 'name') ?? '(unnamed)',
      cluster,
      exportStatus,
      availableEndpoints: endpoints,
      ready: exportStatus === 'READY' && endpoints > 0,
    };
  });
}

/**
 * Get a worker's registration status from the controller
 */
export async function getClusterRegistrationStatus(
  name: string,
  namespace: string,
  kubeconfigPath: string,
  run: JsonRunner = kubectlJson
): Promise<ClusterRegistrationStatus> {
  try {
    const resource = await run(['get', 'clusters.controller.kubeslice.io', name, '-n', namespace], {
      kubeconfigPath,
    });
    return parseClusterStatus(name, namespace, resource);
  } catch (error) {
    return {
      name,
      namespace,
      exists: false,
      registered: false,
      healthy: false,
      errorMessage: errorMessage(error),
    };
  }
}

export async function getSliceConfigStatus(
  name: string,
  namespace: string,
  kubeconfigPath: string,
  run: JsonRunner = kubectlJson
): Promise<SliceConfigStatus> {
  try {
    const resource = await run(['get', 'sliceconfigs.controller.kubeslice.io', name, '-n', namespace], {
      kubeconfigPath,
    });
    const spec = isRecord(resource) && isRecord(resource.spec) ? resource.spec : {};
    const clusters = Array.isArray(spec.clusters)
      ? spec.clusters.filter((cluster: unknown): cluster is string => typeof cluster === 'string')
      : [];

    return { name, exists: true, clusters };
  } catch (error) {
    return { name, exists: false, clusters: [], errorMessage: errorMessage(error) };
  }
}

/**
 * List a worker's ServiceExports. Every expected export that is absent, or
 * could not be queried, comes back as a not-ready entry carrying the reason.
 */
export async function getServiceExports(
  cluster: string,
  namespace: string,
  kubeconfigPath: string,
  expected: readonly string[] = BOOKINFO_SERVICE_EXPORTS,
  run: JsonRunner = kubectlJson
): Promise<ServiceExportStatus[]> {
  const missing = (name: string, reason: string): ServiceExportStatus => ({
    name,
    cluster,
    availableEndpoints: 0,
    ready: false,
    errorMessage: reason,
  });

  let list: unknown;
  try {
    list = await run(['get', 'serviceexports.networking.kubeslice.io', '-n', namespace], {
      kubeconfigPath,
    });
  } catch (error) {
    return expected.map((name) => missing(name, errorMessage(error)));
  }

  const found = parseServiceExports(cluster, list);
  const absent = expected
    .filter((name) => !found.some((serviceExport) => serviceExport.name === name))
    .map((name) => missing(name, `ServiceExport not found in ${namespace}`));

  return [...found, ...absent];
}

/**
 * Validate every registration, the slice and the exported services
 */
export async function validateSlice(target: SliceTarget, run: JsonRunner = kubectlJson): Promise<SliceValidationResult> {
  const clusters: ClusterRegistrationStatus[] = [];

  for (const worker of target.workers) {
    clusters.push(
      await getClusterRegistrationStatus(worker.label, target.projectNamespace, target.controllerKubeconfigPath, run)
    );
  }

  const sliceConfig = await getSliceConfigStatus(
    target.sliceName,
    target.projectNamespace,
    target.controllerKubeconfigPath,
    run
  );

  const serviceExports: ServiceExportStatus[] = [];
  for (const worker of target.workers.filter((w) => w.exportsServices)) {
    serviceExports.push(
      ...(await getServiceExports(
        worker.label,
        target.applicationNamespace,
        worker.kubeconfigPath,
        BOOKINFO_SERVICE_EXPORTS,
        run
      ))
    );
  }

  const missingFromSlice = target.workers.filter((worker) => !sliceConfig.clusters.includes(worker.label)).length;
  const healthyCount = clusters.filter((c) => c.registered && c.healthy).length;
  const errorCount =
    clusters.length -
    healthyCount +
    (sliceConfig.exists ? missingFromSlice : 1) +
    serviceExports.filter((e) => !e.ready).length;

  return {
    success: errorCount === 0,
    clusters,
    sliceConfig,
    serviceExports,
    healthyCount,
    errorCount,
  };
}

/**
 * Wait for a registered worker to report Normal health (with timeout)
 */
export async function waitForClusterHealth(
  name: string,
  namespace: string,
  kubeconfigPath: string,
  timeoutMs: number = 120000,
  run: JsonRunner = kubectlJson,
  pollIntervalMs: number = 5000
): Promise<ClusterRegistrationStatus> {
  const startTime = Date.now();
  let status = await getClusterRegistrationStatus(name, namespace, kubeconfigPath, run);

  while (!(status.registered && status.healthy) && Date.now() - startTime < timeoutMs) {
    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
    status = await getClusterRegistrationStatus(name, namespace, kubeconfigPath, run);
  }

  return status;
}
