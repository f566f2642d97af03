/**
 * Bookinfo sample application
 *
 * The product page runs wherever `application_frontend` is set; ratings,
 * details and reviews run wherever `application_backend` is set, and details
 * and reviews are exported to the rest of the slice.
 */

import * as k8s from "@pulumi/kubernetes";
import * as pulumi from "@pulumi/pulumi";
import * as time from "@pulumiverse/time";
import { readFileSync } from "fs";
import { join, resolve } from "path";
import { parseAllDocuments } from "yaml";
import type { WorkerClusterConfig } from "./config";

export const BOOKINFO_MANIFEST_DIR = resolve(__dirname, "..", "..", "bookinfo-app");

export const FRONTEND_MANIFESTS = ["productpage.yaml"];

export const BACKEND_MANIFESTS = [
  "ratings.yaml",
  "details.yaml",
  "reviews.yaml",
  "serviceexport-details.yaml",
  "serviceexport-reviews.yaml",
];

export interface BookinfoApplicationArgs {
  worker: WorkerClusterConfig;
  provider: k8s.Provider;
  namespace: string;
  /** ServiceExports are bound to this slice */
  sliceName: string;
  /** The SliceConfig; sidecar and slice labels land on the namespace after it */
  sliceConfig: pulumi.Resource;
  /** Worker agent releases the workloads must not start before */
  workerReleases: pulumi.Resource[];
  manifestDir?: string;
}

export interface ManifestTarget {
  namespace: string;
  sliceName: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Services imported over a slice resolve as `<service>.<namespace>.svc.slice.local` */
const SLICE_HOSTNAME = /^([a-z0-9-]+)\.[a-z0-9-]+\.svc\.slice\.local$/;

/**
 * Point container env values that name a slice hostname at the target namespace
 */
function withSliceHostnames(spec: Record<string, unknown>, namespace: string): Record<string, unknown> {
  const template = spec.template;
  const podSpec = isRecord(template) ? template.spec : undefined;
  if (!isRecord(template) || !isRecord(podSpec) || !Array.isArray(podSpec.containers)) {
    return spec;
  }

  const containers = podSpec.containers.map((container: unknown) => {
    if (!isRecord(container) || !Array.isArray(container.env)) {
      return container;
    }
    const env = container.env.map((variable: unknown) => {
      if (!isRecord(variable) || typeof variable.value !== "string") {
        return variable;
      }
      return { ...variable, value: variable.value.replace(SLICE_HOSTNAME, `$1.${namespace}.svc.slice.local`) };
    });
    return { ...container, env };
  });

  return { ...spec, template: { ...template, spec: { ...podSpec, containers } } };
}

/**
 * Read multi-document manifest files, placing every object in the application
 * namespace, binding ServiceExports to the slice and pointing slice hostnames
 * in container env at that namespace.
 */
export function loadManifests(
  files: string[],
  target: ManifestTarget,
  manifestDir: string = BOOKINFO_MANIFEST_DIR
): Record<string, unknown>[] {
  const objects: Record<string, unknown>[] = [];

  for (const file of files) {
    const path = join(manifestDir, file);
    const documents = parseAllDocuments(readFileSync(path, "utf-8"));

    for (const document of documents) {
      if (document.errors.length > 0) {
        throw new Error(`Invalid YAML in ${path}: ${document.errors[0].message}`);
      }

      const object: unknown = document.toJS();
      if (object === null || object === undefined) {
        continue;
      }
      if (!isRecord(object) || typeof object.kind !== "string") {
        throw new Error(`Manifest in ${path} is not a Kubernetes object`);
      }

      const metadata = isRecord(object.metadata) ? object.metadata : {};
      const manifest: Record<string, unknown> = {
        ...object,
        metadata: { ...metadata, namespace: target.namespace },
      };

      if (object.kind === "ServiceExport") {
        const spec = isRecord(object.spec) ? object.spec : {};
        manifest.spec = { ...spec, slice: target.sliceName };
      } else if (object.kind === "Deployment" && isRecord(object.spec)) {
        manifest.spec = withSliceHostnames(object.spec, target.namespace);
      }

      objects.push(manifest);
    }
  }

  return objects;
}

export class BookinfoApplication extends pulumi.ComponentResource {
  readonly namespace: k8s.core.v1.Namespace;
  readonly frontend?: k8s.yaml.v2.ConfigGroup;
  readonly backend?: k8s.yaml.v2.ConfigGroup;
  readonly workloadDependencies: pulumi.Resource[];

  constructor(name: string, args: BookinfoApplicationArgs, opts?: pulumi.ComponentResourceOptions) {
    super("kubeslice:index:BookinfoApplication", name, {}, opts);

    const { worker, provider, namespace } = args;
    const manifestDir = args.manifestDir ?? BOOKINFO_MANIFEST_DIR;
    const target: ManifestTarget = { namespace, sliceName: args.sliceName };

    this.namespace = new k8s.core.v1.Namespace(
      `namespace-application-${worker.name}`,
      {
        metadata: {
          name: namespace,
          labels: worker.mesh ? { "istio-injection": "enabled" } : {},
        },
      },
      { parent: this, provider }
    );

    const sidecarsReady = new time.Sleep(
      `wait30Seconds_sidecars_${worker.name}`,
      { createDuration: "30s" },
      { parent: this, dependsOn: [args.sliceConfig] }
    );

    this.workloadDependencies = [this.namespace, args.sliceConfig, ...args.workerReleases, sidecarsReady];
    const dependsOn = this.workloadDependencies;

    if (worker.applicationFrontend) {
      this.frontend = new k8s.yaml.v2.ConfigGroup(
        `frontend-manifest-${worker.name}-${namespace}`,
        { objs: loadManifests(FRONTEND_MANIFESTS, target, manifestDir) },
        { parent: this, provider, dependsOn }
      );
    }

    if (worker.applicationBackend) {
      this.backend = new k8s.yaml.v2.ConfigGroup(
        `backend-manifest-${worker.name}-${namespace}`,
        { objs: loadManifests(BACKEND_MANIFESTS, target, manifestDir) },
        { parent: this, provider, dependsOn }
      );
    }

    this.registerOutputs({});
  }
}
