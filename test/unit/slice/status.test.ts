/**
 * Slice status checks against a fake kubectl
 */

import type { KubectlOptions } from '@/lib/kubectl';
import {
  getClusterRegistrationStatus,
  getServiceExports,
  parseClusterStatus,
  parseServiceExports,
  validateSlice,
  waitForClusterHealth,
  type JsonRunner,
  type SliceTarget,
} from '@/slice/status';

function clusterResource(registrationStatus: string, clusterHealthStatus?: string) {
  return {
    kind: 'Cluster',
    status: {
      registrationStatus,
      ...(clusterHealthStatus ? { clusterHealth: { clusterHealthStatus } } : {}),
    },
  };
}

function exportList(...items: Array<[string, string, number]>) {
  return {
    items: items.map(([name, exportStatus, availableEndpoints]) => ({
      metadata: { name },
      status: { exportStatus, availableEndpoints },
    })),
  };
}

/**
 * Answers by resource type and, for clusters, by name
 */
function fakeKubectl(responses: Record<string, unknown>): JsonRunner & { calls: Array<[string[], KubectlOptions]> } {
  const calls: Array<[string[], KubectlOptions]> = [];
  const run = async (args: string[], options: KubectlOptions): Promise<unknown> => {
    calls.push([args, options]);
    const key = `${args[1]}/${args[2]}@${options.kubeconfigPath}`;
    if (!(key in responses)) {
      throw new Error(`kubectl ${args.join(' ')} failed: NotFound`);
    }
    return responses[key];
  };
  return Object.assign(run, { calls });
}

const target: SliceTarget = {
  controllerKubeconfigPath: '/kube/controller',
  projectNamespace: 'kubeslice-bookinfo-project',
  sliceName: 'slice-bookinfo',
  applicationNamespace: 'bookinfo',
  workers: [
    { label: 'kubeslice-worker-1', kubeconfigPath: '/kube/worker-1', exportsServices: false },
    { label: 'kubeslice-worker-2', kubeconfigPath: '/kube/worker-2', exportsServices: true },
  ],
};

describe('parseClusterStatus', () => {
  it('should treat a registered cluster with normal health as healthy', () => {
    const status = parseClusterStatus('w1', 'ns', clusterResource('Registered', 'Normal'));

    expect(status).toEqual({
      name: 'w1',
      namespace: 'ns',
      exists: true,
      registered: true,
      healthy: true,
      registrationStatus: 'Registered',
      healthStatus: 'Normal',
      errorMessage: undefined,
    });
  });

  it('should report a pending registration', () => {
    const status = parseClusterStatus('w1', 'ns', clusterResource('Pending'));

    expect(status.registered).toBe(false);
    expect(status.errorMessage).toBe('Registration Pending');
  });

  it('should report missing status', () => {
    expect(parseClusterStatus('w1', 'ns', { kind: 'Cluster' }).errorMessage).toBe('Registration not reported yet');
  });

  it('should report unhealthy registered clusters', () => {
    const status = parseClusterStatus('w1', 'ns', clusterResource('Registered', 'Warning'));

    expect(status.registered).toBe(true);
    expect(status.healthy).toBe(false);
    expect(status.errorMessage).toBe('Cluster health Warning');
  });
});

describe('parseServiceExports', () => {
  it('should mark exports ready only with endpoints', () => {
    const exports = parseServiceExports('w2', exportList(['details', 'READY', 1], ['reviews', 'READY', 0]));

    expect(exports).toEqual([
      { name: 'details', cluster: 'w2', exportStatus: 'READY', availableEndpoints: 1, ready: true },
      { name: 'reviews', cluster: 'w2', exportStatus: 'READY', availableEndpoints: 0, ready: false },
    ]);
  });

  it('should tolerate lists without items', () => {
    expect(parseServiceExports('w2', {})).toEqual([]);
  });

  it('should name exports without metadata', () => {
    expect(parseServiceExports('w2', { items: [{}] })[0]).toEqual({
      name: '(unnamed)',
      cluster: 'w2',
      exportStatus: undefined,
      availableEndpoints: 0,
      ready: false,
    });
  });
});

describe('getClusterRegistrationStatus', () => {
  it('should query the controller for the cluster', async () => {
    const run = fakeKubectl({
      'clusters.controller.kubeslice.io/w1@/kube/controller': clusterResource('Registered', 'Normal'),
    });

    const status = await getClusterRegistrationStatus('w1', 'ns', '/kube/controller', run);

    expect(status.healthy).toBe(true);
    expect(run.calls).toEqual([
      [['get', 'clusters.controller.kubeslice.io', 'w1', '-n', 'ns'], { kubeconfigPath: '/kube/controller' }],
    ]);
  });

  it('should report clusters that do not exist', async () => {
    const status = await getClusterRegistrationStatus('w1', 'ns', '/kube/controller', fakeKubectl({}));

    expect(status.exists).toBe(false);
    expect(status.errorMessage).toBe('kubectl get clusters.controller.kubeslice.io w1 -n ns failed: NotFound');
  });
});

describe('getServiceExports', () => {
  it('should report every expected export when the query fails', async () => {
    const exports = await getServiceExports('w2', 'bookinfo', '/kube/worker-2', ['details', 'reviews'], fakeKubectl({}));

    expect(exports).toEqual([
      {
        name: 'details',
        cluster: 'w2',
        availableEndpoints: 0,
        ready: false,
        errorMessage: 'kubectl get serviceexports.networking.kubeslice.io -n bookinfo failed: NotFound',
      },
      {
        name: 'reviews',
        cluster: 'w2',
        availableEndpoints: 0,
        ready: false,
        errorMessage: 'kubectl get serviceexports.networking.kubeslice.io -n bookinfo failed: NotFound',
      },
    ]);
  });

  it('should add expected exports that are absent', async () => {
    const run = fakeKubectl({
      'serviceexports.networking.kubeslice.io/-n@/kube/worker-2': exportList(['details', 'READY', 1]),
    });

    const exports = await getServiceExports('w2', 'bookinfo', '/kube/worker-2', ['details', 'reviews'], run);

    expect(exports.map((e) => [e.name, e.ready, e.errorMessage])).toEqual([
      ['details', true, undefined],
      ['reviews', false, 'ServiceExport not found in bookinfo'],
    ]);
  });
});

describe('validateSlice', () => {
  const healthy = {
    'clusters.controller.kubeslice.io/kubeslice-worker-1@/kube/controller': clusterResource('Registered', 'Normal'),
    'clusters.controller.kubeslice.io/kubeslice-worker-2@/kube/controller': clusterResource('Registered', 'Normal'),
    'sliceconfigs.controller.kubeslice.io/slice-bookinfo@/kube/controller': {
      spec: { clusters: ['kubeslice-worker-1', 'kubeslice-worker-2'] },
    },
    'serviceexports.networking.kubeslice.io/-n@/kube/worker-2': exportList(
      ['details', 'READY', 1],
      ['reviews', 'READY', 1]
    ),
  };

  it('should succeed when everything is registered and exported', async () => {
    const result = await validateSlice(target, fakeKubectl(healthy));

    expect(result.success).toBe(true);
    expect(result.healthyCount).toBe(2);
    expect(result.errorCount).toBe(0);
    expect(result.sliceConfig).toEqual({
      name: 'slice-bookinfo',
      exists: true,
      clusters: ['kubeslice-worker-1', 'kubeslice-worker-2'],
    });
    expect(result.serviceExports.map((e) => e.name)).toEqual(['details', 'reviews']);
  });

  it('should only read exports from workers running the backend', async () => {
    const run = fakeKubectl(healthy);
    await validateSlice(target, run);

    const exportQueries = run.calls.filter(([args]) => args[1] === 'serviceexports.networking.kubeslice.io');
    expect(exportQueries.map(([, options]) => options.kubeconfigPath)).toEqual(['/kube/worker-2']);
  });

  it('should count unhealthy clusters, slice membership and pending exports', async () => {
    const result = await validateSlice(
      target,
      fakeKubectl({
        ...healthy,
        'clusters.controller.kubeslice.io/kubeslice-worker-1@/kube/controller': clusterResource('Pending'),
        'sliceconfigs.controller.kubeslice.io/slice-bookinfo@/kube/controller': {
          spec: { clusters: ['kubeslice-worker-2'] },
        },
        'serviceexports.networking.kubeslice.io/-n@/kube/worker-2': exportList(['details', 'PENDING', 0]),
      })
    );

    expect(result.success).toBe(false);
    expect(result.healthyCount).toBe(1);
    // pending details, missing reviews
    expect(result.errorCount).toBe(4);
  });

  it('should fail when a backend worker exports nothing', async () => {
    const result = await validateSlice(
      target,
      fakeKubectl({
        ...healthy,
        'serviceexports.networking.kubeslice.io/-n@/kube/worker-2': { items: [] },
      })
    );

    expect(result.success).toBe(false);
    expect(result.errorCount).toBe(2);
    expect(result.serviceExports.map((e) => e.name)).toEqual(['details', 'reviews']);
  });

  it('should fail when the export query fails', async () => {
    const { 'serviceexports.networking.kubeslice.io/-n@/kube/worker-2': _exports, ...withoutExports } = healthy;

    const result = await validateSlice(target, fakeKubectl(withoutExports));

    expect(result.success).toBe(false);
    expect(result.healthyCount).toBe(2);
    expect(result.errorCount).toBe(2);
  });

  it('should count a missing slice as one error', async () => {
    const { 'sliceconfigs.controller.kubeslice.io/slice-bookinfo@/kube/controller': _slice, ...withoutSlice } =
      healthy;

    const result = await validateSlice(target, fakeKubectl(withoutSlice));

    expect(result.sliceConfig.exists).toBe(false);
    expect(result.errorCount).toBe(1);
  });
});

describe('waitForClusterHealth', () => {
  it('should poll until the cluster is healthy', async () => {
    const states = [clusterResource('Pending'), clusterResource('Registered'), clusterResource('Registered', 'Normal')];
    let call = 0;
    const run: JsonRunner = async () => states[Math.min(call++, states.length - 1)];

    const status = await waitForClusterHealth('w1', 'ns', '/kube/controller', 1000, run, 1);

    expect(status.healthy).toBe(true);
    expect(call).toBe(3);
  });

  it('should return the last status after the timeout', async () => {
    const run: JsonRunner = async () => clusterResource('Pending');

    const status = await waitForClusterHealth('w1', 'ns', '/kube/controller', 0, run, 1);

    expect(status.registered).toBe(false);
    expect(status.errorMessage).toBe('Registration Pending');
  });
});
