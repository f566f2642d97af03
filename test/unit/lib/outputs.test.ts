import type { OutputMap } from '@pulumi/pulumi/automation';
import { parseStackOutputs } from '@/lib/outputs';

function outputMap(values: Record<string, unknown>): OutputMap {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, { value, secret: key.endsWith('ubeconfig') }] as const)
  );
}

const outputs = {
  controllerClusterId: 101,
  controllerKubeconfig: 'apiVersion: v1',
  workerClusters: {
    'worker-1': { id: 202, label: 'kubeslice-worker-1', region: 'us-ord', kubeconfig: 'apiVersion: v1' },
  },
  projectNamespace: 'kubeslice-bookinfo-project',
  sliceName: 'slice-bookinfo',
  applicationNamespace: 'bookinfo',
};

describe('parseStackOutputs', () => {
  it('should unwrap values and coerce cluster ids', () => {
    const parsed = parseStackOutputs(outputMap(outputs));

    expect(parsed.controllerClusterId).toBe('101');
    expect(parsed.workerClusters['worker-1']).toEqual({
      id: '202',
      label: 'kubeslice-worker-1',
      region: 'us-ord',
      kubeconfig: 'apiVersion: v1',
      applicationBackend: false,
    });
    expect(parsed.sliceName).toBe('slice-bookinfo');
  });

  it('should reject a stack without outputs', () => {
    expect(() => parseStackOutputs({})).toThrow('Stack has no outputs. Provision it first.');
  });

  it('should list unexpected outputs', () => {
    const { sliceName: _sliceName, ...rest } = outputs;

    expect(() => parseStackOutputs(outputMap(rest))).toThrow('Unexpected stack outputs:\n  - sliceName: Required');
  });
});
