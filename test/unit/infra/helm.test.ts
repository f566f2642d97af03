import {
  COMMUNITY_CHART_REPOSITORY,
  ENTERPRISE_CHART_REPOSITORY,
  chartSource,
  controllerValues,
  uiValues,
  workerValues,
  type ResolvedEnterprise,
  type WorkerValuesInput,
} from '../../../scripts/infra/helm';

const enterprise: ResolvedEnterprise = {
  username: 'demo',
  email: 'demo@example.com',
  password: 'test-secret',
};

describe('chartSource', () => {
  it('should use the community repository by default', () => {
    expect(chartSource(false)).toEqual({ repository: COMMUNITY_CHART_REPOSITORY, version: '1.3.1' });
  });

  it('should use the enterprise repository when enabled', () => {
    expect(chartSource(true)).toEqual({ repository: ENTERPRISE_CHART_REPOSITORY, version: '1.15.0' });
  });
});

describe('controllerValues', () => {
  it('should only set the endpoint for the community edition', () => {
    expect(controllerValues('https://controller.example:443')).toEqual({
      kubeslice: { controller: { endpoint: 'https://controller.example:443' } },
    });
  });

  it('should add the trial licence and pull secrets for the enterprise edition', () => {
    expect(controllerValues('https://controller.example:443', enterprise)).toEqual({
      kubeslice: {
        controller: { endpoint: 'https://controller.example:443' },
        license: { type: 'kubeslice-trial-license', mode: 'auto', customerName: 'demo@example.com' },
      },
      imagePullSecrets: { username: 'demo', password: 'test-secret', email: 'demo@example.com' },
    });
  });
});

describe('uiValues', () => {
  it('should carry the image pull secrets', () => {
    expect(uiValues(enterprise)).toEqual({
      imagePullSecrets: { username: 'demo', password: 'test-secret', email: 'demo@example.com' },
    });
  });
});

describe('workerValues', () => {
  const input: WorkerValuesInput = {
    clusterName: 'kubeslice-worker-1',
    projectNamespace: 'kubeslice-bookinfo-project',
    controllerServer: 'https://controller.example:443',
    controllerCaData: 'Y2EtZGF0YQ==',
    controllerToken: 'test-token',
    workerServer: 'https://worker-1.example:443',
  };

  it('should encode the controller secret and keep the CA as is', () => {
    expect(workerValues(input)).toEqual({
      controllerSecret: {
        namespace: 'a3ViZXNsaWNlLWJvb2tpbmZvLXByb2plY3Q=',
        endpoint: 'aHR0cHM6Ly9jb250cm9sbGVyLmV4YW1wbGU6NDQz',
        'ca.crt': 'Y2EtZGF0YQ==',
        token: 'dGVzdC10b2tlbg==',
      },
      cluster: { name: 'kubeslice-worker-1', endpoint: 'https://worker-1.example:443' },
      netop: { networkInterface: 'eth0' },
    });
  });

  it('should enable networking and metrics for the enterprise edition', () => {
    const values = workerValues({ ...input, enterprise });

    expect(values.imagePullSecrets).toEqual({ username: 'demo', password: 'test-secret', email: 'demo@example.com' });
    expect(values.kubesliceNetworking).toEqual({ enabled: true });
    expect(values.metrics).toEqual({ insecure: true });
  });
});
