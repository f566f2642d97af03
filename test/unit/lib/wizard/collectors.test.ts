import { confirm, multiselect, select, text } from '@clack/prompts';
import {
  collectControllerConfig,
  collectEnterpriseConfig,
  collectWorkerCluster,
  parseWorkersFlag,
} from '@/lib/wizard/collectors';

jest.mock('@clack/prompts', () => ({
  confirm: jest.fn(),
  multiselect: jest.fn(),
  password: jest.fn(),
  select: jest.fn(),
  text: jest.fn(),
}));

jest.mock('@/lib/prompts', () => ({
  ensureAnswered: <T>(value: T | symbol): T => {
    if (typeof value === 'symbol') {
      throw new Error('Configuration cancelled');
    }
    return value;
  },
  logInfo: jest.fn(),
  logWarning: jest.fn(),
}));

describe('parseWorkersFlag', () => {
  it('should give the frontend to the first worker and the backend to the rest', () => {
    expect(parseWorkersFlag('worker-1:us-ord, worker-2:eu-central,worker-3:ap-south')).toEqual({
      'worker-1': { region: 'us-ord', application_frontend: true, application_backend: false },
      'worker-2': { region: 'eu-central', application_frontend: false, application_backend: true },
      'worker-3': { region: 'ap-south', application_frontend: false, application_backend: true },
    });
  });

  it('should run the whole application on a single worker', () => {
    expect(parseWorkersFlag('solo:us-ord')).toEqual({
      solo: { region: 'us-ord', application_frontend: true, application_backend: true },
    });
  });

  it('should reject empty lists', () => {
    expect(() => parseWorkersFlag(' , ')).toThrow('--workers needs at least one name:region pair');
  });

  it('should reject entries without a region', () => {
    expect(() => parseWorkersFlag('worker-1')).toThrow("Invalid worker 'worker-1'. Expected name:region");
    expect(() => parseWorkersFlag('a1:b:c')).toThrow("Invalid worker 'a1:b:c'. Expected name:region");
  });

  it('should reject invalid and duplicate names', () => {
    expect(() => parseWorkersFlag('Worker:us-ord')).toThrow(
      "Invalid worker name 'Worker': Use lowercase letters, numbers, and hyphens only"
    );
    expect(() => parseWorkersFlag('w1:us-ord,w1:eu-central')).toThrow("Duplicate worker name 'w1'");
  });
});

describe('non-interactive collection', () => {
  it('should use defaults for the controller pool with --yes', async () => {
    const controller = await collectControllerConfig({ controllerRegion: 'us-east', lkeVersion: '1.32', yes: true });

    expect(controller).toEqual({
      region_lke_controller: 'us-east',
      lke_version: '1.32',
      lke_controller_node_type: 'g6-standard-1',
      lke_controller_node_count: 3,
    });
  });

  it('should leave the enterprise edition off with --yes', async () => {
    expect(await collectEnterpriseConfig({ yes: true })).toEqual({ enabled: false });
  });
});

describe('interactive collection', () => {
  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('should return the selected controller region, version and node type', async () => {
    jest
      .mocked(select)
      .mockResolvedValueOnce('eu-central')
      .mockResolvedValueOnce('1.31')
      .mockResolvedValueOnce('g6-standard-4');
    jest.mocked(text).mockResolvedValueOnce(' 5 ');

    const controller = await collectControllerConfig();

    expect(controller).toEqual({
      region_lke_controller: 'eu-central',
      lke_version: '1.31',
      lke_controller_node_type: 'g6-standard-4',
      lke_controller_node_count: 5,
    });
    expect(jest.mocked(select).mock.calls[0][0]).toMatchObject({ message: 'Controller cluster region' });
  });

  it('should stop when the region prompt is cancelled', async () => {
    jest.mocked(select).mockResolvedValueOnce(Symbol('clack:cancel'));

    await expect(collectControllerConfig()).rejects.toThrow('Configuration cancelled');
  });

  it('should map the selected services onto the worker', async () => {
    jest.mocked(text).mockResolvedValueOnce('worker-2').mockResolvedValueOnce('2');
    jest.mocked(select).mockResolvedValueOnce('ap-south').mockResolvedValueOnce('g6-standard-2');
    jest.mocked(multiselect).mockResolvedValueOnce(['backend']);
    jest.mocked(confirm).mockResolvedValueOnce(true);

    expect(await collectWorkerCluster(['worker-1'])).toEqual([
      'worker-2',
      {
        region: 'ap-south',
        worker_node_type: 'g6-standard-2',
        worker_node_count: 2,
        mesh: true,
        application_frontend: false,
        application_backend: true,
      },
    ]);
  });
});
