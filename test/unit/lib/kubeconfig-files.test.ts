import { lkeContextName, removeLkeKubeconfigEntries } from '@/lib/kubeconfig-files';

describe('lkeContextName', () => {
  it('should follow the LKE naming', () => {
    expect(lkeContextName('123456')).toBe('lke123456-ctx');
  });
});

describe('removeLkeKubeconfigEntries', () => {
  it('should delete the context, cluster and user of the cluster', async () => {
    const calls: string[][] = [];
    const run = async (args: string[]): Promise<string> => {
      calls.push(args);
      return '';
    };

    const removed = await removeLkeKubeconfigEntries('123456', run);

    expect(calls).toEqual([
      ['config', 'delete-context', 'lke123456-ctx'],
      ['config', 'delete-cluster', 'lke123456'],
      ['config', 'delete-user', 'lke123456-admin'],
    ]);
    expect(removed).toEqual(['lke123456-ctx', 'lke123456', 'lke123456-admin']);
  });

  it('should keep going when an entry is already gone', async () => {
    const run = async (args: string[]): Promise<string> => {
      if (args[1] === 'delete-context') {
        throw new Error('kubectl config delete-context lke42-ctx failed: context not found');
      }
      return '';
    };

    expect(await removeLkeKubeconfigEntries('42', run)).toEqual(['lke42', 'lke42-admin']);
  });
});
