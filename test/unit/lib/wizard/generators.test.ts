import { parse } from 'yaml';
import type { StackConfigDocument } from '@/infra/config';
import { generateStackConfigYaml, stackConfigFileName, withoutSecrets } from '@/lib/wizard/generators';

const document: StackConfigDocument = {
  region_lke_controller: 'us-east',
  lke_version: '1.31',
  worker_clusters: {
    'worker-1': { region: 'us-ord', application_frontend: true },
  },
  kubeslice_enterprise: {
    enabled: true,
    username: 'demo',
    email: 'demo@example.com',
    password: 'test-secret',
  },
};

describe('Stack config generation', () => {
  it('should name the file after the stack', () => {
    expect(stackConfigFileName('dev')).toBe('Pulumi.dev.yaml');
  });

  it('should strip the enterprise password', () => {
    expect(withoutSecrets(document).kubeslice_enterprise).toEqual({
      enabled: true,
      username: 'demo',
      email: 'demo@example.com',
    });
  });

  it('should leave documents without enterprise settings untouched', () => {
    const { kubeslice_enterprise: _enterprise, ...community } = document;

    expect(withoutSecrets(community)).toBe(community);
  });

  it('should namespace every key under the project', () => {
    const yaml = generateStackConfigYaml({ ...document, project: undefined });

    expect(parse(yaml)).toEqual({
      config: {
        'kubeslice-lke:region_lke_controller': 'us-east',
        'kubeslice-lke:lke_version': '1.31',
        'kubeslice-lke:worker_clusters': {
          'worker-1': { region: 'us-ord', application_frontend: true },
        },
        'kubeslice-lke:kubeslice_enterprise': {
          enabled: true,
          username: 'demo',
          email: 'demo@example.com',
        },
      },
    });
  });

  it('should start with the secrets hint and use the given project name', () => {
    const yaml = generateStackConfigYaml(document, 'other');
    const lines = yaml.split('\n');

    expect(lines[0]).toBe('# Generated by the stack configuration wizard.');
    expect(lines[2]).toBe('#   pulumi config set --secret linode_token <token>');
    expect(lines[4]).toBe('config:');
    expect(parse(yaml).config['other:region_lke_controller']).toBe('us-east');
  });
});
