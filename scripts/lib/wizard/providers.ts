// Linode Regions, Node Types and Setup Instructions

export interface RegionOption {
  value: string;
  label: string;
}

export interface NodeTypeOption {
  value: string;
  label: string;
  hint: string;
}

export interface SetupInstructions {
  title: string;
  steps: string[];
  docs?: string;
}

export const LKE_VERSIONS = ['1.31', '1.32', '1.33'];

export const LINODE_REGIONS: RegionOption[] = [
  { value: 'us-east', label: 'Newark, NJ (us-east)' },
  { value: 'us-central', label: 'Dallas, TX (us-central)' },
  { value: 'us-west', label: 'Fremont, CA (us-west)' },
  { value: 'us-southeast', label: 'Atlanta, GA (us-southeast)' },
  { value: 'us-ord', label: 'Chicago, IL (us-ord)' },
  { value: 'us-sea', label: 'Seattle, WA (us-sea)' },
  { value: 'ca-central', label: 'Toronto, CA (ca-central)' },
  { value: 'eu-west', label: 'London, UK (eu-west)' },
  { value: 'eu-central', label: 'Frankfurt, DE (eu-central)' },
  { value: 'fr-par', label: 'Paris, FR (fr-par)' },
  { value: 'nl-ams', label: 'Amsterdam, NL (nl-ams)' },
  { value: 'ap-south', label: 'Singapore (ap-south)' },
  { value: 'ap-northeast', label: 'Tokyo, JP (ap-northeast)' },
  { value: 'ap-southeast', label: 'Sydney, AU (ap-southeast)' },
  { value: 'ap-west', label: 'Mumbai, IN (ap-west)' },
];

export const NODE_TYPES: NodeTypeOption[] = [
  { value: 'g6-standard-1', label: 'Linode 2 GB', hint: '1 CPU, 2 GB RAM' },
  { value: 'g6-standard-2', label: 'Linode 4 GB', hint: '2 CPU, 4 GB RAM' },
  { value: 'g6-standard-4', label: 'Linode 8 GB', hint: '4 CPU, 8 GB RAM' },
  { value: 'g6-standard-6', label: 'Linode 16 GB', hint: '6 CPU, 16 GB RAM' },
  { value: 'g6-dedicated-2', label: 'Dedicated 4 GB', hint: '2 dedicated CPU, 4 GB RAM' },
  { value: 'g6-dedicated-4', label: 'Dedicated 8 GB', hint: '4 dedicated CPU, 8 GB RAM' },
];

export const PREREQUISITE_INSTRUCTIONS: Record<'linode' | 'pulumi' | 'kubectl', SetupInstructions> = {
  linode: {
    title: 'Linode Token Setup',
    steps: [
      '1. Visit: https://cloud.linode.com/profile/tokens',
      '2. Create a personal access token with read/write on Kubernetes and Linodes',
      '3. Export token:',
      '   export LINODE_TOKEN=your_token',
    ],
    docs: 'https://techdocs.akamai.com/linode-api/reference/get-started',
  },
  pulumi: {
    title: 'Pulumi CLI',
    steps: [
      '1. Install: curl -fsSL https://get.pulumi.com | sh',
      '2. Log in to a backend:',
      '   pulumi login            (Pulumi Cloud)',
      '   pulumi login --local    (state on this machine)',
    ],
    docs: 'https://www.pulumi.com/docs/install/',
  },
  kubectl: {
    title: 'kubectl',
    steps: ['1. Install kubectl matching the LKE version', '   brew install kubectl (macOS)'],
    docs: 'https://kubernetes.io/docs/tasks/tools/',
  },
};
