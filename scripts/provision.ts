#!/usr/bin/env tsx
/**
 * Provision Script - KubeSlice on LKE
 *
 * Features:
 * - Stack configuration wizard when no Pulumi.<stack>.yaml exists
 * - Preview, apply and destroy through the Pulumi Automation API
 * - Kubeconfig extraction and merging for every cluster
 * - Cluster connectivity and slice health verification
 * - State backup before destruction
 *
 * Usage:
 *   tsx scripts/provision.ts                          # Provision controller, workers and slice
 *   tsx scripts/provision.ts --preview                # Show what would change
 *   tsx scripts/provision.ts --merge-kubeconfig       # Provision + merge kubeconfigs
 *   tsx scripts/provision.ts --status                 # Check registrations and exports
 *   tsx scripts/provision.ts --destroy                # Destroy everything
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { parseArgs } from 'util';
import { confirm, input } from '@inquirer/prompts';
import {
  ConcurrentUpdateError,
  LocalWorkspace,
  type OutputMap,
  type Stack,
} from '@pulumi/pulumi/automation';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { CONTROLLER_CLUSTER_LABEL } from '@/infra/controller';
import { kubectl } from '@/lib/kubectl';
import {
  kubeconfigPath,
  lkeContextName,
  mergeKubeconfigs,
  removeKubeconfig,
  removeLkeKubeconfigEntries,
  writeKubeconfig,
} from '@/lib/kubeconfig-files';
import { parseStackOutputs, type StackOutputs } from '@/lib/outputs';
import { StackConfigWizard, type WizardFlags } from '@/lib/wizard/index';
import { stackConfigFileName } from '@/lib/wizard/generators';
import { checkKubectl, checkLinodeToken, checkPulumi } from '@/lib/wizard/validators';
import { validateSlice, waitForClusterHealth, type SliceValidationResult } from '@/slice/status';

// ===== Types =====

interface ProvisionConfig {
  stack: string;
  dryRun: boolean;
  autoApprove: boolean;
  mergeKubeconfig: boolean;
  destroy: boolean;
  status: boolean;
  keepKubeconfig: boolean;
}

const PROJECT_DIR = resolve(__dirname, '..');
const BACKUP_DIR = join(PROJECT_DIR, 'backups', 'pulumi-state');

// ===== Provision Class =====

class SliceProvisioner {
  private config: ProvisionConfig;
  private wizardFlags: WizardFlags;
  private stack?: Stack;
  private enterprisePassword?: string;

  constructor(config: ProvisionConfig, wizardFlags: WizardFlags = {}) {
    this.config = config;
    this.wizardFlags = wizardFlags;
  }

  async run() {
    try {
      this.printHeader();

      if (this.config.destroy) {
        await this.destroy();
      } else if (this.config.status) {
        await this.showStatus();
      } else {
        await this.provision();
      }
    } catch (error) {
      console.error(chalk.red('\n✗ Error:'), error instanceof Error ? error.message : error);

      if (error instanceof ConcurrentUpdateError) {
        console.log(chalk.yellow('\nAnother update holds the stack lock.'));
        console.log(chalk.gray(`   If no update is running, clear it with: pulumi cancel --stack ${this.config.stack}`));
      } else if (!this.config.status) {
        console.log(chalk.yellow('\nRe-run the same command to continue; Pulumi resumes from the recorded state.'));
        console.log(chalk.gray('   Registration and sidecar timing issues usually clear on the second run.'));
      }
      process.exit(1);
    }
  }

  // ===== Provision Flow =====

  async provision() {
    console.log(chalk.blue('\n==> Provision Configuration'));
    console.log(`Stack: ${this.config.stack}`);
    console.log(`Merge kubeconfig: ${this.config.mergeKubeconfig}`);
    console.log(`Auto-approve: ${this.config.autoApprove}`);
    console.log(`Dry run: ${this.config.dryRun}`);

    await this.validatePrerequisites();
    await this.ensureStackConfig();
    await this.selectStack();
    await this.applySecrets();
    await this.preview();

    if (!this.config.dryRun) {
      await this.confirmApply();
      await this.up();
      const outputs = await this.readOutputs();
      await this.extractKubeconfigs(outputs);

      if (this.config.mergeKubeconfig) {
        await this.mergeKubeconfigs(outputs);
      }

      await this.verifyConnectivity(outputs);
      await this.waitForRegistrations(outputs);
      this.displayValidation(await this.validate(outputs));
    }

    await this.displayProvisionSummary();
  }

  // ===== Validation =====

  async validatePrerequisites() {
    console.log(chalk.blue('\n==> Step 1: Validate Prerequisites'));

    if (!(await checkPulumi())) {
      throw new Error('pulumi not found in PATH');
    }
    console.log(chalk.green('✓ pulumi found'));

    if (!(await checkKubectl())) {
      throw new Error('kubectl not found in PATH');
    }
    console.log(chalk.green('✓ kubectl found'));

    if (checkLinodeToken()) {
      console.log(chalk.green('✓ LINODE_TOKEN set'));
    } else {
      console.log(chalk.yellow('⚠️  LINODE_TOKEN not set, relying on the linode_token already in stack config'));
    }
  }

  // ===== Stack Configuration =====

  async ensureStackConfig() {
    const fileName = stackConfigFileName(this.config.stack);

    if (existsSync(join(PROJECT_DIR, fileName))) {
      console.log(chalk.green(`✓ Stack configuration found: ${fileName}`));
      return;
    }

    console.log(chalk.yellow(`\n✗ No stack configuration found (${fileName})`));
    console.log(chalk.blue('Launching interactive setup wizard...\n'));

    const wizard = new StackConfigWizard(this.config.stack, PROJECT_DIR, {
      ...this.wizardFlags,
      yes: this.wizardFlags.yes || this.config.autoApprove,
    });
    const result = await wizard.run();
    this.enterprisePassword = result.enterprisePassword;

    if (!existsSync(result.configPath)) {
      throw new Error('Wizard did not create the stack configuration');
    }
  }

  async selectStack(): Promise<Stack> {
    console.log(chalk.blue('\n==> Step 2: Select Stack'));

    const spinner = ora(`Selecting stack ${this.config.stack}...`).start();

    try {
      this.stack = await LocalWorkspace.createOrSelectStack({
        stackName: this.config.stack,
        workDir: PROJECT_DIR,
      });
      spinner.succeed(`Stack selected: ${this.config.stack}`);
      return this.stack;
    } catch (error) {
      spinner.fail('Stack selection failed');
      throw error;
    }
  }

  private requireStack(): Stack {
    if (!this.stack) {
      throw new Error('Stack not selected');
    }
    return this.stack;
  }

  async applySecrets() {
    const stack = this.requireStack();
    const token = process.env.LINODE_TOKEN;

    if (token) {
      await stack.setConfig('linode_token', { value: token, secret: true });
      console.log(chalk.green('✓ linode_token stored as a stack secret'));
    } else {
      const existing = await stack.getAllConfig();
      const key = Object.keys(existing).find((k) => k.endsWith(':linode_token'));
      if (!key) {
        throw new Error('No Linode token: export LINODE_TOKEN or run pulumi config set --secret linode_token');
      }
    }

    const password = this.enterprisePassword ?? process.env.KUBESLICE_ENTERPRISE_PASSWORD;
    if (password) {
      await stack.setConfig('kubeslice_enterprise_password', { value: password, secret: true });
      console.log(chalk.green('✓ kubeslice_enterprise_password stored as a stack secret'));
    }
  }

  // ===== Pulumi Operations =====

  private progress(spinner: Ora) {
    return (out: string) => {
      const line = out.trim().split('\n').pop()?.trim();
      if (line) {
        spinner.text = line.length > 100 ? `${line.slice(0, 97)}...` : line;
      }
    };
  }

  async preview() {
    console.log(chalk.blue('\n==> Step 3: Preview'));

    const spinner = ora('Generating preview...').start();

    try {
      const result = await this.requireStack().preview({ onOutput: this.progress(spinner) });
      spinner.succeed('Preview generated');

      const summary = Object.entries(result.changeSummary)
        .filter(([, count]) => count !== undefined && count > 0)
        .map(([op, count]) => `${count} to ${op}`)
        .join(', ');
      console.log(chalk.cyan(`\nPlan: ${summary || 'no changes'}`));

      const creates = result.changeSummary.create ?? 0;
      if (creates > 0 && (result.changeSummary.same ?? 0) === 0) {
        console.log(chalk.yellow('\n⚠️  This appears to be a first-time provision (expect 20-40 minutes)'));
      }

      if (this.config.dryRun) {
        console.log(chalk.gray('\nDry run: preview only, nothing will be applied'));
      }
    } catch (error) {
      spinner.fail('Preview failed');
      throw error;
    }
  }

  async confirmApply() {
    if (this.config.autoApprove) {
      console.log(chalk.yellow('\n⚠️  Auto-approve enabled, applying changes...'));
      return;
    }

    console.log(chalk.blue('\n==> Confirm Apply'));

    const confirmed = await confirm({
      message: 'Do you want to apply these changes?',
      default: false,
    });

    if (!confirmed) {
      throw new Error('Apply cancelled by user');
    }
  }

  async up() {
    console.log(chalk.blue('\n==> Step 4: Apply'));

    const spinner = ora('Provisioning clusters and installing KubeSlice...').start();

    try {
      const result = await this.requireStack().up({ onOutput: this.progress(spinner) });
      const changes = result.summary.resourceChanges ?? {};
      const changed = Object.entries(changes)
        .filter(([op]) => op !== 'same')
        .reduce((sum, [, count]) => sum + (count ?? 0), 0);
      spinner.succeed(`Infrastructure provisioned (${changed} resource change(s))`);
    } catch (error) {
      spinner.fail('Apply failed');
      throw error;
    }
  }

  async readOutputs(): Promise<StackOutputs> {
    const outputs: OutputMap = await this.requireStack().outputs();
    return parseStackOutputs(outputs);
  }

  // ===== Kubeconfig Management =====

  async extractKubeconfigs(outputs: StackOutputs) {
    console.log(chalk.blue('\n==> Step 5: Extract Kubeconfigs'));

    const spinner = ora('Writing kubeconfigs...').start();

    try {
      const written = [writeKubeconfig(CONTROLLER_CLUSTER_LABEL, outputs.controllerKubeconfig)];
      for (const worker of Object.values(outputs.workerClusters)) {
        written.push(writeKubeconfig(worker.label, worker.kubeconfig));
      }

      spinner.succeed(`Wrote ${written.length} kubeconfig(s)`);
      written.forEach((path) => console.log(chalk.gray(`  ${path}`)));
    } catch (error) {
      spinner.fail('Failed to write kubeconfigs');
      throw error;
    }
  }

  async mergeKubeconfigs(outputs: StackOutputs) {
    console.log(chalk.blue('\n==> Step 6: Merge Kubeconfigs'));

    const spinner = ora('Merging kubeconfigs into ~/.kube/config...').start();
    const labels = [CONTROLLER_CLUSTER_LABEL, ...Object.values(outputs.workerClusters).map((w) => w.label)];

    try {
      const backupPath = await mergeKubeconfigs(labels.map(kubeconfigPath));
      spinner.succeed('Kubeconfigs merged');
      if (backupPath) {
        console.log(chalk.gray(`Backup created: ${backupPath}`));
      }
      console.log(chalk.gray(`Controller context: ${lkeContextName(outputs.controllerClusterId)}`));
    } catch (error) {
      spinner.fail('Failed to merge kubeconfigs');
      throw error;
    }
  }

  async verifyConnectivity(outputs: StackOutputs) {
    console.log(chalk.blue('\n==> Step 7: Verify Connectivity'));

    const labels = [CONTROLLER_CLUSTER_LABEL, ...Object.values(outputs.workerClusters).map((w) => w.label)];

    for (const label of labels) {
      const spinner = ora(`Testing ${label}...`).start();

      try {
        const nodes = await kubectl(['get', 'nodes', '--no-headers'], { kubeconfigPath: kubeconfigPath(label) });
        const lines = nodes.trim().split('\n').filter(Boolean);
        const ready = lines.filter((line) => /\sReady\s/.test(line)).length;
        spinner.succeed(`${label}: ${ready}/${lines.length} node(s) Ready`);
      } catch (error) {
        spinner.fail(`${label} is not reachable`);
        throw error;
      }
    }
  }

  // ===== Slice Status =====

  async waitForRegistrations(outputs: StackOutputs) {
    console.log(chalk.blue('\n==> Step 8: Wait for Worker Registration'));

    for (const worker of Object.values(outputs.workerClusters)) {
      const spinner = ora(`Waiting for ${worker.label} to report Normal health...`).start();
      const status = await waitForClusterHealth(
        worker.label,
        outputs.projectNamespace,
        kubeconfigPath(CONTROLLER_CLUSTER_LABEL)
      );

      if (status.registered && status.healthy) {
        spinner.succeed(`${worker.label} registered`);
      } else {
        spinner.warn(`${worker.label}: ${status.errorMessage ?? 'not healthy yet'}`);
      }
    }
  }

  async validate(outputs: StackOutputs): Promise<SliceValidationResult> {
    console.log(chalk.blue('\n==> Step 9: Verify Slice'));

    const spinner = ora('Checking registrations, slice and service exports...').start();

    const result = await validateSlice({
      controllerKubeconfigPath: kubeconfigPath(CONTROLLER_CLUSTER_LABEL),
      projectNamespace: outputs.projectNamespace,
      sliceName: outputs.sliceName,
      applicationNamespace: outputs.applicationNamespace,
      workers: Object.values(outputs.workerClusters).map((worker) => ({
        label: worker.label,
        kubeconfigPath: kubeconfigPath(worker.label),
        exportsServices: worker.applicationBackend,
      })),
    });

    if (result.success) {
      spinner.succeed('Slice is healthy');
    } else {
      spinner.warn(`Slice has ${result.errorCount} issue(s)`);
    }

    return result;
  }

  displayValidation(result: SliceValidationResult) {
    console.log(chalk.blue('\nRegistered Clusters:'));
    for (const cluster of result.clusters) {
      const mark = cluster.registered && cluster.healthy ? chalk.green('✓') : chalk.red('✗');
      const detail = cluster.errorMessage ? chalk.gray(` (${cluster.errorMessage})`) : '';
      console.log(`  ${mark} ${cluster.name}${detail}`);
    }

    const slice = result.sliceConfig;
    console.log(chalk.blue('\nSlice:'));
    if (slice.exists) {
      console.log(`  ${chalk.green('✓')} ${slice.name}: ${slice.clusters.join(', ')}`);
    } else {
      console.log(`  ${chalk.red('✗')} ${slice.name}${chalk.gray(` (${slice.errorMessage ?? 'not found'})`)}`);
    }

    if (result.serviceExports.length > 0) {
      console.log(chalk.blue('\nService Exports:'));
      for (const serviceExport of result.serviceExports) {
        const mark = serviceExport.ready ? chalk.green('✓') : chalk.yellow('…');
        console.log(
          `  ${mark} ${serviceExport.name} on ${serviceExport.cluster}: ` +
            `${serviceExport.exportStatus ?? (serviceExport.errorMessage ? 'MISSING' : 'PENDING')}, ` +
            `${serviceExport.availableEndpoints} endpoint(s)` +
            (serviceExport.errorMessage ? chalk.gray(` (${serviceExport.errorMessage})`) : '')
        );
      }
    }
  }

  async showStatus() {
    console.log(chalk.blue('\n==> Slice Status'));

    await this.selectStack();
    const outputs = await this.readOutputs();
    await this.extractKubeconfigs(outputs);

    const result = await this.validate(outputs);
    this.displayValidation(result);

    if (!result.success) {
      throw new Error(`Slice has ${result.errorCount} issue(s)`);
    }
  }

  async displayProvisionSummary() {
    console.log(chalk.blue('\n==> Provision Summary'));

    if (this.config.dryRun) {
      console.log(chalk.yellow('Dry run completed - no changes applied'));
      return;
    }

    try {
      const outputs = await this.readOutputs();
      console.log(chalk.blue('\nStack Outputs:'));
      console.log(`  ${chalk.cyan('controllerClusterId')}: ${outputs.controllerClusterId}`);
      for (const [name, worker] of Object.entries(outputs.workerClusters)) {
        console.log(`  ${chalk.cyan(name)}: ${worker.label} (${worker.region}, id ${worker.id})`);
      }
      console.log(`  ${chalk.cyan('projectNamespace')}: ${outputs.projectNamespace}`);
      console.log(`  ${chalk.cyan('sliceName')}: ${outputs.sliceName}`);
    } catch {
      console.log(chalk.yellow('Could not fetch stack outputs'));
    }

    console.log(chalk.blue('\n==> Next Steps'));
    console.log(`1. Controller: export KUBECONFIG=${kubeconfigPath(CONTROLLER_CLUSTER_LABEL)}`);
    console.log(`2. Slice health: npm run status -- --stack ${this.config.stack}`);
    console.log('3. Product page: kubectl get svc productpage -n bookinfo (on the frontend worker)');
  }

  // ===== Destroy Flow =====

  async destroy() {
    console.log(chalk.red('\n==> Stack Destruction'));
    console.log(chalk.yellow('⚠️  This will destroy the controller, every worker cluster and the slice\n'));

    await this.validatePrerequisites();
    await this.selectStack();
    const resourceCount = await this.showDestroyPlan();

    if (resourceCount === 0) {
      console.log(chalk.yellow('\nNothing to destroy'));
      return;
    }

    if (!this.config.dryRun) {
      let outputs: StackOutputs | undefined;
      try {
        outputs = await this.readOutputs();
      } catch {
        outputs = undefined;
      }

      await this.confirmDestruction();
      await this.backupState();
      await this.pulumiDestroy();

      if (!this.config.keepKubeconfig && outputs) {
        await this.cleanupKubeconfigs(outputs);
      }
    }

    this.displayDestroySummary();
  }

  async showDestroyPlan(): Promise<number> {
    console.log(chalk.blue('\n==> Destroy Plan'));

    const spinner = ora('Reading stack state...').start();

    try {
      const state: unknown = (await this.requireStack().exportStack()).deployment;
      const resources =
        typeof state === 'object' && state !== null && 'resources' in state && Array.isArray(state.resources)
          ? state.resources.length
          : 0;

      spinner.succeed('Stack state read');
      console.log(chalk.red(`\nResources to destroy: ${resources}`));

      if (this.config.dryRun) {
        console.log(chalk.gray('\nDry run: nothing will be destroyed'));
      }

      return resources;
    } catch (error) {
      spinner.fail('Could not read stack state');
      throw error;
    }
  }

  async confirmDestruction() {
    if (this.config.autoApprove) {
      console.log(chalk.yellow('\n⚠️  Auto-approve enabled, destroying...'));
      return;
    }

    console.log(chalk.red('\n==> Confirmation Required'));
    console.log(chalk.yellow('⚠️  This action is IRREVERSIBLE'));
    console.log(chalk.yellow('⚠️  All clusters and their workloads will be permanently deleted\n'));

    const stackName = this.config.stack;

    // First confirmation: Type stack name
    await input({
      message: `Type the stack name '${chalk.red(stackName)}' to confirm:`,
      validate: (val) => val === stackName || `Must type exactly: ${stackName}`,
    });

    // Second confirmation: Type DESTROY
    await input({
      message: `Type ${chalk.red('DESTROY')} to proceed:`,
      validate: (val) => val === 'DESTROY' || 'Must type exactly: DESTROY',
    });

    console.log(chalk.red('\n⚠️  Proceeding with destruction...'));
  }

  async backupState() {
    console.log(chalk.blue('\n==> Backing Up State'));

    const spinner = ora('Exporting stack state...').start();

    try {
      const state = await this.requireStack().exportStack();
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const backupFile = join(BACKUP_DIR, `${this.config.stack}-${timestamp}.json`);

      mkdirSync(BACKUP_DIR, { recursive: true });
      writeFileSync(backupFile, JSON.stringify(state, null, 2), { mode: 0o600 });

      spinner.succeed(`State backed up: ${backupFile}`);
    } catch (error) {
      spinner.warn(`State backup failed (continuing anyway): ${error instanceof Error ? error.message : error}`);
    }
  }

  async pulumiDestroy() {
    console.log(chalk.blue('\n==> Destroying Infrastructure'));

    const spinner = ora('Running pulumi destroy...').start();

    try {
      await this.requireStack().destroy({ onOutput: this.progress(spinner) });
      spinner.succeed('Infrastructure destroyed successfully');
    } catch (error) {
      spinner.fail('Pulumi destroy failed');
      console.log(chalk.yellow(`\n⚠️  Check state backup in ${BACKUP_DIR}`));
      throw error;
    }
  }

  async cleanupKubeconfigs(outputs: StackOutputs) {
    console.log(chalk.blue('\n==> Cleaning Up Kubeconfigs'));

    const clusters = [
      { label: CONTROLLER_CLUSTER_LABEL, id: outputs.controllerClusterId },
      ...Object.values(outputs.workerClusters).map((w) => ({ label: w.label, id: w.id })),
    ];

    for (const cluster of clusters) {
      if (removeKubeconfig(cluster.label)) {
        console.log(chalk.green(`✓ Removed: ${kubeconfigPath(cluster.label)}`));
      }
    }

    if (!this.config.mergeKubeconfig) {
      return;
    }

    const removeContexts = this.config.autoApprove || (await confirm({
      message: 'Remove the clusters\' entries from ~/.kube/config?',
      default: true,
    }));

    if (removeContexts) {
      for (const cluster of clusters) {
        const removed = await removeLkeKubeconfigEntries(cluster.id);
        if (removed.length > 0) {
          console.log(chalk.green(`✓ Removed from ~/.kube/config: ${removed.join(', ')}`));
        }
      }
    }
  }

  displayDestroySummary() {
    console.log(chalk.blue('\n==> Destruction Summary'));

    if (this.config.dryRun) {
      console.log(chalk.yellow('Dry run completed - no resources destroyed'));
      return;
    }

    console.log(chalk.green('✓ Stack infrastructure destroyed'));
    console.log(chalk.gray(`\nState backup location: ${BACKUP_DIR}`));

    if (this.config.keepKubeconfig) {
      console.log(chalk.yellow(`\nKubeconfigs preserved in ${kubeconfigPath('')}`));
    }
  }

  // ===== Utility =====

  printHeader() {
    const title = this.config.destroy ? 'Slice Destruction' : this.config.status ? 'Slice Status' : 'Slice Provisioning';
    console.log(chalk.bold.blue('\n╔════════════════════════════════════════╗'));
    console.log(chalk.bold.blue(`║  ${title.padEnd(36)} ║`));
    console.log(chalk.bold.blue('╚════════════════════════════════════════╝\n'));
  }
}

// ===== CLI Parsing =====

function printHelp() {
  console.log(`
${chalk.bold('KubeSlice on LKE Provisioning')}

${chalk.bold('USAGE:')}
  tsx scripts/provision.ts [OPTIONS]

${chalk.bold('PREREQUISITES:')}
  pulumi and kubectl in PATH, a Pulumi backend (${chalk.cyan('pulumi login')}), and
  ${chalk.cyan('export LINODE_TOKEN=...')}

${chalk.bold('OPTIONS:')}
  ${chalk.cyan('--help')}                    Show this help message
  ${chalk.cyan('--stack <name>')}            Pulumi stack (default: dev)
  ${chalk.cyan('--preview, --dry-run')}      Preview changes without executing
  ${chalk.cyan('--auto-approve, --yes')}     Skip confirmation prompts
  ${chalk.cyan('--merge-kubeconfig')}        Merge kubeconfigs into ~/.kube/config
  ${chalk.cyan('--status')}                  Check registrations, slice and service exports

  ${chalk.bold('Destroy Options:')}
  ${chalk.cyan('--destroy')}                 Destroy every cluster in the stack
  ${chalk.cyan('--keep-kubeconfig')}         Don't remove kubeconfig files (destroy mode)

  ${chalk.bold('Wizard Automation (bypass interactive prompts):')}
  ${chalk.cyan('--controller-region <r>')}   Controller cluster region
  ${chalk.cyan('--lke-version <v>')}         Kubernetes version (default: 1.31)
  ${chalk.cyan('--workers <list>')}          Worker clusters as name:region[,name:region]
  ${chalk.cyan('--enterprise')}              Use the KubeSlice enterprise edition

${chalk.bold('EXAMPLES:')}
  ${chalk.gray('# Provision with the interactive wizard')}
  tsx scripts/provision.ts

  ${chalk.gray('# Two workers, no prompts')}
  tsx scripts/provision.ts --controller-region us-east --workers worker-1:us-ord,worker-2:eu-central --yes

  ${chalk.gray('# Preview only')}
  tsx scripts/provision.ts --preview

  ${chalk.gray('# Destroy (interactive)')}
  tsx scripts/provision.ts --destroy
`);
}

function parseCliArgs(): { config: ProvisionConfig; wizardFlags: WizardFlags } {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: 'boolean', default: false },
      stack: { type: 'string', default: 'dev' },
      preview: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      'auto-approve': { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false }, // Alias for auto-approve
      'merge-kubeconfig': { type: 'boolean', default: false },
      status: { type: 'boolean', default: false },
      destroy: { type: 'boolean', default: false },
      'keep-kubeconfig': { type: 'boolean', default: false },
      // Wizard flags
      'controller-region': { type: 'string' },
      'lke-version': { type: 'string' },
      workers: { type: 'string' },
      enterprise: { type: 'boolean' },
    },
    strict: true,
  });

  if (values.help) {
    printHelp();
    process.exit(0);
  }

  const autoApprove = values['auto-approve'] || values.yes || false;

  return {
    config: {
      stack: values.stack ?? 'dev',
      dryRun: values.preview || values['dry-run'] || false,
      autoApprove,
      mergeKubeconfig: values['merge-kubeconfig'] || false,
      destroy: values.destroy || false,
      status: values.status || false,
      keepKubeconfig: values['keep-kubeconfig'] || false,
    },
    wizardFlags: {
      controllerRegion: values['controller-region'],
      lkeVersion: values['lke-version'],
      workers: values.workers,
      enterprise: values.enterprise,
      yes: autoApprove,
    },
  };
}

// ===== Main =====

async function main() {
  const { config, wizardFlags } = parseCliArgs();
  const provisioner = new SliceProvisioner(config, wizardFlags);
  await provisioner.run();
}

main().catch((error) => {
  console.error(chalk.red('\n✗ Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
