// Stack Configuration Wizard - Main Orchestrator

import { existsSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { confirm, intro, note, outro } from '@clack/prompts';
import ora from 'ora';
import { parseStackConfig, type StackConfigDocument } from '@/infra/config';
import { ensureAnswered, logError, logInfo, logSuccess } from '@/lib/prompts';
import { PREREQUISITE_INSTRUCTIONS } from './providers';
import {
  collectControllerConfig,
  collectEnterpriseConfig,
  collectWorkerClusters,
} from './collectors';
import { generateStackConfigYaml, stackConfigFileName } from './generators';
import { checkPrerequisites } from './validators';

export interface WizardFlags {
  controllerRegion?: string;
  lkeVersion?: string;
  /** name:region[,name:region...] */
  workers?: string;
  enterprise?: boolean;
  /** Accept defaults for everything not given as a flag */
  yes?: boolean;
}

export interface WizardResult {
  configPath: string;
  document: StackConfigDocument;
  /** To be stored as the kubeslice_enterprise_password secret */
  enterprisePassword?: string;
}

export class StackConfigWizard {
  private stack: string;
  private projectDir: string;
  private flags: WizardFlags;

  constructor(stack: string, projectDir: string, flags: WizardFlags = {}) {
    this.stack = stack;
    this.projectDir = projectDir;
    this.flags = flags;
  }

  /**
   * Run the interactive stack configuration wizard
   */
  async run(): Promise<WizardResult> {
    intro(`Stack Configuration Wizard (${this.stack})`);

    try {
      // Step 1: Check prerequisites (with warnings, not blocking)
      await this.checkPrerequisites();

      // Step 2: Collect configuration
      const controller = await collectControllerConfig(this.flags);
      const workers = await collectWorkerClusters(this.flags);
      const enterprise = await collectEnterpriseConfig(this.flags);

      const { password: enterprisePassword, ...enterpriseSettings } = enterprise;
      const document: StackConfigDocument = {
        ...controller,
        worker_clusters: workers,
        kubeslice_enterprise: enterpriseSettings,
      };

      // Step 3: Validate before anything is written
      parseStackConfig(document, { enterprisePassword });

      // Step 4: Write Pulumi.<stack>.yaml
      const configPath = await this.writeStackConfig(document);

      note(this.getNextSteps().join('\n'), 'Setup Complete');
      outro('Configuration ready');

      return { configPath, document, enterprisePassword };
    } catch (error) {
      if (error instanceof Error) {
        if (error.message.includes('cancelled')) {
          outro('Setup cancelled');
        } else {
          logError(error.message);
        }
      }
      throw error;
    }
  }

  /**
   * Step 1: Check provisioning prerequisites
   */
  private async checkPrerequisites(): Promise<void> {
    const spinner = ora('Checking prerequisites...').start();
    const missing = await checkPrerequisites();

    if (missing.length === 0) {
      spinner.succeed('Prerequisites check passed');
      return;
    }

    spinner.warn('Prerequisites check completed with warnings');

    for (const item of missing) {
      const instructions = PREREQUISITE_INSTRUCTIONS[item];
      note(instructions.steps.join('\n'), instructions.title);
      if (instructions.docs) {
        logInfo(`Documentation: ${instructions.docs}`);
      }
    }

    if (this.flags.yes) {
      return;
    }

    const shouldContinue = ensureAnswered(
      await confirm({
        message: 'Continue anyway?',
        initialValue: true,
      }),
      'Setup'
    );

    if (!shouldContinue) {
      throw new Error('Setup cancelled');
    }
  }

  /**
   * Step 4: Write the stack configuration file, backing up an existing one
   */
  private async writeStackConfig(document: StackConfigDocument): Promise<string> {
    const configPath = join(this.projectDir, stackConfigFileName(this.stack));

    if (existsSync(configPath)) {
      const shouldOverwrite = this.flags.yes
        ? true
        : ensureAnswered(
            await confirm({
              message: `${stackConfigFileName(this.stack)} already exists. Overwrite?`,
              initialValue: false,
            }),
            'Setup'
          );

      if (!shouldOverwrite) {
        throw new Error(`Setup cancelled - ${stackConfigFileName(this.stack)} exists`);
      }

      const backupPath = `${configPath}.backup.${Date.now()}`;
      renameSync(configPath, backupPath);
      logInfo(`Existing configuration backed up to ${backupPath}`);
    }

    writeFileSync(configPath, generateStackConfigYaml(document));
    logSuccess(`Configuration written to ${configPath}`);

    return configPath;
  }

  private getNextSteps(): string[] {
    return [
      `1. Review ${stackConfigFileName(this.stack)}`,
      '2. Ensure LINODE_TOKEN is exported (it is stored as a Pulumi secret)',
      '3. Provision: npm run provision',
      '',
      'After provisioning:',
      '- Check the slice: npm run status',
      '- Re-run provision if a step timed out; Pulumi picks up where it stopped',
    ];
  }
}
