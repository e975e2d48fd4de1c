#!/usr/bin/env node

import dotenv from 'dotenv';
import { SessionManager } from './auth/session-manager.js';
import { createAzureClients } from './clients/azure-clients.js';
import { ExecFileRunner } from './environment/command-runner.js';
import { chooseFromList } from './prompts/menu.js';
import { InquirerPrompter, type Prompter } from './prompts/prompter.js';
import { ProvisioningOrchestrator } from './provisioning/orchestrator.js';
import {
  SessionHostWorkflow,
  type SessionHostWorkflowOptions,
} from './session-hosts/session-host-workflow.js';
import { loadSettings, MAX_HOST_CONCURRENCY, parseDeviceTagScope, type AppSettings } from './settings.js';
import { ConfigStore } from './state/config-store.js';
import { CancellationToken } from './utils/cancellation.js';
import { CancelledError, FatalError, formatErrorMessage } from './utils/errors.js';
import { initializeLogger, Logger } from './utils/logger.js';

dotenv.config();

export type WorkflowChoice = 'full' | 'session-hosts';

export interface CliOptions {
  command?: 'help' | 'logout';
  workflow?: WorkflowChoice;
  configPath?: string;
  templateDir?: string;
  hostsCsv?: string;
  concurrency?: number;
  deviceTagScope?: string;
  manualNetwork: boolean;
  auth: boolean;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    manualNetwork: false,
    auth: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--full':
        options.workflow = 'full';
        break;
      case '--session-hosts':
        options.workflow = 'session-hosts';
        break;
      case '--config':
        options.configPath = requireValue(args, ++i, arg);
        break;
      case '--templates':
        options.templateDir = requireValue(args, ++i, arg);
        break;
      case '--hosts-csv':
        options.hostsCsv = requireValue(args, ++i, arg);
        break;
      case '--concurrency': {
        const value = parseInt(requireValue(args, ++i, arg), 10);
        if (Number.isNaN(value) || value < 1 || value > MAX_HOST_CONCURRENCY) {
          throw new Error(`--concurrency must be between 1 and ${MAX_HOST_CONCURRENCY}`);
        }
        options.concurrency = value;
        break;
      }
      case '--device-tag-scope':
        options.deviceTagScope = requireValue(args, ++i, arg);
        break;
      case '--manual-network':
        options.manualNetwork = true;
        break;
      case '--auth':
        options.auth = true;
        break;
      case '--logout':
        options.command = 'logout';
        break;
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export function applyCliOptions(settings: AppSettings, options: CliOptions): AppSettings {
  return {
    ...settings,
    ...(options.configPath && { configPath: options.configPath }),
    ...(options.templateDir && { templateDir: options.templateDir }),
    ...(options.concurrency && { hostConcurrency: options.concurrency }),
    ...(options.deviceTagScope && { deviceTagScope: parseDeviceTagScope(options.deviceTagScope) }),
  };
}

function printHelp(): void {
  console.log(`
Privileged Access Workstation (AVD) Provisioning Tool

Usage: npm run provision [options]

Workflows:
  Full deployment     Core infrastructure (host pool, workspace, application group,
                      network, storage), RBAC and conditional access, then optionally
                      session hosts
  Session hosts only  Personal session hosts for 1-4 users on an existing host pool

Options:
  --full                    Run the full deployment without the menu
  --session-hosts           Run the session-hosts-only workflow without the menu
  --config <path>           Deployment record (default: config/deployment-config.json)
  --templates <dir>         Template directory (default: templates)
  --hosts-csv <path>        Read session host users from CSV (firstName,lastName,upn,roles)
  --concurrency <n>         Session hosts deployed in parallel, 1-${MAX_HOST_CONCURRENCY} (default: 1)
  --device-tag-scope <s>    resource-group-prefix (default) or batch-vm-names
  --manual-network          Type the virtual network and subnet instead of discovering them
  --auth                    Force re-authentication (ignore cached tokens)
  --logout                  Clear cached tokens
  --help, -h                Show this help message

Authentication:
  Each service (resource manager, directory, virtual desktop) signs in once in the
  browser; tokens are cached in ~/.paw-provision/ for later runs. Set
  AZURE_CLIENT_SECRET to sign in as an application instead.

Examples:
  npm run provision                                   # Choose from the menu
  npm run provision -- --full                         # Core deployment
  npm run provision -- --session-hosts --hosts-csv config/hosts.csv
  npm run provision -- --session-hosts --concurrency 4
`);
}

async function chooseWorkflow(prompter: Prompter, retryLimit: number): Promise<WorkflowChoice | null> {
  const choice = await chooseFromList(prompter, {
    title: 'What would you like to do?',
    items: ['full', 'session-hosts', 'exit'] as const,
    label: item => {
      switch (item) {
        case 'full':
          return 'Full deployment';
        case 'session-hosts':
          return 'Session hosts only';
        case 'exit':
          return 'Exit';
      }
    },
    retryLimit,
  });
  if (choice.action !== 'selected' || choice.value === 'exit') return null;
  return choice.value;
}

let activeLogger: Logger | undefined;

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.command === 'help') {
    printHelp();
    return;
  }

  const settings = applyCliOptions(loadSettings(), options);

  if (options.command === 'logout') {
    const sessions = new SessionManager({
      tenantId: settings.tenantId,
      clientId: settings.clientId,
      cacheDir: settings.tokenCacheDir,
      logger: new Logger('core', { fileEnabled: false }),
    });
    sessions.logout();
    console.log('\n✅ Logged out successfully. Run provision again to re-authenticate.\n');
    return;
  }

  const prompter = new InquirerPrompter();
  const workflow = options.workflow ?? await chooseWorkflow(prompter, settings.promptRetryLimit);
  if (!workflow) return;

  const cancellation = CancellationToken.fromProcessSignals();
  const logger = await initializeLogger(workflow === 'full' ? 'core' : 'session-host', settings.logDir);
  activeLogger = logger;

  const sessions = new SessionManager({
    tenantId: settings.tenantId,
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    cacheDir: settings.tokenCacheDir,
    forceRefresh: options.auth,
    logger,
  });
  const clients = createAzureClients(sessions);
  const runner = new ExecFileRunner();
  const configStore = new ConfigStore(settings.configPath, logger);

  const hostOptions: SessionHostWorkflowOptions = {
    credentialSource: settings.keyVaultUrl ? 'key-vault' : 'prompt',
    networkSource: options.manualNetwork ? 'manual' : 'discover',
    hostsCsv: options.hostsCsv,
  };

  if (workflow === 'session-hosts') {
    const hosts = new SessionHostWorkflow(
      { settings, prompter, logger, clients, sessions, configStore, runner, cancellation },
      hostOptions
    );
    await hosts.run();
    return;
  }

  const orchestrator = new ProvisioningOrchestrator({
    settings,
    prompter,
    logger,
    clients,
    sessions,
    configStore,
    runner,
    cancellation,
    sessionHosts: {
      async runForDeployment(config) {
        const hostLogger = new Logger('session-host', { logDir: settings.logDir });
        await hostLogger.initialize();
        const hosts = new SessionHostWorkflow(
          { settings, prompter, logger: hostLogger, clients, sessions, configStore, runner, cancellation },
          hostOptions
        );
        return hosts.runForDeployment(config);
      },
    },
  });

  const report = await orchestrator.run();
  if (report.result.status === 'stopped') {
    console.error(`\n❌ Deployment stopped at ${report.result.stage}: ${report.result.reason}\n`);
    process.exitCode = 1;
  } else {
    console.log('\n✅ Core deployment complete\n');
  }
}

async function reportFailure(error: unknown): Promise<void> {
  const message = formatErrorMessage(error);
  if (activeLogger) {
    activeLogger.error(message);
    await activeLogger.flush();
  }

  if (error instanceof CancelledError) {
    console.error('\n⚠️  Cancelled\n');
    process.exitCode = 130;
    return;
  }

  if (error instanceof FatalError && error.kind === 'restart-required') {
    console.error(`\n⚠️  ${error.message}\n`);
  } else {
    console.error(`\n❌ Error: ${message}\n`);
  }
  process.exitCode = 1;
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(reportFailure).finally(() => {
    // inquirer and the SIGINT handler keep the event loop alive
    process.exit();
  });
}
