/**
 * Environment Check
 *
 * Verifies the client libraries and the Bicep compiler the workflows need
 * before anything touches a remote service.
 */

import fs from 'fs';
import path from 'path';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CommandRunner } from './command-runner.js';

export const REQUIRED_MODULES = [
  '@azure/identity',
  '@azure/arm-resources',
  '@azure/arm-resources-subscriptions',
  '@azure/arm-authorization',
  '@azure/arm-desktopvirtualization',
  '@microsoft/microsoft-graph-client',
] as const;

export type ModuleLoader = (name: string) => Promise<unknown>;

export interface EnvironmentCheckOptions {
  runner: CommandRunner;
  logger: Logger;
  azCommand: string;
  templateDir: string;
  loadModule?: ModuleLoader;
}

export interface EnvironmentReport {
  modules: string[];
  bicepVersion: string | null;
}

/**
 * Bicep is only needed when the template directory holds .bicep files
 */
export function templatesNeedBicep(templateDir: string): boolean {
  if (!fs.existsSync(templateDir)) return false;
  return fs.readdirSync(templateDir).some(file => path.extname(file).toLowerCase() === '.bicep');
}

async function checkModules(loadModule: ModuleLoader, logger: Logger): Promise<string[]> {
  const missing: string[] = [];
  for (const name of REQUIRED_MODULES) {
    try {
      await loadModule(name);
    } catch {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new FatalError(
      'environment',
      `Missing client libraries: ${missing.join(', ')}. They cannot be installed automatically; run "npm install" and try again.`
    );
  }

  logger.success(`Client libraries present (${REQUIRED_MODULES.length})`);
  return [...REQUIRED_MODULES];
}

async function checkBicep(runner: CommandRunner, azCommand: string, logger: Logger): Promise<string> {
  const version = await runner.run(azCommand, ['bicep', 'version']);
  if (version.success) {
    const text = version.stdout.trim();
    logger.success(`Bicep available: ${text}`);
    return text;
  }

  logger.warn('Bicep compiler not found - attempting "az bicep install"');
  const install = await runner.run(azCommand, ['bicep', 'install']);
  if (install.success) {
    throw new FatalError(
      'restart-required',
      'Bicep was installed. Open a new terminal and re-run the tool so the compiler is on the PATH.'
    );
  }

  throw new FatalError(
    'environment',
    `Bicep is missing and could not be installed: ${install.stderr.trim() || 'unknown error'}`
  );
}

export async function checkEnvironment(options: EnvironmentCheckOptions): Promise<EnvironmentReport> {
  const { runner, logger, azCommand, templateDir } = options;
  const loadModule: ModuleLoader = options.loadModule ?? (name => import(name));

  logger.info('Checking environment...');
  const modules = await checkModules(loadModule, logger);

  if (!templatesNeedBicep(templateDir)) {
    logger.info('No .bicep templates found - skipping Bicep check');
    return { modules, bicepVersion: null };
  }

  const bicepVersion = await checkBicep(runner, azCommand, logger);
  return { modules, bicepVersion };
}
