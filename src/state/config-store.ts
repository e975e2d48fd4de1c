import fs from 'fs/promises';
import path from 'path';
import type { Logger } from '../utils/logger.js';
import { errorCodeOf, errorMessageOf } from '../utils/errors.js';
import { parseDeploymentConfig, type DeploymentConfig } from './deployment-config.js';

export type ConfigLoadStatus = 'missing' | 'loaded' | 'malformed';

export interface ConfigLoadResult {
  status: ConfigLoadStatus;
  config: DeploymentConfig | null;
}

/**
 * Reads and writes the resumable deployment configuration file
 */
export class ConfigStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Load the previous run's record. A file that cannot be parsed is treated as
   * "no prior config" rather than an error.
   */
  async load(): Promise<ConfigLoadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        return { status: 'missing', config: null };
      }
      this.logger.warn(`Could not read ${this.filePath}: ${errorMessageOf(error)} - continuing without previous configuration`);
      return { status: 'malformed', config: null };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Configuration file ${this.filePath} is not valid JSON (${errorMessageOf(error)}) - ignoring it`);
      return { status: 'malformed', config: null };
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      this.logger.warn(`Configuration file ${this.filePath} does not contain an object - ignoring it`);
      return { status: 'malformed', config: null };
    }

    const { config, droppedFields } = parseDeploymentConfig(raw);
    if (droppedFields.length > 0) {
      this.logger.warn(`Ignoring invalid saved values: ${droppedFields.join(', ')}`);
    }

    this.logger.info(`Loaded previous configuration from ${this.filePath}`);
    return { status: 'loaded', config };
  }

  /**
   * Persist the record, stamping the save time
   */
  async save(config: DeploymentConfig): Promise<DeploymentConfig> {
    const record: DeploymentConfig = { ...config, savedAt: this.now().toISOString() };

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(record, null, 2) + '\n', 'utf-8');

    this.logger.success(`Saved deployment configuration to ${this.filePath}`);
    return record;
  }
}
