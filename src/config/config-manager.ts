/**
 * Configuration manager base: JSON file with defaults, field-level
 * validation and environment variable overrides
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { Logger } from '../utils/logger';
import { FieldReader, formatIssues, isRecord } from '../utils/validation';
import { MonitoringError, ErrorCategory, ErrorSeverity, errorMessage } from '../error-handling';

export interface EnvBinding {
  variable: string;
  path: readonly string[];
  type: 'string' | 'number' | 'list';
}

type Document = Record<string, unknown>;

function setPath(target: Document, fieldPath: readonly string[], value: unknown): Document {
  const [head, ...rest] = fieldPath;
  if (head === undefined) {
    return target;
  }
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

export class ConfigurationError extends MonitoringError {
  public readonly fieldErrors: string[];

  constructor(message: string, fieldErrors: string[] = []) {
    super(message, ErrorCategory.CONFIGURATION, ErrorSeverity.HIGH, 'ConfigManager', undefined, { fieldErrors });
    this.name = 'ConfigurationError';
    this.fieldErrors = fieldErrors;
  }
}

export abstract class ConfigManager<T> extends EventEmitter {
  protected logger: Logger;
  private configPath: string;
  private backupPath: string;
  private currentConfig: T | null = null;

  constructor(
    defaultPath: string,
    configPath?: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    super();
    this.logger = new Logger('ConfigManager');
    this.configPath = configPath || env.CONFIG_PATH || defaultPath;
    this.backupPath = this.configPath + '.backup';
  }

  abstract getDefaultConfig(): T;

  /**
   * Build the typed configuration, recording every invalid field on the reader
   */
  protected abstract parse(reader: FieldReader): T;

  protected abstract envBindings(): readonly EnvBinding[];

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load the file (creating it with defaults when missing), then apply
   * environment overrides. Overrides are never written back.
   */
  async loadConfig(): Promise<T> {
    this.logger.info(`Loading configuration from ${this.configPath}`);

    let document: Document;
    if (!(await this.fileExists(this.configPath))) {
      this.logger.info('Config file not found, creating default configuration');
      const defaults = this.getDefaultConfig();
      await this.saveConfig(defaults);
      document = this.toDocument(defaults);
    } else {
      document = await this.readDocument();
    }

    const config = this.validateConfig(this.applyEnvironment(document));
    this.currentConfig = config;
    this.logger.info('Configuration loaded and validated successfully');
    return config;
  }

  async saveConfig(config: T): Promise<void> {
    const validatedConfig = this.validateConfig(this.toDocument(config));

    try {
      // Create backup of existing config if it exists
      if (await this.fileExists(this.configPath)) {
        await this.createBackup();
      }

      await fs.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(validatedConfig, null, 2), 'utf-8');
    } catch (error) {
      this.logger.error('Failed to save configuration:', error);
      throw new ConfigurationError(`Configuration saving failed: ${errorMessage(error)}`);
    }

    this.currentConfig = validatedConfig;
    this.logger.info('Configuration saved successfully');
    this.emit('configChanged', validatedConfig);
  }

  getCurrentConfig(): T | null {
    return this.currentConfig;
  }

  /**
   * @throws ConfigurationError listing every invalid field
   */
  validateConfig(raw: unknown): T {
    const reader = FieldReader.from(raw);
    const config = this.parse(reader);

    if (!reader.valid) {
      const fieldErrors = formatIssues(reader.issues);
      throw new ConfigurationError(`Configuration validation failed: ${fieldErrors.join('; ')}`, fieldErrors);
    }
    return config;
  }

  /**
   * Overlay environment variables on a raw document. Empty variables are
   * ignored; unparsable numbers are logged and ignored.
   */
  applyEnvironment(document: Document): Document {
    let result = document;

    for (const binding of this.envBindings()) {
      const raw = this.env[binding.variable];
      if (raw === undefined || raw.trim() === '') {
        continue;
      }

      let value: unknown;
      switch (binding.type) {
        case 'number': {
          const parsed = Number(raw);
          if (!Number.isFinite(parsed)) {
            this.logger.warn(`Invalid value for ${binding.variable}: ${raw}`);
            continue;
          }
          value = parsed;
          break;
        }
        case 'list':
          value = raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
          break;
        case 'string':
          value = raw.trim();
          break;
      }

      this.logger.debug(`Overriding ${binding.path.join('.')} from ${binding.variable}`);
      result = setPath(result, binding.path, value);
    }

    return result;
  }

  private async createBackup(): Promise<void> {
    try {
      await fs.copyFile(this.configPath, this.backupPath);
      this.logger.debug('Configuration backup created');
    } catch (error) {
      this.logger.warn('Failed to create configuration backup:', error);
    }
  }

  private async readDocument(): Promise<Document> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.configPath, 'utf-8'));
    } catch (error) {
      this.logger.error('Failed to load configuration:', error);
      throw new ConfigurationError(`Configuration loading failed: ${errorMessage(error)}`);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError('Configuration must be an object');
    }
    return parsed;
  }

  private toDocument(config: T): Document {
    const document: unknown = JSON.parse(JSON.stringify(config));
    return isRecord(document) ? document : {};
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
