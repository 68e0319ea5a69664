import { LogLevel, isLogLevel } from '../common/logger';

export const DEFAULT_SCYLLA_YAML_PATH = '/etc/scylla/scylla.yaml';
export const DEFAULT_DISABLE_START_FILE_PATH = '/etc/scylla/ami_disabled';
export const DEFAULT_METADATA_URL = 'http://169.254.169.254/latest';
export const DEFAULT_METADATA_TIMEOUT = 5000;
export const DEFAULT_SCRIPT_TIMEOUT_SECONDS = 600;

export interface ConfiguratorOptions {
  scyllaYamlPath?: string;
  /** Template read by the merge; defaults to `<scyllaYamlPath>.example` */
  scyllaYamlExamplePath?: string;
  disableStartFilePath?: string;
  metadataUrl?: string;
  /** Per-request timeout (ms) */
  metadataTimeout?: number;
  /** Extra attempts for transient metadata failures; 0 keeps fail-fast */
  metadataRetries?: number;
  defaultScriptTimeout?: number;
  logLevel?: LogLevel;
  logFile?: string;
}

/**
 * Resolved settings for one configuration run.
 * Explicit options win over environment variables, which win over defaults.
 */
export class ConfiguratorConfig {
  readonly scyllaYamlPath: string;
  readonly scyllaYamlExamplePath: string;
  readonly disableStartFilePath: string;
  readonly metadataUrl: string;
  readonly metadataTimeout: number;
  readonly metadataRetries: number;
  readonly defaultScriptTimeout: number;
  readonly logLevel: LogLevel;
  readonly logFile?: string;

  private constructor(options: Required<Omit<ConfiguratorOptions, 'logFile'>> & { logFile?: string }) {
    this.scyllaYamlPath = options.scyllaYamlPath;
    this.scyllaYamlExamplePath = options.scyllaYamlExamplePath;
    this.disableStartFilePath = options.disableStartFilePath;
    this.metadataUrl = options.metadataUrl.replace(/\/+$/, '');
    this.metadataTimeout = options.metadataTimeout;
    this.metadataRetries = options.metadataRetries;
    this.defaultScriptTimeout = options.defaultScriptTimeout;
    this.logLevel = options.logLevel;
    this.logFile = options.logFile;
  }

  static create(options: ConfiguratorOptions = {}, env: NodeJS.ProcessEnv = process.env): ConfiguratorConfig {
    const scyllaYamlPath = options.scyllaYamlPath ?? env.SCYLLA_YAML_PATH ?? DEFAULT_SCYLLA_YAML_PATH;
    const logFile = options.logFile ?? env.SCYLLA_CONFIGURE_LOG_FILE;

    return new ConfiguratorConfig({
      scyllaYamlPath,
      scyllaYamlExamplePath: options.scyllaYamlExamplePath ?? `${scyllaYamlPath}.example`,
      disableStartFilePath:
        options.disableStartFilePath ?? env.SCYLLA_AMI_DISABLED_FILE ?? DEFAULT_DISABLE_START_FILE_PATH,
      metadataUrl: options.metadataUrl ?? env.INSTANCE_METADATA_URL ?? DEFAULT_METADATA_URL,
      metadataTimeout: positive('metadataTimeout', options.metadataTimeout ?? DEFAULT_METADATA_TIMEOUT),
      metadataRetries: options.metadataRetries !== undefined
        ? retries(String(options.metadataRetries))
        : parseRetries(env.METADATA_RETRIES),
      defaultScriptTimeout: positive(
        'defaultScriptTimeout',
        options.defaultScriptTimeout ?? DEFAULT_SCRIPT_TIMEOUT_SECONDS
      ),
      logLevel: options.logLevel ?? parseLogLevel(env.SCYLLA_CONFIGURE_LOG_LEVEL),
      ...(logFile ? { logFile } : {})
    });
  }
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function parseRetries(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return 0;
  }
  return retries(raw);
}

function retries(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`metadata retries must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim() === '') {
    return 'info';
  }
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level '${raw}'`);
  }
  return level;
}
