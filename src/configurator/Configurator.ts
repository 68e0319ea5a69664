import { EventEmitter } from 'events';
import { BootGate } from '../boot/BootGate';
import { Logger, componentLogger, createLogger } from '../common/logger';
import { ConfiguratorConfig, ConfiguratorOptions } from '../config/ConfiguratorConfig';
import { ScyllaYamlFile } from '../config/ScyllaYamlFile';
import { UserDataSpec, parseUserData } from '../config/UserDataSpec';
import { ConfigMerger } from '../merge/ConfigMerger';
import { MetadataClient, isRetryableMetadataError } from '../metadata/MetadataClient';
import { RetryManager } from '../metadata/RetryManager';
import { ScriptRunResult, ScriptRunner } from '../script/ScriptRunner';
import { InstanceMetadata, ServiceConfig } from '../types';

export interface ConfiguratorDeps {
  config?: ConfiguratorConfig;
  logger?: Logger;
  metadataClient?: MetadataClient;
  merger?: ConfigMerger;
  scriptRunner?: ScriptRunner;
  bootGate?: BootGate;
}

export interface ConfigureSummary {
  config: ServiceConfig;
  script: ScriptRunResult;
  autoStartDisabled: boolean;
}

/**
 * First-boot orchestration: metadata -> override parse -> merge -> persist,
 * with the post-configuration script and the boot gate exposed as separate
 * steps so the boot sequence can call them at different points.
 *
 * Metadata and the parsed override document are fetched at most once per
 * instance and shared by all steps.
 */
export class Configurator extends EventEmitter {
  readonly config: ConfiguratorConfig;
  readonly scyllaYaml: ScyllaYamlFile;
  private readonly logger: Logger;
  private readonly metadataClient: MetadataClient;
  private readonly merger: ConfigMerger;
  private readonly scriptRunner: ScriptRunner;
  private readonly bootGate: BootGate;
  private metadata?: InstanceMetadata;
  private userData?: UserDataSpec;

  constructor(deps: ConfiguratorDeps = {}) {
    super();
    this.config = deps.config ?? ConfiguratorConfig.create();
    this.logger = deps.logger ?? createLogger({
      level: this.config.logLevel,
      component: 'configure',
      ...(this.config.logFile ? { logFile: this.config.logFile } : {})
    });

    this.scyllaYaml = new ScyllaYamlFile(this.config.scyllaYamlPath, this.config.scyllaYamlExamplePath);

    this.metadataClient = deps.metadataClient ?? new MetadataClient({
      baseUrl: this.config.metadataUrl,
      timeout: this.config.metadataTimeout,
      logger: componentLogger(this.logger, 'metadata'),
      ...(this.config.metadataRetries > 0
        ? {
            retry: new RetryManager({
              maxRetries: this.config.metadataRetries,
              retryCondition: isRetryableMetadataError,
              name: 'metadata'
            })
          }
        : {})
    });

    this.merger = deps.merger ?? new ConfigMerger({ logger: componentLogger(this.logger, 'merge') });

    this.scriptRunner = deps.scriptRunner ?? new ScriptRunner({
      defaultTimeout: this.config.defaultScriptTimeout,
      logger: componentLogger(this.logger, 'script')
    });

    this.bootGate = deps.bootGate ?? new BootGate(
      this.config.disableStartFilePath,
      componentLogger(this.logger, 'boot')
    );
  }

  static fromOptions(options: ConfiguratorOptions, logger?: Logger): Configurator {
    return new Configurator({ config: ConfiguratorConfig.create(options), ...(logger ? { logger } : {}) });
  }

  /**
   * Instance metadata for this run, fetched on first use
   */
  async getInstanceMetadata(): Promise<InstanceMetadata> {
    if (!this.metadata) {
      this.metadata = await this.metadataClient.fetchInstanceMetadata();
      this.emit('metadata-fetched', { privateIpv4: this.metadata.privateIpv4 });
    }
    return this.metadata;
  }

  /**
   * Validated override document for this run; empty when none was supplied
   */
  async getUserData(): Promise<UserDataSpec> {
    if (!this.userData) {
      const metadata = await this.getInstanceMetadata();
      this.userData = parseUserData(metadata.rawUserData);
    }
    return this.userData;
  }

  /**
   * Build and write scylla.yaml. Nothing is written when metadata or the
   * override document cannot be obtained.
   */
  async configureScyllaYaml(): Promise<ServiceConfig> {
    const metadata = await this.getInstanceMetadata();
    const userData = await this.getUserData();

    if (await this.scyllaYaml.ensureExample()) {
      this.logger.info('Saved pristine scylla.yaml as example', { path: this.scyllaYaml.examplePath });
    }

    const template = await this.scyllaYaml.loadTemplate();
    const merged = this.merger.merge(template, metadata, userData);
    await this.scyllaYaml.save(merged);

    this.logger.info('scylla.yaml written', { path: this.scyllaYaml.filePath });
    this.emit('scylla-yaml-written', { path: this.scyllaYaml.filePath });
    return merged;
  }

  async runPostConfigurationScript(): Promise<ScriptRunResult> {
    const userData = await this.getUserData();
    return this.scriptRunner.run(
      userData.post_configuration_script,
      userData.post_configuration_script_timeout
    );
  }

  /**
   * Create or remove the auto-start sentinel. Returns whether auto-start is disabled.
   */
  async applyBootGate(): Promise<boolean> {
    const userData = await this.getUserData();
    return this.bootGate.apply(userData.start_scylla_on_first_boot);
  }

  /**
   * All three steps in boot order
   */
  async configure(): Promise<ConfigureSummary> {
    const config = await this.configureScyllaYaml();
    const script = await this.runPostConfigurationScript();
    const autoStartDisabled = await this.applyBootGate();
    return { config, script, autoStartDisabled };
  }
}
