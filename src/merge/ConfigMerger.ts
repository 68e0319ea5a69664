import { Logger, defaultLogger } from '../common/logger';
import { createId } from '../common/utils';
import { UserDataSpec } from '../config/UserDataSpec';
import { InstanceMetadata, ServiceConfig } from '../types';
import { MERGE_RULES, MergeRule, RULE_KEYS } from './MergeRules';

export interface ConfigMergerOptions {
  rules?: readonly MergeRule[];
  generateId?: () => string;
  logger?: Logger;
}

/**
 * Combines the template scylla.yaml with instance-derived defaults and
 * operator overrides. Precedence: override, then rule default, then the
 * template value.
 */
export class ConfigMerger {
  private readonly rules: readonly MergeRule[];
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(options: ConfigMergerOptions = {}) {
    this.rules = options.rules ?? MERGE_RULES;
    this.generateId = options.generateId ?? createId;
    this.logger = options.logger ?? defaultLogger;
  }

  merge(template: ServiceConfig, metadata: InstanceMetadata, overrides?: UserDataSpec): ServiceConfig {
    const result: ServiceConfig = structuredClone(template);
    const userYaml = overrides?.scylla_yaml ?? {};
    const context = { metadata, generateId: this.generateId };

    for (const rule of this.rules) {
      if (isOverridden(userYaml, rule.key)) {
        continue;
      }
      result[rule.key] = rule.apply(result[rule.key], context);
    }

    const overridden: string[] = [];
    for (const [key, value] of Object.entries(userYaml)) {
      // null never clears a key the merge guarantees
      if (RULE_KEYS.has(key) && value === null) {
        continue;
      }
      result[key] = structuredClone(value);
      overridden.push(key);
    }

    this.logger.info('scylla.yaml merged', {
      clusterName: result.cluster_name,
      overridden
    });

    return result;
  }
}

function isOverridden(userYaml: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(userYaml, key) && userYaml[key] !== null && userYaml[key] !== undefined;
}
