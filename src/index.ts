// Main entry point for scylla-ami-configure

// Types
export * from './types';

// Orchestration
export * from './configurator/Configurator';

// Metadata
export * from './metadata/MetadataClient';
export * from './metadata/RetryManager';

// Configuration and override documents
export * from './config/ConfiguratorConfig';
export * from './config/ScyllaYamlFile';
export * from './config/UserDataSpec';

// Merge
export * from './merge/ConfigMerger';
export * from './merge/MergeRules';

// Post-configuration script
export * from './script/BoundedProcess';
export * from './script/ScriptRunner';

// Boot gate
export * from './boot/BootGate';

// Common modules
export * from './common/errors';
export * from './common/logger';
export * from './common/utils';

// CLI
export { runCli, EXIT_OK, EXIT_FATAL, EXIT_USAGE } from './cli/runCli';
export { parseCliArgs, UsageError, PHASES, type Phase, type CliArgs } from './cli/args';
