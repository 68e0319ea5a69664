/**
 * Jest setup: tests must not pick up configurator settings from the host
 */

const CONFIGURATOR_ENV = [
  'SCYLLA_YAML_PATH',
  'SCYLLA_AMI_DISABLED_FILE',
  'INSTANCE_METADATA_URL',
  'METADATA_RETRIES',
  'SCYLLA_CONFIGURE_LOG_LEVEL',
  'SCYLLA_CONFIGURE_LOG_FILE'
];

for (const name of CONFIGURATOR_ENV) {
  delete process.env[name];
}
