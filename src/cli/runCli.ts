import { errorMessage, isConfigureError } from '../common/errors';
import { Logger } from '../common/logger';
import { Configurator } from '../configurator/Configurator';
import { Phase, USAGE, UsageError, parseCliArgs } from './args';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface RunCliDeps {
  createConfigurator?: (options: ReturnType<typeof parseCliArgs>['options']) => Configurator;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

async function runPhase(configurator: Configurator, phase: Phase): Promise<void> {
  switch (phase) {
    case 'configure':
      await configurator.configureScyllaYaml();
      return;
    case 'post-configure':
      await configurator.runPostConfigurationScript();
      return;
    case 'boot-gate':
      await configurator.applyBootGate();
      return;
  }
}

/**
 * Run the requested phases and map the outcome to an exit status.
 * The only place where a typed failure becomes "abort the boot step".
 */
export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  deps: RunCliDeps = {},
  logger?: Logger
): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(`scylla-ami-configure: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    stdout(USAGE);
    return EXIT_OK;
  }

  let configurator: Configurator;
  try {
    configurator = deps.createConfigurator
      ? deps.createConfigurator(args.options)
      : Configurator.fromOptions(args.options, logger);
  } catch (error) {
    stderr(`scylla-ami-configure: ${errorMessage(error)}\n`);
    return EXIT_USAGE;
  }

  for (const phase of args.phases) {
    try {
      await runPhase(configurator, phase);
    } catch (error) {
      if (!isConfigureError(error)) {
        throw error;
      }
      stderr(`scylla-ami-configure: ${phase} failed [${error.code}]: ${error.message}\n`);
      return EXIT_FATAL;
    }
  }

  return EXIT_OK;
}
