import { isLogLevel } from '../common/logger';
import { ConfiguratorOptions } from '../config/ConfiguratorConfig';

export type Phase = 'configure' | 'post-configure' | 'boot-gate';

export const PHASES: readonly Phase[] = ['configure', 'post-configure', 'boot-gate'];

export interface CliArgs {
  help: boolean;
  phases: Phase[];
  options: ConfiguratorOptions;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: scylla-ami-configure [phase...] [options]

Phases (default: all, in this order):
  configure        fetch instance metadata and write scylla.yaml
  post-configure   run the post_configuration_script from user data
  boot-gate        honour start_scylla_on_first_boot

Options:
  --scylla-yaml <path>    scylla.yaml to write (template: <path>.example)
  --metadata-url <url>    instance metadata base URL
  --sentinel <path>       auto-start sentinel file
  --retries <n>           retry transient metadata failures n times
  --log-level <level>     debug | info | warn | error
  --log-file <path>       also append log lines to this file
  -h, --help              show this help
`;

const isPhase = (value: string): value is Phase => (PHASES as readonly string[]).includes(value);

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const phases: Phase[] = [];
  const options: ConfiguratorOptions = {};
  let help = false;

  const valueOf = (flag: string, i: number): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('-') || next.trim() === '') {
      throw new UsageError(`${flag} requires a value`);
    }
    return next.trim();
  };

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === undefined) continue;

    switch (a) {
      case '-h':
      case '--help':
        help = true;
        break;
      case '--scylla-yaml':
        options.scyllaYamlPath = valueOf(a, i);
        i += 1;
        break;
      case '--metadata-url':
        options.metadataUrl = valueOf(a, i);
        i += 1;
        break;
      case '--sentinel':
        options.disableStartFilePath = valueOf(a, i);
        i += 1;
        break;
      case '--retries': {
        const raw = valueOf(a, i);
        const retries = Number(raw);
        if (!Number.isInteger(retries) || retries < 0) {
          throw new UsageError(`--retries expects a non-negative integer, got '${raw}'`);
        }
        options.metadataRetries = retries;
        i += 1;
        break;
      }
      case '--log-level': {
        const level = valueOf(a, i).toLowerCase();
        if (!isLogLevel(level)) {
          throw new UsageError(`Unknown log level '${level}'`);
        }
        options.logLevel = level;
        i += 1;
        break;
      }
      case '--log-file':
        options.logFile = valueOf(a, i);
        i += 1;
        break;
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown option '${a}'`);
        }
        if (!isPhase(a)) {
          throw new UsageError(`Unknown phase '${a}'`);
        }
        if (!phases.includes(a)) {
          phases.push(a);
        }
    }
  }

  // Phases always run in boot order, whatever order they were given in
  const ordered = phases.length === 0 ? [...PHASES] : PHASES.filter(phase => phases.includes(phase));
  return { help, phases: ordered, options };
}
