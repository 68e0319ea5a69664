import { PHASES, UsageError, parseCliArgs } from '../../../src/cli/args';

describe('parseCliArgs', () => {
  test('should run every phase when none is named', () => {
    expect(parseCliArgs([])).toEqual({ help: false, phases: [...PHASES], options: {} });
  });

  test('should keep boot order regardless of argument order', () => {
    expect(parseCliArgs(['boot-gate', 'configure', 'boot-gate']).phases).toEqual(['configure', 'boot-gate']);
  });

  test('should map options onto configurator options', () => {
    const args = parseCliArgs([
      'configure',
      '--scylla-yaml', '/tmp/scylla.yaml',
      '--metadata-url', 'http://127.0.0.1:9000',
      '--sentinel', '/tmp/ami_disabled',
      '--retries', '3',
      '--log-level', 'DEBUG',
      '--log-file', '/tmp/configure.log'
    ]);

    expect(args.options).toEqual({
      scyllaYamlPath: '/tmp/scylla.yaml',
      metadataUrl: 'http://127.0.0.1:9000',
      disableStartFilePath: '/tmp/ami_disabled',
      metadataRetries: 3,
      logLevel: 'debug',
      logFile: '/tmp/configure.log'
    });
  });

  test('should recognise help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['configure', '--help']).help).toBe(true);
  });

  describe('usage errors', () => {
    test('should reject a missing option value', () => {
      expect(() => parseCliArgs(['--scylla-yaml'])).toThrow('--scylla-yaml requires a value');
      expect(() => parseCliArgs(['--sentinel', '--retries', '1'])).toThrow('--sentinel requires a value');
    });

    test('should reject unknown options and phases', () => {
      expect(() => parseCliArgs(['--force'])).toThrow("Unknown option '--force'");
      expect(() => parseCliArgs(['start'])).toThrow("Unknown phase 'start'");
    });

    test('should reject bad retry counts and log levels', () => {
      expect(() => parseCliArgs(['--retries', 'two'])).toThrow("--retries expects a non-negative integer, got 'two'");
      expect(() => parseCliArgs(['--log-level', 'trace'])).toThrow(UsageError);
    });
  });
});
