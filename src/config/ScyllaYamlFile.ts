import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigFileError, errorMessage } from '../common/errors';
import { isPlainObject } from '../common/utils';
import { ServiceConfig } from '../types';

/**
 * scylla.yaml reader/writer.
 * The shipped file doubles as the pristine template: it is copied to the
 * example path once, and every run merges from that copy.
 */
export class ScyllaYamlFile {
  constructor(
    readonly filePath: string,
    readonly examplePath: string = `${filePath}.example`
  ) {}

  /**
   * Copy the shipped scylla.yaml to the example path unless it is already there.
   * Returns true when the copy was made.
   */
  async ensureExample(): Promise<boolean> {
    if (await exists(this.examplePath)) {
      return false;
    }

    try {
      await fs.copyFile(this.filePath, this.examplePath);
      return true;
    } catch (error) {
      throw new ConfigFileError(
        this.examplePath,
        `Failed to create ${this.examplePath} from ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Load the template document the merge starts from
   */
  async loadTemplate(): Promise<ServiceConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.examplePath, 'utf8');
    } catch (error) {
      throw new ConfigFileError(
        this.examplePath,
        `Failed to read template ${this.examplePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return ScyllaYamlFile.parse(content, this.examplePath);
  }

  /**
   * Write the final document, replacing the file atomically
   */
  async save(config: ServiceConfig): Promise<void> {
    const content = ScyllaYamlFile.serialize(config);
    const tempPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.tmp`);

    try {
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new ConfigFileError(
        this.filePath,
        `Failed to save configuration to ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Parse YAML content into a top-level mapping
   */
  static parse(content: string, source: string = '<inline>'): ServiceConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new ConfigFileError(source, `Failed to parse YAML configuration: ${errorMessage(error)}`, { cause: error });
    }

    // An all-comments template loads as undefined
    if (parsed === undefined || parsed === null) {
      return {};
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigFileError(source, 'YAML configuration must be a mapping at the top level');
    }

    return parsed;
  }

  static serialize(config: ServiceConfig): string {
    return yaml.dump(config, {
      indent: 2,
      lineWidth: -1,
      noRefs: true,
      sortKeys: false
    });
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
