import { promises as fs } from 'fs';
import * as path from 'path';
import { Logger, defaultLogger } from '../common/logger';

/**
 * Sentinel marker read by the service manager at first boot.
 * Present: auto-start suppressed. Absent: service starts normally.
 */
export class BootGate {
  constructor(
    readonly sentinelPath: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Only an explicit `false` suppresses auto-start.
   * Returns whether the sentinel exists afterwards.
   */
  async apply(startOnFirstBoot?: boolean): Promise<boolean> {
    if (startOnFirstBoot === false) {
      await fs.mkdir(path.dirname(this.sentinelPath), { recursive: true });
      await fs.writeFile(this.sentinelPath, '', { flag: 'a' });
      this.logger.info('Scylla will not start on first boot', { sentinel: this.sentinelPath });
      return true;
    }

    await fs.rm(this.sentinelPath, { force: true });
    this.logger.info('Scylla will start on first boot');
    return false;
  }

  async isAutoStartDisabled(): Promise<boolean> {
    try {
      await fs.access(this.sentinelPath);
      return true;
    } catch {
      return false;
    }
  }
}
