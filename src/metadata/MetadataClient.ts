import * as http from 'http';
import * as https from 'https';
import { MetadataFetchError, errorMessage } from '../common/errors';
import { Logger, defaultLogger } from '../common/logger';
import { isValidIpv4 } from '../common/utils';
import { InstanceMetadata } from '../types';
import { RetryManager } from './RetryManager';

export const LOCAL_IPV4_PATH = '/meta-data/local-ipv4';
export const USER_DATA_PATH = '/user-data';

export interface MetadataClientConfig {
  /** Base URL of the metadata service, e.g. http://169.254.169.254/latest */
  baseUrl: string;
  /** Per-request timeout (ms) */
  timeout?: number;
  /** Optional retry policy for transient failures */
  retry?: RetryManager;
  logger?: Logger;
}

interface MetadataResponse {
  statusCode: number;
  body: string;
}

/**
 * Client for the two instance-metadata endpoints the configurator consumes
 */
export class MetadataClient {
  private readonly baseUrl: URL;
  private readonly timeout: number;
  private readonly retry?: RetryManager;
  private readonly logger: Logger;

  constructor(config: MetadataClientConfig) {
    this.baseUrl = new URL(config.baseUrl.replace(/\/+$/, ''));
    this.timeout = config.timeout ?? 5000;
    this.retry = config.retry;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Private IPv4 of the instance. Anything but a 200 carrying an address is fatal.
   */
  async fetchPrivateIpv4(): Promise<string> {
    const response = await this.request(LOCAL_IPV4_PATH);

    if (response.statusCode !== 200) {
      throw new MetadataFetchError(
        LOCAL_IPV4_PATH,
        `Unable to get private IP: HTTP ${response.statusCode}`,
        response.statusCode
      );
    }

    const address = response.body.trim();
    if (!isValidIpv4(address)) {
      throw new MetadataFetchError(
        LOCAL_IPV4_PATH,
        `Metadata returned an invalid private IP: '${address}'`,
        response.statusCode
      );
    }

    this.logger.info('Private IP detected', { address });
    return address;
  }

  /**
   * Raw user-data body, or undefined when the operator supplied none (404)
   */
  async fetchUserData(): Promise<string | undefined> {
    const response = await this.request(USER_DATA_PATH);

    if (response.statusCode === 404) {
      this.logger.info('No user data supplied, using defaults');
      return undefined;
    }

    if (response.statusCode !== 200) {
      throw new MetadataFetchError(
        USER_DATA_PATH,
        `Unable to get user data: HTTP ${response.statusCode}`,
        response.statusCode
      );
    }

    this.logger.debug('User data received', { bytes: Buffer.byteLength(response.body) });
    return response.body;
  }

  /**
   * Address first: nothing else matters without a bind address
   */
  async fetchInstanceMetadata(): Promise<InstanceMetadata> {
    const privateIpv4 = await this.fetchPrivateIpv4();
    const rawUserData = await this.fetchUserData();

    return Object.freeze(rawUserData === undefined ? { privateIpv4 } : { privateIpv4, rawUserData });
  }

  private request(path: string): Promise<MetadataResponse> {
    if (!this.retry) {
      return this.get(path);
    }
    return this.retry.execute(() => this.get(path), `metadata:${path}`);
  }

  private get(path: string): Promise<MetadataResponse> {
    const url = new URL(`${this.baseUrl.pathname.replace(/\/+$/, '')}${path}`, this.baseUrl);
    const protocol = url.protocol === 'https:' ? https : http;

    this.logger.debug('GET metadata', { url: url.toString() });

    return new Promise((resolve, reject) => {
      const req = protocol.request(url, { method: 'GET', timeout: this.timeout }, (res) => {
        let body = '';
        res.setEncoding('utf8');

        res.on('data', (chunk: string) => {
          body += chunk;
        });

        res.on('end', () => {
          const statusCode = res.statusCode ?? 0;
          if (statusCode >= 500) {
            reject(new MetadataFetchError(path, `Metadata endpoint ${path} answered HTTP ${statusCode}`, statusCode));
            return;
          }
          resolve({ statusCode, body });
        });

        res.on('error', (error) => {
          reject(new MetadataFetchError(path, `Metadata response failed: ${errorMessage(error)}`, undefined, { cause: error }));
        });
      });

      req.on('error', (error) => {
        reject(new MetadataFetchError(path, `Metadata request to ${path} failed: ${errorMessage(error)}`, undefined, { cause: error }));
      });

      req.on('timeout', () => {
        req.destroy(new Error(`Request timeout after ${this.timeout}ms`));
      });

      req.end();
    });
  }
}

/**
 * Retry only what a later attempt can fix
 */
export function isRetryableMetadataError(error: unknown): boolean {
  return error instanceof MetadataFetchError && error.isTransient;
}
