import { MetadataFetchError } from '../../../src/common/errors';
import { MetadataClient, isRetryableMetadataError } from '../../../src/metadata/MetadataClient';
import { RetryManager } from '../../../src/metadata/RetryManager';
import { MetadataServer, defaultInstanceMetadata } from '../../helpers/metadataServer';
import { spyLogger } from '../../helpers/spyLogger';

describe('MetadataClient', () => {
  let server: MetadataServer;
  let client: MetadataClient;

  beforeEach(async () => {
    server = new MetadataServer(defaultInstanceMetadata('10.0.0.5'));
    const url = await server.start();
    client = new MetadataClient({ baseUrl: url, timeout: 1000, logger: spyLogger() });
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('fetchPrivateIpv4', () => {
    test('should return the address from a 200 response', async () => {
      await expect(client.fetchPrivateIpv4()).resolves.toBe('10.0.0.5');
    });

    test('should trim surrounding whitespace', async () => {
      server.setRoutes({ '/meta-data/local-ipv4': { code: 200, text: ' 10.0.0.6\n' } });

      await expect(client.fetchPrivateIpv4()).resolves.toBe('10.0.0.6');
    });

    test('should fail on 404', async () => {
      server.setRoutes({ '/meta-data/local-ipv4': { code: 404, text: '' } });

      await expect(client.fetchPrivateIpv4()).rejects.toThrow('Unable to get private IP: HTTP 404');
    });

    test('should fail on a body that is not an address', async () => {
      server.setRoutes({ '/meta-data/local-ipv4': { code: 200, text: '<html>' } });

      await expect(client.fetchPrivateIpv4()).rejects.toThrow("Metadata returned an invalid private IP: '<html>'");
    });

    test('should fail on a server error with the status attached', async () => {
      server.setRoutes({ '/meta-data/local-ipv4': { code: 503, text: 'busy' } });

      const error = await client.fetchPrivateIpv4().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MetadataFetchError);
      expect(error).toMatchObject({ statusCode: 503, path: '/meta-data/local-ipv4', code: 'METADATA_FETCH' });
    });
  });

  describe('fetchUserData', () => {
    test('should treat 404 as no user data', async () => {
      await expect(client.fetchUserData()).resolves.toBeUndefined();
    });

    test('should return the raw body on 200', async () => {
      server.setRoutes({ '/user-data': { code: 200, text: '{"start_scylla_on_first_boot":false}' } });

      await expect(client.fetchUserData()).resolves.toBe('{"start_scylla_on_first_boot":false}');
    });

    test('should fail on any other status', async () => {
      server.setRoutes({ '/user-data': { code: 403, text: 'denied' } });

      await expect(client.fetchUserData()).rejects.toThrow('Unable to get user data: HTTP 403');
    });
  });

  describe('fetchInstanceMetadata', () => {
    test('should combine both endpoints', async () => {
      server.setRoutes({
        '/meta-data/local-ipv4': { code: 200, text: '10.0.0.7' },
        '/user-data': { code: 200, text: '{}' }
      });

      const metadata = await client.fetchInstanceMetadata();

      expect(metadata).toEqual({ privateIpv4: '10.0.0.7', rawUserData: '{}' });
      expect(Object.isFrozen(metadata)).toBe(true);
    });

    test('should omit user data when none was supplied', async () => {
      await expect(client.fetchInstanceMetadata()).resolves.toEqual({ privateIpv4: '10.0.0.5' });
    });

    test('should not ask for user data when the address lookup fails', async () => {
      server.setRoutes({ '/meta-data/local-ipv4': { code: 500, text: '' } });

      await expect(client.fetchInstanceMetadata()).rejects.toThrow(MetadataFetchError);
      expect(server.hitCount('/user-data')).toBe(0);
    });
  });

  describe('base URL', () => {
    test('should keep the base path prefix', async () => {
      server.setRoutes({ '/latest/meta-data/local-ipv4': { code: 200, text: '10.0.0.8' } });
      const prefixed = new MetadataClient({ baseUrl: `${server.url}/latest/`, logger: spyLogger() });

      await expect(prefixed.fetchPrivateIpv4()).resolves.toBe('10.0.0.8');
    });
  });

  describe('transport failures', () => {
    test('should wrap connection errors', async () => {
      await server.stop();

      const error = await client.fetchPrivateIpv4().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MetadataFetchError);
      expect(error).toMatchObject({ statusCode: undefined });
      expect(String(error)).toContain('Metadata request to /meta-data/local-ipv4 failed');
    });
  });

  describe('with retry policy', () => {
    test('should retry transient failures', async () => {
      server.setRoutes({
        '/meta-data/local-ipv4': [
          { code: 503, text: '' },
          { code: 502, text: '' },
          { code: 200, text: '10.0.0.9' }
        ]
      });
      const retrying = new MetadataClient({
        baseUrl: server.url,
        logger: spyLogger(),
        retry: new RetryManager({ maxRetries: 3, baseDelay: 1, jitter: false, retryCondition: isRetryableMetadataError })
      });

      await expect(retrying.fetchPrivateIpv4()).resolves.toBe('10.0.0.9');
      expect(server.hitCount('/meta-data/local-ipv4')).toBe(3);
    });

    test('should not retry client errors', async () => {
      server.setRoutes({ '/user-data': { code: 403, text: '' } });
      const retrying = new MetadataClient({
        baseUrl: server.url,
        logger: spyLogger(),
        retry: new RetryManager({ maxRetries: 3, baseDelay: 1, jitter: false, retryCondition: isRetryableMetadataError })
      });

      await expect(retrying.fetchUserData()).rejects.toThrow('HTTP 403');
      expect(server.hitCount('/user-data')).toBe(1);
    });
  });
});
