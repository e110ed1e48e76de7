import { ZodError } from 'zod';
import { loadClientConfig } from '../src/config';

describe('loadClientConfig', () => {
  test('applies defaults for protocol, host and port', () => {
    const config = loadClientConfig({ ASPACE_USERNAME: 'admin', ASPACE_PASSWORD: 'test-secret' });

    expect(config).toEqual({
      protocol: 'http',
      host: 'localhost',
      port: 8089,
      username: 'admin',
      password: 'test-secret',
    });
  });

  test('reads every setting from the environment', () => {
    const config = loadClientConfig({
      ASPACE_PROTOCOL: 'https',
      ASPACE_HOST: 'archives.example.org',
      ASPACE_PORT: '443',
      ASPACE_USERNAME: 'curator',
      ASPACE_PASSWORD: 'test-secret',
    });

    expect(config).toEqual({
      protocol: 'https',
      host: 'archives.example.org',
      port: 443,
      username: 'curator',
      password: 'test-secret',
    });
  });

  test('rejects a port out of range', () => {
    expect(() =>
      loadClientConfig({ ASPACE_PORT: '70000', ASPACE_USERNAME: 'admin', ASPACE_PASSWORD: 'test-secret' })
    ).toThrow(ZodError);
  });

  test('rejects a port that is not a number', () => {
    expect(() =>
      loadClientConfig({ ASPACE_PORT: 'http', ASPACE_USERNAME: 'admin', ASPACE_PASSWORD: 'test-secret' })
    ).toThrow(ZodError);
  });

  test('requires credentials', () => {
    expect(() => loadClientConfig({ ASPACE_HOST: 'localhost' })).toThrow(ZodError);
  });

  test('rejects an unknown protocol', () => {
    expect(() =>
      loadClientConfig({ ASPACE_PROTOCOL: 'ftp', ASPACE_USERNAME: 'admin', ASPACE_PASSWORD: 'test-secret' })
    ).toThrow(ZodError);
  });
});
