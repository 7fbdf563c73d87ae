import { describe, expect, it, vi } from 'vitest';
import { SynapseAuthManager, type SecretsProvider } from './auth';

describe('SynapseAuthManager', () => {
  it('prefers the configured token', async () => {
    const secrets: SecretsProvider = { getSecret: vi.fn(async () => 'secret-token') };
    const auth = new SynapseAuthManager(
      { authToken: 'config-token' },
      { secrets, env: { SYNAPSE_AUTH_TOKEN: 'env-token' } }
    );

    await expect(auth.authorizationHeader()).resolves.toBe('Bearer config-token');
    expect(secrets.getSecret).not.toHaveBeenCalled();
  });

  it('falls back to the secret store', async () => {
    const getSecret = vi.fn(async () => 'secret-token');
    const auth = new SynapseAuthManager({}, { secrets: { getSecret }, env: { SYNAPSE_AUTH_TOKEN: 'env-token' } });

    await expect(auth.getAuthToken()).resolves.toBe('secret-token');
    expect(getSecret).toHaveBeenCalledWith('SYNAPSE_AUTH_TOKEN');
  });

  it('falls back to the environment when the secret store fails', async () => {
    const secrets: SecretsProvider = {
      getSecret: vi.fn(async () => {
        throw new Error('store unavailable');
      }),
    };
    const auth = new SynapseAuthManager({}, { secrets, env: { SYNAPSE_AUTH_TOKEN: 'env-token' } });

    await expect(auth.getAuthToken()).resolves.toBe('env-token');
    await expect(auth.isConfigured()).resolves.toBe(true);
  });

  it('reports a missing token', async () => {
    const auth = new SynapseAuthManager({}, { secrets: { getSecret: async () => undefined }, env: {} });

    await expect(auth.isConfigured()).resolves.toBe(false);
    await expect(auth.getAuthToken()).rejects.toMatchObject({ code: 'AUTH_NOT_CONFIGURED' });
  });
});
