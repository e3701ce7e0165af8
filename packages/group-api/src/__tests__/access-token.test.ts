import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { UnsecuredJWT } from 'jose';
import { createLogger } from '@newsletter/observability';
import { AccessTokenProvider, parseApiKey, type TokenSource } from '../access-token.js';
import { ApiKeyFormatError, MissingScopeError } from '../errors.js';

const logger = createLogger({ level: 'silent' });

function tokenWith(claims: Record<string, unknown>): string {
  return new UnsecuredJWT(claims).encode();
}

describe('parseApiKey', () => {
  it('splits the secret and numeric key id', () => {
    expect(parseApiKey('test-secret.42')).toEqual({ secret: 'test-secret', keyId: '42' });
  });

  it.each([
    ['no separator', 'test-secret'],
    ['too many parts', 'a.b.42'],
    ['empty secret', '.42'],
    ['non-numeric key id', 'test-secret.abc'],
  ])('rejects %s', (_label, apiKey) => {
    expect(() => parseApiKey(apiKey)).toThrow(ApiKeyFormatError);
  });
});

describe('AccessTokenProvider', () => {
  let clock: number;
  let fetchToken: Mock<TokenSource>;

  beforeEach(() => {
    clock = 1_000_000;
    fetchToken = vi.fn<TokenSource>().mockImplementation(async () => ({
      token: tokenWith({ scope: 'group.insert group.read' }),
      expiresAt: clock + 5 * 60_000,
    }));
  });

  function createProvider() {
    return new AccessTokenProvider({
      apiKey: 'test-secret.7',
      fetchToken,
      now: () => clock,
      logger,
    });
  }

  it('passes the parsed credentials to the token source', async () => {
    await createProvider().getToken();

    expect(fetchToken).toHaveBeenCalledWith({ secret: 'test-secret', keyId: '7' });
  });

  it('reuses a token until it is within the refresh buffer', async () => {
    const provider = createProvider();

    const first = await provider.getToken();
    clock += 4 * 60_000;
    const second = await provider.getToken();

    expect(second).toBe(first);
    expect(fetchToken).toHaveBeenCalledTimes(1);

    clock += 31_000;
    await provider.getToken();

    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    const provider = createProvider();

    const tokens = await Promise.all([provider.getToken(), provider.getToken(), provider.getToken()]);

    expect(new Set(tokens).size).toBe(1);
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('accepts scopes given as an array claim', async () => {
    fetchToken.mockResolvedValue({
      token: tokenWith({ scopes: ['group.insert'] }),
      expiresAt: clock + 60_000,
    });

    await expect(createProvider().getToken()).resolves.toEqual(expect.any(String));
  });

  it('rejects a token without the insert scope and retries on the next call', async () => {
    fetchToken.mockResolvedValueOnce({
      token: tokenWith({ scope: 'group.read' }),
      expiresAt: clock + 60_000,
    });
    const provider = createProvider();

    await expect(provider.getToken()).rejects.toBeInstanceOf(MissingScopeError);
    await expect(provider.getToken()).resolves.toEqual(expect.any(String));
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('fetches again after invalidate', async () => {
    const provider = createProvider();

    await provider.getToken();
    provider.invalidate();
    await provider.getToken();

    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('fails construction for a malformed key', () => {
    expect(
      () => new AccessTokenProvider({ apiKey: 'your_api_key_here', fetchToken, logger })
    ).toThrow('Invalid API key format. Expected format: secret.keyId');
  });
});
