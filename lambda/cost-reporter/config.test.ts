import { detectMode, loadConfig } from './config';
import { ConfigError } from './errors';
import { isBase64 } from './secrets';
import { Decrypter } from './types';

const WEBHOOK = 'https://hooks.example.com/services/test-secret';
const CHANNEL = '#cost-reports';

function encode(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

function fakeDecrypter(): Decrypter & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    decrypt: async (ciphertext) => {
      calls.push(ciphertext);
      return Buffer.from(ciphertext, 'base64').toString('utf8');
    },
  };
}

describe('Configuration', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should detect lambda mode from the function name', () => {
    expect(detectMode({ AWS_LAMBDA_FUNCTION_NAME: 'cost-reporter' })).toBe('lambda');
    expect(detectMode({})).toBe('local');
    expect(detectMode({ AWS_LAMBDA_FUNCTION_NAME: '' })).toBe('local');
  });

  it('should load plaintext secrets locally', async () => {
    const decrypter = fakeDecrypter();

    const config = await loadConfig({ WEBHOOK_ENDPOINT: WEBHOOK, CHANNEL_NAME: CHANNEL }, decrypter);

    expect(config).toEqual({
      webhookEndpoint: WEBHOOK,
      channelName: CHANNEL,
      mode: 'local',
      costExplorerRegion: 'us-east-1',
    });
    expect(decrypter.calls).toEqual([]);
  });

  it('should honour a custom Cost Explorer region', async () => {
    const config = await loadConfig({
      WEBHOOK_ENDPOINT: WEBHOOK,
      CHANNEL_NAME: CHANNEL,
      COST_EXPLORER_REGION: 'us-west-2',
    });

    expect(config.costExplorerRegion).toBe('us-west-2');
  });

  it('should decrypt secrets in lambda mode', async () => {
    const decrypter = fakeDecrypter();

    const config = await loadConfig(
      {
        AWS_LAMBDA_FUNCTION_NAME: 'cost-reporter',
        WEBHOOK_ENDPOINT: encode(WEBHOOK),
        CHANNEL_NAME: encode(CHANNEL),
      },
      decrypter
    );

    expect(config.mode).toBe('lambda');
    expect(config.webhookEndpoint).toBe(WEBHOOK);
    expect(config.channelName).toBe(CHANNEL);
    expect(decrypter.calls).toEqual([encode(WEBHOOK), encode(CHANNEL)]);
  });

  it('should skip decryption in lambda mode when secrets are plaintext', async () => {
    const decrypter = fakeDecrypter();

    const config = await loadConfig(
      {
        AWS_LAMBDA_FUNCTION_NAME: 'cost-reporter',
        SECRETS_ENCRYPTED: 'false',
        WEBHOOK_ENDPOINT: WEBHOOK,
        CHANNEL_NAME: CHANNEL,
      },
      decrypter
    );

    expect(config.webhookEndpoint).toBe(WEBHOOK);
    expect(decrypter.calls).toEqual([]);
  });

  it('should decrypt locally when asked to', async () => {
    const decrypter = fakeDecrypter();

    const config = await loadConfig(
      { SECRETS_ENCRYPTED: 'true', WEBHOOK_ENDPOINT: encode(WEBHOOK), CHANNEL_NAME: encode(CHANNEL) },
      decrypter
    );

    expect(config.mode).toBe('local');
    expect(config.channelName).toBe(CHANNEL);
  });

  it('should list every missing variable', async () => {
    const result = loadConfig({});

    await expect(result).rejects.toBeInstanceOf(ConfigError);
    await expect(result).rejects.toThrow(
      'Invalid configuration: WEBHOOK_ENDPOINT is required; CHANNEL_NAME is required'
    );
  });

  it('should reject empty values', async () => {
    await expect(loadConfig({ WEBHOOK_ENDPOINT: '', CHANNEL_NAME: CHANNEL })).rejects.toThrow(
      'Invalid configuration: WEBHOOK_ENDPOINT must not be empty'
    );
  });

  it('should reject an unknown SECRETS_ENCRYPTED value', async () => {
    await expect(
      loadConfig({ WEBHOOK_ENDPOINT: WEBHOOK, CHANNEL_NAME: CHANNEL, SECRETS_ENCRYPTED: 'yes' })
    ).rejects.toThrow("Invalid configuration: SECRETS_ENCRYPTED must be 'true' or 'false'");
  });

  it('should reject encrypted values that are not base64', async () => {
    const result = loadConfig(
      { AWS_LAMBDA_FUNCTION_NAME: 'cost-reporter', WEBHOOK_ENDPOINT: WEBHOOK, CHANNEL_NAME: CHANNEL },
      fakeDecrypter()
    );

    await expect(result).rejects.toMatchObject({
      stage: 'config',
      message: 'Failed to decode WEBHOOK_ENDPOINT as Base64',
    });
  });

  it('should wrap decryption failures', async () => {
    const decrypter: Decrypter = {
      decrypt: async () => {
        throw new Error('AccessDeniedException');
      },
    };

    await expect(
      loadConfig(
        { AWS_LAMBDA_FUNCTION_NAME: 'cost-reporter', WEBHOOK_ENDPOINT: encode(WEBHOOK), CHANNEL_NAME: encode(CHANNEL) },
        decrypter
      )
    ).rejects.toThrow('Failed to decrypt WEBHOOK_ENDPOINT: AccessDeniedException');
  });

  it('should require a decrypter for encrypted secrets', async () => {
    await expect(
      loadConfig({ SECRETS_ENCRYPTED: 'true', WEBHOOK_ENDPOINT: encode(WEBHOOK), CHANNEL_NAME: encode(CHANNEL) })
    ).rejects.toThrow('Secrets are encrypted but no decrypter is available');
  });

  describe('isBase64', () => {
    it('should accept padded base64', () => {
      expect(isBase64(encode('a'))).toBe(true);
      expect(isBase64('AQIDBA==')).toBe(true);
    });

    it('should reject other strings', () => {
      expect(isBase64('')).toBe(false);
      expect(isBase64('abc')).toBe(false);
      expect(isBase64(WEBHOOK)).toBe(false);
    });
  });
});
