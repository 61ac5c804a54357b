import { parseServiceAccount, validate } from '../../src/config/env.validation';

describe('validate', () => {
  it('applies defaults around the required credentials', () => {
    expect(validate({ GOOGLE_CREDENTIALS_FILE: '/secrets/test-credentials.json' })).toEqual({
      PORT: 8080,
      EXCHANGE_API_URL: 'https://api.binance.us/api/v3',
      EXCHANGE_TIMEOUT_MS: 10000,
      EXCHANGE_MAX_CONCURRENCY: 0,
      QUOTE_ASSET: 'USDT',
      GOOGLE_CREDENTIALS_FILE: '/secrets/test-credentials.json',
      SHEET_NAME: 'Crypto_Tracker',
      UPDATE_INTERVAL_MS: 5000,
      CONTINUE_ON_ERROR: false,
    });
  });

  it('coerces numeric and boolean strings', () => {
    const env = validate({
      GOOGLE_CREDENTIALS_FILE: '/secrets/test-credentials.json',
      UPDATE_INTERVAL_MS: '2500',
      EXCHANGE_MAX_CONCURRENCY: '8',
      CONTINUE_ON_ERROR: 'true',
    });

    expect(env.UPDATE_INTERVAL_MS).toBe(2500);
    expect(env.EXCHANGE_MAX_CONCURRENCY).toBe(8);
    expect(env.CONTINUE_ON_ERROR).toBe(true);
  });

  it('drops variables it does not know about', () => {
    const env = validate({ GOOGLE_CREDENTIALS_FILE: '/secrets/test-credentials.json', HOME: '/root' });

    expect(env).not.toHaveProperty('HOME');
  });

  it('requires a credentials source', () => {
    expect(() => validate({})).toThrow(
      'Invalid environment configuration: GOOGLE_CREDENTIALS_FILE: Set GOOGLE_CREDENTIALS_FILE or GOOGLE_CREDENTIALS',
    );
  });

  it('rejects inline credentials that are not JSON', () => {
    expect(() => validate({ GOOGLE_CREDENTIALS: 'not-json' })).toThrow(
      'Invalid environment configuration: GOOGLE_CREDENTIALS: GOOGLE_CREDENTIALS is not valid JSON',
    );
  });

  it('rejects a negative pause', () => {
    expect(() =>
      validate({ GOOGLE_CREDENTIALS_FILE: '/secrets/test-credentials.json', UPDATE_INTERVAL_MS: '-1' }),
    ).toThrow(/UPDATE_INTERVAL_MS/);
  });
});

describe('parseServiceAccount', () => {
  it('keeps the service account fields', () => {
    const raw = JSON.stringify({
      type: 'service_account',
      client_email: 'tracker@test.invalid',
      private_key: 'test-key',
      universe_domain: 'googleapis.com',
    });

    expect(parseServiceAccount(raw)).toEqual({
      type: 'service_account',
      client_email: 'tracker@test.invalid',
      private_key: 'test-key',
    });
  });

  it('rejects JSON without a private key', () => {
    expect(() => parseServiceAccount('{"client_email":"tracker@test.invalid"}')).toThrow(
      /^GOOGLE_CREDENTIALS is not a service account key/,
    );
  });
});
