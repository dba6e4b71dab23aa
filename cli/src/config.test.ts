import { getConfig } from './config';

describe('getConfig', () => {
  it('should read the API URL and default the timeout', () => {
    expect(getConfig({ TXDOCS_API_URL: 'https://api.example.test/prod/' })).toEqual({
      apiBaseUrl: 'https://api.example.test/prod',
      timeoutMs: 60000,
    });
  });

  it('should read a custom timeout', () => {
    expect(getConfig({ TXDOCS_API_URL: 'http://localhost:3000', TXDOCS_TIMEOUT_MS: '1500' }).timeoutMs).toBe(1500);
  });

  it('should require the API URL', () => {
    expect(() => getConfig({})).toThrow('TXDOCS_API_URL is not set');
  });

  it.each(['0', '-5', 'soon', '1.5'])('should reject timeout %s', (timeout) => {
    expect(() => getConfig({ TXDOCS_API_URL: 'http://localhost:3000', TXDOCS_TIMEOUT_MS: timeout }))
      .toThrow('TXDOCS_TIMEOUT_MS must be a positive integer');
  });
});
