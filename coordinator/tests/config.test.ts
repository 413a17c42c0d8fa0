import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.allowedOrigins).toEqual(['http://localhost:3000']);
    expect(config.adminIdentity).toBe('admin');
    expect(config.contributionReward).toBe(10);
    expect(config.stateFile).toBeUndefined();
    expect(config.chain.simulation).toBe(true);
    expect(config.contentStore).toEqual({
      publisherUrl: undefined,
      aggregatorUrl: undefined,
      timeoutMs: 10000,
      retries: 3
    });
    expect(config.rateLimit).toEqual({ points: 100, duration: 60, redisUrl: undefined });
  });

  it('should parse overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test',
      CONTRIBUTION_REWARD: '25',
      STATE_FILE: '',
      CONTENT_STORE_URL: 'http://store.test',
      BLOCKCHAIN_SIMULATION: 'false',
      RATE_LIMIT_POINTS: '5'
    });

    expect(config.port).toBe(8080);
    expect(config.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.contributionReward).toBe(25);
    expect(config.stateFile).toBeUndefined();
    expect(config.contentStore.aggregatorUrl).toBe('http://store.test');
    expect(config.chain.simulation).toBe(false);
    expect(config.rateLimit.points).toBe(5);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow();
    expect(() => loadConfig({ BLOCKCHAIN_SIMULATION: 'maybe' })).toThrow();
  });
});
