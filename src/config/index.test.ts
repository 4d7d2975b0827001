import { describe, expect, it } from 'vitest';
import { parseConfig } from './index.js';

const required = { DATABASE_URL: 'postgres://localhost/chat', JWT_SECRET: 'test-secret' };

describe('parseConfig', () => {
  it('applies defaults', () => {
    const cfg = parseConfig(required);
    expect(cfg.PORT).toBe(3000);
    expect(cfg.UPLOAD_DIR).toBe('./data/uploads');
    expect(cfg.MAX_UPLOAD_SIZE_BYTES).toBe(10_485_760);
    expect(cfg.HEARTBEAT_TIMEOUT_MS).toBe(90_000);
    expect(cfg.SEED_BOTS).toBe(true);
    expect(cfg.AGENT_RUNNER_URL).toBeUndefined();
  });

  it('coerces numbers and flags from strings', () => {
    const cfg = parseConfig({ ...required, PORT: '8080', SEED_BOTS: 'false', AGENT_TIMEOUT_MS: '5000' });
    expect(cfg.PORT).toBe(8080);
    expect(cfg.SEED_BOTS).toBe(false);
    expect(cfg.AGENT_TIMEOUT_MS).toBe(5000);
  });

  it('requires the database URL and JWT secret', () => {
    expect(() => parseConfig({ DATABASE_URL: 'postgres://localhost/chat' })).toThrow();
    expect(() => parseConfig({ JWT_SECRET: 'test-secret' })).toThrow();
  });

  it('rejects malformed URLs', () => {
    expect(() => parseConfig({ ...required, PUSH_GATEWAY_URL: 'not a url' })).toThrow();
  });
});
