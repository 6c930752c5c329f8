import { parseConfig } from '../../src/config/env.js';

const base = { MONGO_URI: 'mongodb://localhost:27017/courses', JWT_SECRET: 'test-secret' };

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig(base);

    expect(config).toEqual({
      nodeEnv: 'development',
      port: 8000,
      mongoUri: 'mongodb://localhost:27017/courses',
      jwtSecret: 'test-secret',
      corsOrigins: ['http://localhost:3000'],
      rateLimit: { max: 300, windowMs: 15 * 60 * 1000 },
      allowCompletionAfterExpiry: true,
      lessonBatchMaxRetries: 3,
    });
  });

  it('should parse overrides', () => {
    const config = parseConfig({
      ...base,
      PORT: '9100',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      ALLOW_COMPLETION_AFTER_EXPIRY: 'false',
      LESSON_BATCH_MAX_RETRIES: '0',
    });

    expect(config.port).toBe(9100);
    expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.allowCompletionAfterExpiry).toBe(false);
    expect(config.lessonBatchMaxRetries).toBe(0);
  });

  it('should reject a missing database URI', () => {
    expect(() => parseConfig({ JWT_SECRET: 'test-secret' })).toThrow(/^Invalid environment configuration: MONGO_URI/);
  });

  it('should reject a short secret', () => {
    expect(() => parseConfig({ ...base, JWT_SECRET: 'short' })).toThrow('JWT_SECRET must be at least 8 characters');
  });
});
