import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from './app';
import type { TtsService } from './api/tts/tts.service';
import type { ConfigEnv } from './config';
import { ok } from './utils/result';
import { createTestConfig, silentLogger } from './test/fixtures';

const buildApp = (env: ConfigEnv = {}) => {
  const ttsService: TtsService = {
    synthesize: vi.fn<TtsService['synthesize']>().mockResolvedValue(ok('http://files.test/audio/tts_1.mp3')),
    listVoices: vi.fn<TtsService['listVoices']>().mockResolvedValue(ok([])),
  };
  return createApp({ config: createTestConfig(env), ttsService, logger: silentLogger });
};

const TOO_MANY = { success: false, message: 'too many requests, try again later' };

describe('app (rate limit wiring)', () => {
  it('allows ten synthesis requests per minute and rejects the eleventh', async () => {
    const app = buildApp();

    for (let i = 0; i < 10; i += 1) {
      const res = await request(app).post('/api/tts').send({ text: `request ${i}` });
      expect(res.statusCode).toBe(200);
    }

    const res = await request(app).post('/api/tts').send({ text: 'one too many' });
    expect(res.statusCode).toBe(429);
    expect(res.body).toEqual(TOO_MANY);
  });

  it('counts voice listings separately from synthesis', async () => {
    const app = buildApp({ TTS_RATE_LIMIT_PER_MINUTE: '1', VOICES_RATE_LIMIT_PER_MINUTE: '2' });

    expect((await request(app).post('/api/tts').send({ text: 'hi' })).statusCode).toBe(200);
    expect((await request(app).post('/api/tts').send({ text: 'hi' })).statusCode).toBe(429);

    expect((await request(app).get('/api/voices')).statusCode).toBe(200);
    expect((await request(app).get('/api/voices')).statusCode).toBe(200);
    const limited = await request(app).get('/api/voices');
    expect(limited.statusCode).toBe(429);
    expect(limited.body).toEqual(TOO_MANY);
  });

  it('adds standard RateLimit headers', async () => {
    const res = await request(buildApp()).get('/api/voices');

    expect(res.statusCode).toBe(200);
    expect(res.headers['ratelimit-limit']).toBe('30');
    expect(res.headers['ratelimit-remaining']).toBe('29');
    expect(res.headers).toHaveProperty('ratelimit-reset');
  });

  it('mounts no limiter when RATE_LIMIT_ENABLED=false', async () => {
    const app = buildApp({ RATE_LIMIT_ENABLED: 'false', TTS_RATE_LIMIT_PER_MINUTE: '1' });

    for (let i = 0; i < 3; i += 1) {
      const res = await request(app).post('/api/tts').send({ text: 'hi' });
      expect(res.statusCode).toBe(200);
      expect(res.headers).not.toHaveProperty('ratelimit-limit');
    }
  });

  it('leaves the health check unlimited', async () => {
    const res = await request(buildApp()).get('/api/health');

    expect(res.statusCode).toBe(200);
    expect(res.headers).not.toHaveProperty('ratelimit-limit');
  });
});
