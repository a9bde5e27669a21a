import pino from 'pino';
import { createConfig } from '../config';
import type { ConfigEnv } from '../config';

export const TEST_ENV: ConfigEnv = {
  NODE_ENV: 'test',
  ELEVEN_API_KEY: 'test-api-key',
};

export const createTestConfig = (overrides: ConfigEnv = {}) => createConfig({ ...TEST_ENV, ...overrides });

export const silentLogger = pino({ level: 'silent' });

export type FakeFetchResponse = {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
  arrayBuffer: () => Promise<ArrayBuffer>;
};

export const audioResponse = (bytes: Buffer): FakeFetchResponse => ({
  ok: true,
  status: 200,
  text: async () => bytes.toString('latin1'),
  arrayBuffer: async () => {
    const copy = new ArrayBuffer(bytes.length);
    new Uint8Array(copy).set(bytes);
    return copy;
  },
});

export const jsonResponse = (status: number, body: unknown): FakeFetchResponse => ({
  ok: status >= 200 && status < 300,
  status,
  text: async () => JSON.stringify(body),
  arrayBuffer: async () => new ArrayBuffer(0),
});
