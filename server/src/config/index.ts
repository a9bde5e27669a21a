import dotenv from 'dotenv';

type TrustProxySetting = boolean | number | string;

export type AudioDiskName = 'public' | 's3';

export type VoiceSettings = {
  stability: number;
  similarity_boost: number;
  style: number;
  use_speaker_boost: boolean;
};

export type ElevenLabsConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutSeconds: number;
  defaultVoiceId: string;
  modelId: string;
  voiceSettings: VoiceSettings;
};

export type AudioStorageConfig = {
  disk: AudioDiskName;
  path: string;
  ttlMinutes: number;
  cleanupIntervalMinutes: number;
  // Only used by the `public` disk.
  root: string;
  publicUrl: string;
};

export type S3Config = {
  endpoint: string;
  webEndpoint: string;
  port: number;
  webPort: number;
  accessKeyId: string;
  secretAccessKey: string;
  bucketName: string;
  useSsl: boolean;
  region: string;
  publicUrl: string;
};

export type RateLimitConfig = {
  enabled: boolean;
  windowMs: number;
  ttsPerWindow: number;
  voicesPerWindow: number;
};

export type AppConfig = {
  env: string;
  port: number;
  logLevel: string;
  trustProxy: TrustProxySetting;
  cors: {
    allowedOrigins: string[];
    allowAnyOrigin: boolean;
  };
  rateLimit: RateLimitConfig;
  elevenLabs: ElevenLabsConfig;
  audioStorage: AudioStorageConfig;
  s3: S3Config;
};

export type ConfigEnv = Record<string, string | undefined>;

export const DEFAULT_BASE_URL = 'https://api.elevenlabs.io/v1';
export const DEFAULT_VOICE_ID = '21m00Tcm4TlvDq8ikWAM';
export const DEFAULT_MODEL_ID = 'eleven_multilingual_v2';

const parseInteger = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseNonNegativeInteger = (raw: string | undefined, fallback: number): number => {
  const parsed = parseInteger(raw, fallback);
  return parsed < 0 ? fallback : parsed;
};

const parsePositiveInteger = (raw: string | undefined, fallback: number): number => {
  const parsed = parseInteger(raw, fallback);
  return parsed > 0 ? parsed : fallback;
};

const parseFloatInRange = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) return fallback;
  return parsed;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return fallback;
};

const parseCsv = (raw: string | undefined): string[] =>
  (raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

const parseTrustProxy = (raw: string | undefined): TrustProxySetting => {
  if (raw === undefined || raw.trim() === '') {
    // Only trust loopback proxies unless told otherwise.
    return 'loopback';
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  if (/^\d+$/.test(normalized)) return Number.parseInt(normalized, 10);
  return raw.trim();
};

const parseDisk = (raw: string | undefined): AudioDiskName => {
  const normalized = (raw || '').trim().toLowerCase();
  if (!normalized || normalized === 'public' || normalized === 'local') return 'public';
  if (normalized === 's3') return 's3';
  throw new Error(`Unsupported AUDIO_STORAGE_DISK: ${raw}`);
};

const stripTrailingSlashes = (raw: string): string => raw.trim().replace(/\/+$/, '');

const stripSlashes = (raw: string): string => raw.trim().replace(/^\/+|\/+$/g, '');

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

const deepFreeze = <T extends object>(value: T): T => {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) deepFreeze(child);
  }
  Object.freeze(value);
  return value;
};

export type Config = DeepReadonly<AppConfig>;

export const createConfig = (env: ConfigEnv = process.env): Config => {
  const isProduction = (env.NODE_ENV || '').toLowerCase() === 'production';
  const isTest = (env.NODE_ENV || '').toLowerCase() === 'test';

  const apiKey = (env.ELEVEN_API_KEY || '').trim();
  if (!apiKey) {
    throw new Error('Missing required env: ELEVEN_API_KEY');
  }

  const port = parseInteger(env.PORT, 3000);
  const corsOrigins = parseCsv(env.CORS_ORIGINS);

  const config: AppConfig = {
    env: env.NODE_ENV || 'development',
    port,
    logLevel: env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    cors: {
      allowAnyOrigin: corsOrigins.includes('*') || (!isProduction && corsOrigins.length === 0),
      allowedOrigins: corsOrigins.filter((o) => o !== '*'),
    },
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      windowMs: 60 * 1000,
      ttsPerWindow: parseInteger(env.TTS_RATE_LIMIT_PER_MINUTE, 10),
      voicesPerWindow: parseInteger(env.VOICES_RATE_LIMIT_PER_MINUTE, 30),
    },
    elevenLabs: {
      apiKey,
      baseUrl: stripTrailingSlashes(env.ELEVEN_API_BASE_URL || DEFAULT_BASE_URL),
      timeoutSeconds: parsePositiveInteger(env.ELEVEN_API_TIMEOUT, 30),
      defaultVoiceId: (env.ELEVEN_VOICE_ID || '').trim() || DEFAULT_VOICE_ID,
      modelId: (env.ELEVEN_MODEL_ID || '').trim() || DEFAULT_MODEL_ID,
      voiceSettings: {
        stability: parseFloatInRange(env.ELEVEN_VOICE_STABILITY, 0.5),
        similarity_boost: parseFloatInRange(env.ELEVEN_VOICE_SIMILARITY_BOOST, 0.75),
        style: parseFloatInRange(env.ELEVEN_VOICE_STYLE, 0),
        use_speaker_boost: parseBoolean(env.ELEVEN_VOICE_SPEAKER_BOOST, true),
      },
    },
    audioStorage: {
      disk: parseDisk(env.AUDIO_STORAGE_DISK),
      path: stripSlashes(env.AUDIO_STORAGE_PATH || '') || 'audio',
      ttlMinutes: parseNonNegativeInteger(env.ELEVEN_AUDIO_TTL, 60),
      cleanupIntervalMinutes: parseNonNegativeInteger(env.AUDIO_CLEANUP_INTERVAL_MINUTES, 15),
      root: env.AUDIO_STORAGE_ROOT || 'storage/public',
      publicUrl: `${stripTrailingSlashes(env.APP_URL || `http://localhost:${port}`)}/storage`,
    },
    s3: {
      endpoint: env.S3_ENDPOINT || 'localhost',
      webEndpoint: env.S3_WEB_ENDPOINT || 'web.garage.localhost',
      port: parseInteger(env.S3_PORT, 3900), // API port
      webPort: parseInteger(env.S3_WEB_PORT, 3902), // public web port
      accessKeyId: env.S3_ACCESS_KEY_ID || '',
      secretAccessKey: env.S3_SECRET_ACCESS_KEY || '',
      bucketName: env.S3_BUCKET_NAME || 'speechgate',
      useSsl: parseBoolean(env.S3_USE_SSL, false),
      region: env.S3_REGION || 'garage',
      publicUrl: stripTrailingSlashes(env.S3_PUBLIC_URL || ''),
    },
  };

  if (config.audioStorage.disk === 's3' && (!config.s3.accessKeyId || !config.s3.secretAccessKey)) {
    throw new Error('Missing required S3 credentials (S3_ACCESS_KEY_ID/S3_SECRET_ACCESS_KEY)');
  }

  return deepFreeze(config);
};

export const loadConfig = (): Config => {
  dotenv.config();
  return createConfig(process.env);
};
