import { createApp } from './app';
import { createAudioCleanupService } from './api/tts/audioCleanup.service';
import type { AudioCleanupService } from './api/tts/audioCleanup.service';
import { createTtsService } from './api/tts/tts.service';
import { loadConfig } from './config';
import { createDisk } from './storage/disk';
import { createLogger } from './utils/logger';
import type { Logger } from './utils/logger';

const scheduleAudioCleanup = (cleanupService: AudioCleanupService, intervalMinutes: number, logger: Logger) => {
  if (intervalMinutes === 0) return null;

  const run = () =>
    cleanupService
      .cleanup()
      .then((result) => {
        if (!result.ok) logger.error({ err: result.error }, 'scheduled audio cleanup failed');
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'scheduled audio cleanup crashed');
      });

  const timer = setInterval(run, intervalMinutes * 60_000);
  timer.unref();
  return timer;
};

const start = () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const disk = createDisk(config);
  const ttsService = createTtsService({
    settings: config.elevenLabs,
    disk,
    storagePath: config.audioStorage.path,
    logger: logger.child({ component: 'tts' }),
  });
  const cleanupService = createAudioCleanupService({
    disk,
    storagePath: config.audioStorage.path,
    ttlMinutes: config.audioStorage.ttlMinutes,
    logger: logger.child({ component: 'audio-cleanup' }),
  });

  const app = createApp({ config, ttsService, logger });
  const cleanupTimer = scheduleAudioCleanup(cleanupService, config.audioStorage.cleanupIntervalMinutes, logger);

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, disk: config.audioStorage.disk, ttl_minutes: config.audioStorage.ttlMinutes },
      'speech gateway listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    if (cleanupTimer) clearInterval(cleanupTimer);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

try {
  start();
} catch (error) {
  // Configuration errors (e.g. a missing API key) are fatal.
  console.error('Failed to start server:', error);
  process.exit(1);
}
