import type { Logger } from 'pino';
import type { AudioDisk } from '../../storage/disk';
import { AudioStorageError } from '../../utils/errors';
import { err, ok } from '../../utils/result';
import type { Result } from '../../utils/result';

type AudioCleanupDeps = {
  disk: AudioDisk;
  storagePath: string;
  ttlMinutes: number;
  logger: Logger;
  now?: () => Date;
};

export const createAudioCleanupService = ({ disk, storagePath, ttlMinutes, logger, now = () => new Date() }: AudioCleanupDeps) => ({
  /**
   * Deletes stored audio last modified strictly before `now - ttlMinutes` and resolves to the
   * number of files removed. A TTL of 0 keeps everything. Files that cannot be inspected or
   * deleted are logged and skipped, so the count may be partial.
   */
  async cleanup(): Promise<Result<number, AudioStorageError>> {
    if (ttlMinutes === 0) return ok(0);

    const threshold = now().getTime() - ttlMinutes * 60_000;

    let files: string[];
    try {
      files = await disk.files(storagePath);
    } catch (error) {
      logger.error({ err: error, path: storagePath }, 'failed to list stored audio');
      return err(new AudioStorageError(`failed to list stored audio under "${storagePath}"`, { cause: error }));
    }

    let deleted = 0;
    for (const file of files) {
      try {
        const modifiedAt = await disk.lastModified(file);
        if (modifiedAt.getTime() >= threshold) continue;

        await disk.delete(file);
        deleted += 1;
      } catch (error) {
        logger.warn({ err: error, file }, 'skipping stored audio during cleanup');
      }
    }

    logger.info({ deleted, scanned: files.length, ttl_minutes: ttlMinutes }, `cleaned up ${deleted} old audio files`);
    return ok(deleted);
  },
});

export type AudioCleanupService = ReturnType<typeof createAudioCleanupService>;
