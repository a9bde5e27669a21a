import { describe, it, expect, vi } from 'vitest';
import { createAudioCleanupService } from './audioCleanup.service';
import { AudioStorageError } from '../../utils/errors';
import { createMemoryDisk } from '../../test/memoryDisk';
import { silentLogger } from '../../test/fixtures';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60_000);

const createService = (disk = createMemoryDisk(), ttlMinutes = 60) =>
  createAudioCleanupService({ disk, storagePath: 'audio', ttlMinutes, logger: silentLogger, now: () => NOW });

describe('audioCleanup.service', () => {
  it('keeps everything without touching storage when the TTL is 0', async () => {
    const disk = createMemoryDisk();
    disk.seed('audio/tts_old.mp3', minutesAgo(60 * 24 * 365));
    const filesSpy = vi.spyOn(disk, 'files');
    const deleteSpy = vi.spyOn(disk, 'delete');

    const result = await createService(disk, 0).cleanup();

    expect(result).toEqual({ ok: true, value: 0 });
    expect(filesSpy).not.toHaveBeenCalled();
    expect(deleteSpy).not.toHaveBeenCalled();
    expect(disk.objects.size).toBe(1);
  });

  it('deletes only files modified strictly before now - TTL', async () => {
    const disk = createMemoryDisk();
    disk.seed('audio/tts_a.mp3', minutesAgo(61));
    disk.seed('audio/tts_b.mp3', minutesAgo(60 * 24));
    disk.seed('audio/tts_c.mp3', minutesAgo(60));
    disk.seed('audio/tts_d.mp3', minutesAgo(5));
    disk.seed('other/tts_e.mp3', minutesAgo(600));

    const result = await createService(disk).cleanup();

    expect(result).toEqual({ ok: true, value: 2 });
    expect([...disk.objects.keys()].sort()).toEqual(['audio/tts_c.mp3', 'audio/tts_d.mp3', 'other/tts_e.mp3']);
  });

  it('returns 0 when the storage path is empty', async () => {
    expect(await createService().cleanup()).toEqual({ ok: true, value: 0 });
  });

  it('skips files it cannot delete and returns the partial count', async () => {
    const disk = createMemoryDisk();
    disk.seed('audio/tts_a.mp3', minutesAgo(120));
    disk.seed('audio/tts_b.mp3', minutesAgo(120));
    disk.seed('audio/tts_c.mp3', minutesAgo(120));
    const realDelete = disk.delete.bind(disk);
    disk.delete = vi.fn(async (path: string) => {
      if (path === 'audio/tts_b.mp3') throw new Error('EACCES');
      await realDelete(path);
    });

    const result = await createService(disk).cleanup();

    expect(result).toEqual({ ok: true, value: 2 });
    expect([...disk.objects.keys()]).toEqual(['audio/tts_b.mp3']);
  });

  it('skips files that vanish between listing and inspection', async () => {
    const disk = createMemoryDisk();
    disk.seed('audio/tts_a.mp3', minutesAgo(120));
    disk.seed('audio/tts_b.mp3', minutesAgo(120));
    vi.spyOn(disk, 'files').mockResolvedValue(['audio/tts_a.mp3', 'audio/tts_gone.mp3', 'audio/tts_b.mp3']);

    const result = await createService(disk).cleanup();

    expect(result).toEqual({ ok: true, value: 2 });
    expect(disk.objects.size).toBe(0);
  });

  it('returns a storage error when listing fails', async () => {
    const disk = createMemoryDisk();
    const cause = new Error('AccessDenied');
    vi.spyOn(disk, 'files').mockRejectedValue(cause);

    const result = await createService(disk).cleanup();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AudioStorageError);
    expect(result.error.message).toBe('failed to list stored audio under "audio"');
    expect(result.error.cause).toBe(cause);
  });
});
