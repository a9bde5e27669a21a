import type { Config } from '../config';
import { createLocalDisk } from './localDisk';
import { createS3Disk } from './s3Disk';

/**
 * Storage capabilities the synthesizer and the sweeper need. Paths are `/`-separated and
 * relative to the disk root, e.g. `audio/tts_<uuid>.mp3`.
 */
export interface AudioDisk {
  put(path: string, contents: Buffer): Promise<void>;
  /** Public URL for a stored path. Does not check that the object exists. */
  url(path: string): string;
  /** Objects directly under `prefix`, sorted by path. */
  files(prefix: string): Promise<string[]>;
  lastModified(path: string): Promise<Date>;
  /** Removing an object that is already gone succeeds. */
  delete(path: string): Promise<void>;
}

export const createDisk = (config: Config): AudioDisk => {
  if (config.audioStorage.disk === 's3') {
    return createS3Disk(config.s3);
  }
  return createLocalDisk({ root: config.audioStorage.root, publicUrl: config.audioStorage.publicUrl });
};
