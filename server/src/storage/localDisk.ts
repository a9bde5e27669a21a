import fs from 'fs/promises';
import path from 'path';
import type { AudioDisk } from './disk';
import { joinStoragePath } from './paths';

type LocalDiskOptions = {
  root: string;
  publicUrl: string;
};

const isMissingFileError = (error: unknown): boolean =>
  !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT';

const encodePath = (storagePath: string) => storagePath.split('/').map(encodeURIComponent).join('/');

export const createLocalDisk = (options: LocalDiskOptions): AudioDisk => {
  const root = path.resolve(options.root);
  const publicUrl = options.publicUrl.replace(/\/+$/, '');

  const resolve = (storagePath: string) => {
    const absolute = path.resolve(root, storagePath);
    if (absolute !== root && !absolute.startsWith(`${root}${path.sep}`)) {
      throw new Error(`Path escapes the storage root: ${storagePath}`);
    }
    return absolute;
  };

  return {
    async put(storagePath, contents) {
      const absolute = resolve(storagePath);
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, contents);
    },

    url(storagePath) {
      return `${publicUrl}/${encodePath(storagePath)}`;
    },

    async files(prefix) {
      let entries;
      try {
        entries = await fs.readdir(resolve(prefix), { withFileTypes: true });
      } catch (error) {
        if (isMissingFileError(error)) return [];
        throw error;
      }

      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => joinStoragePath(prefix, entry.name))
        .sort();
    },

    async lastModified(storagePath) {
      const stats = await fs.stat(resolve(storagePath));
      return stats.mtime;
    },

    async delete(storagePath) {
      try {
        await fs.unlink(resolve(storagePath));
      } catch (error) {
        if (isMissingFileError(error)) return;
        throw error;
      }
    },
  };
};
