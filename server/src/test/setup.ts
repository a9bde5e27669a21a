import { vi } from 'vitest';

// Prevent tests from making real S3 network calls via @aws-sdk/lib-storage Upload.
// Individual tests (e.g. src/storage/s3Disk.test.ts) can still override this mock.
vi.mock('@aws-sdk/lib-storage', () => ({
  Upload: vi.fn().mockImplementation(function (this: { done: () => Promise<unknown> }) {
    this.done = vi.fn().mockResolvedValue({});
  }),
}));
