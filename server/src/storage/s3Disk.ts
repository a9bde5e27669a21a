import {
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import type { Config } from '../config';
import type { AudioDisk } from './disk';

type S3DiskConfig = Config['s3'];

const buildBaseUrl = (protocol: 'http' | 'https', host: string, port: number): string => {
  if ((protocol === 'http' && port === 80) || (protocol === 'https' && port === 443)) {
    return `${protocol}://${host}`;
  }
  return `${protocol}://${host}:${port}`;
};

const isMissingObjectError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');

export const createS3Client = (config: S3DiskConfig): S3Client => {
  const protocol = config.useSsl ? 'https' : 'http';
  return new S3Client({
    endpoint: buildBaseUrl(protocol, config.endpoint, config.port),
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    forcePathStyle: true, // Necessary for MinIO, Garage, etc.
  });
};

export const createS3Disk = (config: S3DiskConfig, client: S3Client = createS3Client(config)): AudioDisk => {
  const protocol = config.useSsl ? 'https' : 'http';
  const publicBase = config.publicUrl || buildBaseUrl(protocol, `${config.bucketName}.${config.webEndpoint}`, config.webPort);

  return {
    async put(key, contents) {
      const upload = new Upload({
        client,
        params: {
          Bucket: config.bucketName,
          Key: key,
          Body: contents,
          ContentType: 'audio/mpeg',
        },
      });

      await upload.done();
    },

    url(key) {
      return `${publicBase}/${key}`;
    },

    async files(prefix) {
      const keyPrefix = prefix ? `${prefix.replace(/\/+$/, '')}/` : '';
      const keys: string[] = [];
      let continuationToken: string | undefined;

      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: config.bucketName,
            Prefix: keyPrefix,
            Delimiter: '/',
            ContinuationToken: continuationToken,
          })
        );
        for (const object of page.Contents ?? []) {
          if (object.Key && object.Key !== keyPrefix) keys.push(object.Key);
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);

      return keys.sort();
    },

    async lastModified(key) {
      const head = await client.send(new HeadObjectCommand({ Bucket: config.bucketName, Key: key }));
      if (!head.LastModified) {
        throw new Error(`S3 object has no LastModified: ${key}`);
      }
      return head.LastModified;
    },

    async delete(key) {
      try {
        await client.send(new DeleteObjectCommand({ Bucket: config.bucketName, Key: key }));
      } catch (error) {
        if (isMissingObjectError(error)) return;
        throw error;
      }
    },
  };
};
