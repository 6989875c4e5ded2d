import { Readable } from 'node:stream';
import type { ReadableStream } from 'node:stream/web';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';

export type ImageType = 'jpg' | 'png' | 'webp' | 'gif' | 'unknown';

const MAGIC_MAP: Array<{ type: ImageType; bytes: number[]; offset?: number }> = [
  { type: 'jpg', bytes: [0xff, 0xd8, 0xff] },
  { type: 'png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { type: 'gif', bytes: [0x47, 0x49, 0x46, 0x38] },
  { type: 'webp', bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
];

export const detectImageType = async (filePath: string): Promise<ImageType> => {
  const fd = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(16);
    const { bytesRead } = await fs.read(fd, buffer, 0, buffer.length, 0);
    const header = buffer.subarray(0, bytesRead);
    for (const sig of MAGIC_MAP) {
      const start = sig.offset ?? 0;
      const sample = header.subarray(start, start + sig.bytes.length);
      if (sample.length < sig.bytes.length) continue;
      if (sig.bytes.every((value, idx) => sample[idx] === value)) {
        return sig.type;
      }
    }
    return 'unknown';
  } finally {
    await fs.close(fd);
  }
};

export type ThumbnailFetcher = (url: string, destination: string, signal?: AbortSignal) => Promise<string>;

/**
 * Downloads a thumbnail image over HTTP into `destination`.
 */
export const fetchThumbnail: ThumbnailFetcher = async (url, destination, signal) => {
  const response = await fetch(url, { signal });
  if (!response.ok || !response.body) {
    throw new Error(`Unexpected response status ${response.status}`);
  }
  const readable = Readable.fromWeb(response.body as ReadableStream);
  await pipeline(readable, fs.createWriteStream(destination));
  return destination;
};
