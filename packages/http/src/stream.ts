import type { Readable } from 'node:stream';

/**
 * Read a stream to the end and destroy it, whether or not reading succeeded.
 */
export async function readBytesAndClose(stream: Readable): Promise<Buffer> {
  try {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  } finally {
    stream.destroy();
  }
}

export async function readTextAndClose(stream: Readable, encoding: BufferEncoding = 'utf8'): Promise<string> {
  const bytes = await readBytesAndClose(stream);
  return bytes.toString(encoding);
}
