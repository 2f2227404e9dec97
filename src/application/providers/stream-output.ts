import { once } from 'events';
import { Writable } from 'stream';
import { finished } from 'stream/promises';

/**
 * Writes a chunk and waits for the stream to accept more when its buffer is full.
 */
export async function writeChunk(output: Writable, chunk: string): Promise<void> {
  if (output.errored) {
    throw output.errored;
  }
  if (chunk.length === 0) {
    return;
  }
  if (!output.write(chunk)) {
    await once(output, 'drain');
  }
}

/**
 * Ends the writable side and waits until everything has been flushed.
 */
export async function endOutput(output: Writable, trailer = ''): Promise<void> {
  output.end(trailer);
  await finished(output, { readable: false });
}
