/**
 * Web stream helpers
 */

/**
 * Iterate a web ReadableStream. Aborting the signal cancels the stream
 * so a stalled read returns instead of hanging.
 */
export async function* readChunks(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch((err: unknown) => {
      console.error('[streams] cancel failed:', err);
    });
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    while (signal?.aborted !== true) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      yield value;
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    reader.releaseLock();
  }
}

/**
 * Iterate an in-memory buffer as a single chunk
 */
export async function* bufferChunks(buffer: Uint8Array): AsyncGenerator<Uint8Array> {
  yield buffer;
}
