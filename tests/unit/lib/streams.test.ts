/**
 * Web stream helpers
 */

import { describe, it, expect } from 'vitest';

import { readChunks } from '@/lib/streams.js';

import { bytes, streamOf } from '../../helpers/test-utils.js';

describe('readChunks', () => {
  it('yields every chunk in order', async () => {
    const sizes: number[] = [];
    for await (const chunk of readChunks(streamOf(bytes(1), bytes(2), bytes(3)))) {
      sizes.push(chunk.byteLength);
    }

    expect(sizes).toEqual([1, 2, 3]);
  });

  it('returns from a stalled read when the signal aborts', async () => {
    const controller = new AbortController();
    const stalled = new ReadableStream<Uint8Array>({
      start(source) {
        source.enqueue(bytes(4));
      },
    });

    const sizes: number[] = [];
    for await (const chunk of readChunks(stalled, controller.signal)) {
      sizes.push(chunk.byteLength);
      setTimeout(() => controller.abort(), 5);
    }

    expect(sizes).toEqual([4]);
  });

  it('releases the stream when the consumer stops early', async () => {
    const stream = streamOf(bytes(1), bytes(1));

    for await (const chunk of readChunks(stream)) {
      expect(chunk.byteLength).toBe(1);
      break;
    }

    expect(stream.locked).toBe(false);
  });
});
