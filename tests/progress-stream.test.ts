import { describe, it, expect } from 'vitest';
import { ProgressStream } from '@/lib/scraper/progress-stream';
import type { ProgressEvent } from '@/types';

describe('ProgressStream', () => {
  it('stamps events with the run id and default level', () => {
    const stream = new ProgressStream('run-1', { echo: false });

    const event = stream.emit({ type: 'candidate:found', region: '渋谷', message: 'Found 山田クリニック' });

    expect(event).toMatchObject({ type: 'candidate:found', level: 'info', runId: 'run-1', region: '渋谷' });
    expect(event?.timestamp).toBeInstanceOf(Date);
  });

  it('replays history to a late iterator and ends on close', async () => {
    const stream = new ProgressStream('run-2', { echo: false });
    stream.emit({ type: 'run:started', message: 'start' });
    stream.emit({ type: 'stage:started', message: 'scrape' });

    const seen: string[] = [];
    const consumer = (async () => {
      for await (const event of stream) seen.push(event.message);
    })();

    stream.emit({ type: 'run:complete', message: 'done' });
    stream.close();
    await consumer;

    expect(seen).toEqual(['start', 'scrape', 'done']);
  });

  it('delivers live events to subscribers until unsubscribed', () => {
    const stream = new ProgressStream('run-3', { echo: false });
    const received: ProgressEvent[] = [];
    const unsubscribe = stream.subscribe((event) => received.push(event));

    stream.emit({ type: 'run:started', message: 'one' });
    unsubscribe();
    stream.emit({ type: 'run:complete', message: 'two' });

    expect(received.map((e) => e.message)).toEqual(['one']);
  });

  it('keeps delivering when a listener throws', () => {
    const stream = new ProgressStream('run-4', { echo: false });
    const received: string[] = [];
    stream.subscribe(() => {
      throw new Error('listener broke');
    });
    stream.subscribe((event) => received.push(event.message));

    stream.emit({ type: 'run:started', message: 'still here' });

    expect(received).toEqual(['still here']);
  });

  it('ignores events after close', () => {
    const stream = new ProgressStream('run-5', { echo: false });
    stream.close();

    expect(stream.emit({ type: 'error', message: 'late' })).toBeNull();
    expect(stream.getEvents()).toEqual([]);
    expect(stream.isClosed).toBe(true);
  });
});
