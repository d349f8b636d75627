import { describe, it, expect, beforeEach } from 'vitest';
import { ScanSessionService } from '../../../src/scanning/scan-session.service';
import { JobAbortedError } from '../../../src/domain/errors/scan-client.errors';
import { ScanJobEvent } from '../../../src/domain/events/scan-job-event';
import { CLEAN_CODE, collect, createTestContext, problem, sse } from '../helpers/test-fixtures';

describe('ScanSessionService', () => {
  let context: ReturnType<typeof createTestContext>;

  const createSession = (maxConcurrent: string) => {
    context = createTestContext({ MAX_CONCURRENT_STREAMS: maxConcurrent });
    context.api.uploadHandler = (request) => {
      const name = request.image.toString('utf8');
      if (name === 'blurry') {
        return { statusCode: 422, body: problem(422, { code: 'IMAGE_UNREADABLE' }) };
      }
      return {
        statusCode: 202,
        body: { success: true, data: { jobId: `J-${name}`, streamEndpoint: `/v3/jobs/J-${name}/stream` } },
      };
    };
    context.api.streamHandler = () => ({
      chunks: [sse('progress', { message: 'Reading' }), sse('completed', { books: [CLEAN_CODE] })],
    });
    return new ScanSessionService(context.coordinators, context.config);
  };

  beforeEach(() => {
    context = createTestContext();
  });

  it('queues jobs beyond the concurrency limit in FIFO order', async () => {
    const session = createSession('1');

    const first = session.scan(Buffer.from('a'));
    const second = session.scan(Buffer.from('b'));
    const firstEvent = await first.next();
    const secondEvent = second.next();

    expect(firstEvent.value).toEqual({ type: 'progress', message: 'Reading' });
    expect(session.activeCount).toBe(1);
    expect(session.queueDepth).toBe(1);

    await collect(first);
    expect((await secondEvent).value).toEqual({ type: 'progress', message: 'Reading' });
    await collect(second);

    expect(context.api.uploads.map((upload) => upload.image.toString('utf8'))).toEqual(['a', 'b']);
    expect(session.activeCount).toBe(0);
    expect(session.queueDepth).toBe(0);
  });

  it('releases the slot of a queued job that is aborted', async () => {
    const session = createSession('1');
    const controller = new AbortController();

    const first = session.scan(Buffer.from('a'));
    await first.next();
    const queued = session.scan(Buffer.from('b'), { signal: controller.signal }).next();
    expect(session.queueDepth).toBe(1);

    controller.abort();

    await expect(queued).rejects.toBeInstanceOf(JobAbortedError);
    expect(session.queueDepth).toBe(0);
    await collect(first);
    expect(session.activeCount).toBe(0);
    expect(context.api.uploads).toHaveLength(1);
  });

  it('runs every image to one terminal event in input order', async () => {
    const session = createSession('2');
    const seen: Array<[number, ScanJobEvent['type']]> = [];

    const outcomes = await session.scanAll(
      [Buffer.from('a'), Buffer.from('blurry'), Buffer.from('c')],
      (index, event) => seen.push([index, event.type]),
    );

    expect(outcomes.map((outcome) => outcome.type)).toEqual(['completed', 'failed', 'completed']);
    expect(outcomes[0]).toMatchObject({ jobId: 'J-a', results: [CLEAN_CODE] });
    expect(outcomes[1]).toMatchObject({ error: { code: 'IMAGE_UNREADABLE' } });
    expect(outcomes[2]).toMatchObject({ jobId: 'J-c' });
    expect(seen.filter(([index]) => index === 0).map(([, type]) => type)).toEqual([
      'progress',
      'completed',
    ]);
    expect(seen.filter(([index]) => index === 1).map(([, type]) => type)).toEqual(['failed']);
    expect(context.api.cleanupCountFor('J-a')).toBe(1);
    expect(context.api.cleanupCountFor('J-c')).toBe(1);
    expect(context.api.cleanupRequests).toHaveLength(2);
    expect(session.activeCount).toBe(0);
  });

  it('reports aborted jobs as failed', async () => {
    const session = createSession('2');
    const controller = new AbortController();
    controller.abort();

    const outcomes = await session.scanAll([Buffer.from('a')], () => undefined, {
      signal: controller.signal,
    });

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].type === 'failed' && outcomes[0].error).toBeInstanceOf(JobAbortedError);
    expect(context.api.uploads).toHaveLength(0);
  });
});
