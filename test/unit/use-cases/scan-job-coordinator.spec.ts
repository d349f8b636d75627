import { describe, it, expect, beforeEach } from 'vitest';
import { ScanJobStatus } from '../../../src/domain/value-objects/scan-job-status.vo';
import {
  JobAbortedError,
  MalformedResponseError,
  StructuredApiError,
  StreamTerminalError,
} from '../../../src/domain/errors/scan-client.errors';
import { ScanJobEvent } from '../../../src/domain/events/scan-job-event';
import {
  CLEAN_CODE,
  acceptedUpload,
  collect,
  createTestContext,
  problem,
  sse,
} from '../helpers/test-fixtures';

const image = Buffer.from('fake-jpeg-bytes');

function lastEvent(events: ScanJobEvent[]): ScanJobEvent {
  const last = events.at(-1);
  if (last === undefined) {
    throw new Error('No events were delivered');
  }
  return last;
}

describe('ScanJobCoordinator', () => {
  let context: ReturnType<typeof createTestContext>;

  beforeEach(() => {
    context = createTestContext();
  });

  describe('completion', () => {
    it('completes with inline results without fetching them', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({
        chunks: [
          sse('progress', { message: 'Reading spines' }, '1'),
          sse('result', CLEAN_CODE, '2'),
          sse('completed', { books: [CLEAN_CODE] }, '3'),
        ],
      });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      expect(events.map((event) => event.type)).toEqual(['progress', 'resultItem', 'completed']);
      expect(lastEvent(events)).toMatchObject({
        type: 'completed',
        jobId: 'J1',
        source: 'inline',
        results: [CLEAN_CODE],
      });
      expect(context.api.resultRequests).toHaveLength(0);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
      expect(coordinator.state).toBe(ScanJobStatus.COMPLETED);
      expect(coordinator.cleanupOutcome).toEqual({ status: 'succeeded', statusCode: 204 });
    });

    it('fetches the compact results when none are inline', async () => {
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('completed', { resultsUrl: '/v3/jobs/results/abc' })] })
        .queueResults({
          statusCode: 200,
          body: { success: true, data: { jobId: 'J1', status: 'completed', results: [CLEAN_CODE] } },
        });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'completed', source: 'fetched', results: [CLEAN_CODE] });
      expect(context.api.resultRequests.map((request) => request.url)).toEqual([
        'https://scan.test/v3/jobs/results/abc?format=lite',
      ]);
      expect(coordinator.entity.resultSource).toBe('fetched');
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('closes the event stream before fetching the results', async () => {
      let openStreamsAtFetch: number | undefined;
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('completed', { resultsUrl: '/v3/jobs/results/abc' })], hang: true });
      context.api.resultsHandler = () => {
        openStreamsAtFetch = context.api.streamRequests.length - context.api.closedStreams;
        return {
          statusCode: 200,
          body: { success: true, data: { jobId: 'J1', status: 'completed', results: [CLEAN_CODE] } },
        };
      };

      const events = await collect(context.coordinators.create().run(image));

      expect(events).toEqual([
        { type: 'completed', jobId: 'J1', results: [CLEAN_CODE], source: 'fetched' },
      ]);
      expect(openStreamsAtFetch).toBe(0);
      expect(context.api.closedStreams).toBe(1);
    });

    it('fetches when the inline list is empty', async () => {
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('completed', { books: [], resultsUrl: '/v3/jobs/results/abc' })] })
        .queueResults({
          statusCode: 200,
          body: { success: true, data: { jobId: 'J1', status: 'completed', results: [] } },
        });

      const events = await collect(context.coordinators.create().run(image));

      expect(events).toEqual([{ type: 'completed', jobId: 'J1', results: [], source: 'fetched' }]);
      expect(context.api.resultRequests).toHaveLength(1);
    });

    it('fails when a completion carries neither results nor an endpoint', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({ chunks: [sse('completed')] });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      const last = lastEvent(events);
      expect(last.type).toBe('failed');
      expect(last.type === 'failed' && last.error).toBeInstanceOf(MalformedResponseError);
      expect(coordinator.state).toBe(ScanJobStatus.FAILED);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('fails when the results fetch fails', async () => {
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('completed', { resultsUrl: '/v3/jobs/results/abc' })] })
        .queueResults({ statusCode: 410, body: problem(410, { code: 'RESULTS_EXPIRED' }) });

      const events = await collect(context.coordinators.create().run(image));

      expect(lastEvent(events)).toMatchObject({
        type: 'failed',
        jobId: 'J1',
        error: { code: 'RESULTS_EXPIRED' },
      });
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });
  });

  describe('terminal failures', () => {
    it('turns a server error event into a failed job', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({
        chunks: [sse('error', { message: 'OCR failed', code: 'OCR_FAILED', retryable: true })],
      });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      const last = lastEvent(events);
      expect(last.type === 'failed' && last.error).toBeInstanceOf(StreamTerminalError);
      expect(last).toMatchObject({
        type: 'failed',
        jobId: 'J1',
        error: { code: 'OCR_FAILED', retryable: true, message: 'OCR failed' },
      });
      expect(coordinator.entity.error?.code).toBe('OCR_FAILED');
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('delivers a canceled job', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({ chunks: [sse('canceled')] });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      expect(events).toEqual([{ type: 'canceled', jobId: 'J1' }]);
      expect(coordinator.state).toBe(ScanJobStatus.CANCELED);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('fails when the stream is rejected', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({
        statusCode: 401,
        chunks: [JSON.stringify(problem(401, { code: 'TOKEN_EXPIRED' }))],
      });

      const events = await collect(context.coordinators.create().run(image));

      const last = lastEvent(events);
      expect(last.type === 'failed' && last.error).toBeInstanceOf(StructuredApiError);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('delivers an upload failure without cleanup', async () => {
      context.api.queueUpload({
        statusCode: 400,
        body: problem(400, { code: 'INVALID_IMAGE' }),
      });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'failed', error: { code: 'INVALID_IMAGE' } });
      expect(coordinator.state).toBe(ScanJobStatus.FAILED);
      expect(coordinator.handle).toBeUndefined();
      expect(context.api.cleanupRequests).toHaveLength(0);
      expect(coordinator.cleanupOutcome).toEqual({
        status: 'skipped',
        reason: 'Upload did not create a job',
      });
    });

    it('keeps the terminal event when cleanup fails', async () => {
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('canceled')] })
        .queueCleanup({ statusCode: 500, body: problem(500) });
      const coordinator = context.coordinators.create();

      const events = await collect(coordinator.run(image));

      expect(events).toEqual([{ type: 'canceled', jobId: 'J1' }]);
      expect(coordinator.cleanupOutcome?.status).toBe('failed');
    });
  });

  describe('cleanup', () => {
    it('cleans up a job that was created but never streamed', async () => {
      context.api.queueUpload(acceptedUpload('J1'));
      const coordinator = context.coordinators.create();

      await coordinator.submit(image);
      const outcome = await coordinator.cleanup();

      expect(outcome).toEqual({ status: 'succeeded', statusCode: 204 });
      expect(coordinator.state).toBe(ScanJobStatus.STREAMING);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('sends at most one cleanup request per job', async () => {
      context.api.queueUpload(acceptedUpload('J1')).queueStream({ chunks: [sse('canceled')] });
      const coordinator = context.coordinators.create();

      await collect(coordinator.run(image));
      const again = await Promise.all([coordinator.cleanup(), coordinator.cleanup()]);

      expect(again).toEqual([
        { status: 'succeeded', statusCode: 204 },
        { status: 'succeeded', statusCode: 204 },
      ]);
      expect(context.api.cleanupCountFor('J1')).toBe(1);
    });

    it('skips cleanup when no job was created', async () => {
      const outcome = await context.coordinators.create().cleanup();

      expect(outcome).toEqual({ status: 'skipped', reason: 'No job was created' });
      expect(context.api.cleanupRequests).toHaveLength(0);
    });
  });

  describe('abort', () => {
    it('stops without cleanup and leaves the state unchanged', async () => {
      context.api
        .queueUpload(acceptedUpload('J1'))
        .queueStream({ chunks: [sse('progress', { message: 'Reading' })], hang: true });
      const controller = new AbortController();
      const coordinator = context.coordinators.create();

      const events = coordinator.run(image, controller.signal);
      const first = await events.next();
      const pending = events.next();
      controller.abort();

      expect(first.value).toEqual({ type: 'progress', message: 'Reading' });
      await expect(pending).rejects.toBeInstanceOf(JobAbortedError);
      expect(coordinator.state).toBe(ScanJobStatus.STREAMING);
      expect(context.api.cleanupRequests).toHaveLength(0);
      expect(context.api.closedStreams).toBe(1);
    });

    it('rethrows an abort before upload', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        collect(context.coordinators.create().run(image, controller.signal)),
      ).rejects.toBeInstanceOf(JobAbortedError);
      expect(context.api.uploads).toHaveLength(0);
    });
  });

  it('refuses to stream before the upload', async () => {
    await expect(collect(context.coordinators.create().events())).rejects.toThrow(
      'Cannot stream events for a job in state CREATED',
    );
  });

  it('keeps concurrent jobs independent', async () => {
    context.api.uploadHandler = (_request, index) => acceptedUpload(`J${index + 1}`);
    context.api.streamHandler = (url) => {
      const jobId = url.pathname.split('/')[3];
      const progress = sse('progress', { message: `Reading ${jobId}` }, '1');
      return jobId === 'J3'
        ? { chunks: [progress, sse('error', { message: 'OCR failed', code: 'OCR_FAILED' }, '2')] }
        : {
            chunks: [
              progress,
              sse('result', { ...CLEAN_CODE, title: `Book of ${jobId}` }, '2'),
              sse('completed', { books: [{ ...CLEAN_CODE, title: `Book of ${jobId}` }] }, '3'),
            ],
          };
    };

    const coordinators = Array.from({ length: 5 }, () => context.coordinators.create());
    const runs = await Promise.all(
      coordinators.map(async (coordinator) => ({
        coordinator,
        events: await collect(coordinator.run(image)),
      })),
    );

    const byJob = new Map(runs.map((run) => [run.coordinator.handle?.jobId, run.events]));
    expect([...byJob.keys()].sort()).toEqual(['J1', 'J2', 'J3', 'J4', 'J5']);
    for (const jobId of ['J1', 'J2', 'J4', 'J5']) {
      const book = { ...CLEAN_CODE, title: `Book of ${jobId}` };
      expect(byJob.get(jobId)).toEqual([
        { type: 'progress', message: `Reading ${jobId}` },
        { type: 'resultItem', book },
        { type: 'completed', jobId, results: [book], source: 'inline' },
      ]);
    }
    const failed = byJob.get('J3');
    expect(failed?.slice(0, 1)).toEqual([{ type: 'progress', message: 'Reading J3' }]);
    expect(failed?.slice(1)).toMatchObject([
      { type: 'failed', jobId: 'J3', error: { code: 'OCR_FAILED', message: 'OCR failed' } },
    ]);
    for (const jobId of ['J1', 'J2', 'J3', 'J4', 'J5']) {
      expect(context.api.cleanupCountFor(jobId)).toBe(1);
    }
  });
});
