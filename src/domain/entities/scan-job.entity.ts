import { Draft, produce } from 'immer';
import { BookResult } from '../value-objects/book-result.vo';
import { JobHandle } from '../value-objects/job-handle.vo';
import { ScanJobStatusVO } from '../value-objects/scan-job-status.vo';
import { ScanClientError } from '../errors/scan-client.errors';

/**
 * Scan Job Entity
 * Client-side record of one scan job, from the first upload attempt to its
 * terminal outcome.
 *
 * Data lives in a plain readonly structure; transitions are pure functions
 * returning new instances through Immer.
 */
export interface ScanJobEntityData {
  readonly status: ScanJobStatusVO;
  readonly deviceId: string;
  readonly handle?: JobHandle;
  readonly results: ReadonlyArray<BookResult>;
  readonly resultSource?: 'inline' | 'fetched';
  readonly error?: ScanClientError;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface ScanJobEntity extends ScanJobEntityData {
  readonly jobId?: string;

  isTerminal(): boolean;

  startUpload(): ScanJobEntity;
  attachHandle(handle: JobHandle): ScanJobEntity;
  beginResolving(): ScanJobEntity;
  complete(results: ReadonlyArray<BookResult>, source: 'inline' | 'fetched'): ScanJobEntity;
  fail(error: ScanClientError): ScanJobEntity;
  cancel(): ScanJobEntity;

  toJSON(): ReturnType<typeof ScanJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ScanJobEntity {
  export interface CreateProps {
    deviceId: string;
    createdAt?: Date;
  }

  export function create(props: CreateProps): ScanJobEntity {
    if (props.deviceId.trim().length === 0) {
      throw new Error('Device ID is required');
    }

    const now = props.createdAt ?? new Date();
    return attachMethods({
      status: ScanJobStatusVO.created(),
      deviceId: props.deviceId,
      results: [],
      createdAt: now,
      updatedAt: now,
    });
  }

  function attachMethods(data: ScanJobEntityData): ScanJobEntity {
    return {
      ...data,

      get jobId() {
        return data.handle?.jobId;
      },

      isTerminal: () => data.status.isTerminal(),

      startUpload: () => startUpload(data),
      attachHandle: (handle: JobHandle) => attachHandle(data, handle),
      beginResolving: () => beginResolving(data),
      complete: (results: ReadonlyArray<BookResult>, source: 'inline' | 'fetched') =>
        complete(data, results, source),
      fail: (error: ScanClientError) => fail(data, error),
      cancel: () => cancel(data),

      toJSON: () => toJSON(data),
    };
  }

  function transition(
    job: ScanJobEntityData,
    next: ScanJobStatusVO,
    recipe?: (draft: Draft<ScanJobEntityData>) => void,
  ): ScanJobEntity {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(`Invalid scan job transition: ${job.status} -> ${next}`);
    }

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.updatedAt = new Date();
      recipe?.(draft);
    });
    return attachMethods(updated);
  }

  // ===== State Transitions =====

  export function startUpload(job: ScanJobEntityData): ScanJobEntity {
    return transition(job, ScanJobStatusVO.uploading());
  }

  export function attachHandle(job: ScanJobEntityData, handle: JobHandle): ScanJobEntity {
    if (handle.deviceId !== job.deviceId) {
      throw new Error('Job handle belongs to a different device');
    }
    return transition(job, ScanJobStatusVO.streaming(), (draft) => {
      draft.handle = handle;
    });
  }

  export function beginResolving(job: ScanJobEntityData): ScanJobEntity {
    return transition(job, ScanJobStatusVO.resolving());
  }

  export function complete(
    job: ScanJobEntityData,
    results: ReadonlyArray<BookResult>,
    source: 'inline' | 'fetched',
  ): ScanJobEntity {
    return transition(job, ScanJobStatusVO.completed(), (draft) => {
      draft.results = [...results];
      draft.resultSource = source;
    });
  }

  export function fail(job: ScanJobEntityData, error: ScanClientError): ScanJobEntity {
    return transition(job, ScanJobStatusVO.failed(), (draft) => {
      draft.error = error;
    });
  }

  export function cancel(job: ScanJobEntityData): ScanJobEntity {
    return transition(job, ScanJobStatusVO.canceled());
  }

  // ===== Serialization =====

  export function toJSON(job: ScanJobEntityData) {
    return {
      jobId: job.handle?.jobId,
      status: job.status.value,
      deviceId: job.deviceId,
      resultCount: job.results.length,
      resultSource: job.resultSource,
      error: job.error?.toJSON(),
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
    };
  }
}
