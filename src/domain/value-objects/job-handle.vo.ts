/**
 * Job Handle Value Object
 * Everything needed to follow one accepted scan job. Owned by a single
 * coordinator and never shared between jobs.
 */
export interface JobHandle {
  readonly jobId: string;
  readonly streamEndpoint: URL;
  /** Bearer token for the stream; valid for roughly two hours. */
  readonly authToken?: string;
  readonly statusEndpoint?: URL;
  readonly deviceId: string;
  readonly createdAt: Date;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace JobHandle {
  export interface CreateProps {
    jobId: string;
    streamEndpoint: URL;
    authToken?: string;
    statusEndpoint?: URL;
    deviceId: string;
    createdAt?: Date;
  }

  export function create(props: CreateProps): JobHandle {
    if (props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (props.deviceId.trim().length === 0) {
      throw new Error('Device ID is required');
    }

    return Object.freeze({
      jobId: props.jobId,
      streamEndpoint: props.streamEndpoint,
      authToken: props.authToken,
      statusEndpoint: props.statusEndpoint,
      deviceId: props.deviceId,
      createdAt: props.createdAt ?? new Date(),
    });
  }

  /**
   * Headers that identify the device and, when the server issued one, carry
   * the job's bearer token.
   */
  export function authHeaders(handle: JobHandle): Record<string, string> {
    return {
      'X-Device-Id': handle.deviceId,
      ...(handle.authToken && { Authorization: `Bearer ${handle.authToken}` }),
    };
  }
}
