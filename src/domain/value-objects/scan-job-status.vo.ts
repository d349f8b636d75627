/**
 * Scan Job Status Value Object
 * Lifecycle of one scan job on the client side.
 */
export enum ScanJobStatus {
  CREATED = 'CREATED',
  UPLOADING = 'UPLOADING',
  STREAMING = 'STREAMING',
  RESOLVING = 'RESOLVING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELED = 'CANCELED',
}

export class ScanJobStatusVO {
  private constructor(private readonly _value: ScanJobStatus) {}

  static created(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.CREATED);
  }

  static uploading(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.UPLOADING);
  }

  static streaming(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.STREAMING);
  }

  static resolving(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.RESOLVING);
  }

  static completed(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.COMPLETED);
  }

  static failed(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.FAILED);
  }

  static canceled(): ScanJobStatusVO {
    return new ScanJobStatusVO(ScanJobStatus.CANCELED);
  }

  get value(): ScanJobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return [ScanJobStatus.COMPLETED, ScanJobStatus.FAILED, ScanJobStatus.CANCELED].includes(
      this._value,
    );
  }

  canTransitionTo(newStatus: ScanJobStatusVO): boolean {
    const transitions: Record<ScanJobStatus, ScanJobStatus[]> = {
      [ScanJobStatus.CREATED]: [ScanJobStatus.UPLOADING],
      [ScanJobStatus.UPLOADING]: [ScanJobStatus.STREAMING, ScanJobStatus.FAILED],
      [ScanJobStatus.STREAMING]: [
        ScanJobStatus.RESOLVING,
        ScanJobStatus.COMPLETED,
        ScanJobStatus.FAILED,
        ScanJobStatus.CANCELED,
      ],
      [ScanJobStatus.RESOLVING]: [ScanJobStatus.COMPLETED, ScanJobStatus.FAILED],
      [ScanJobStatus.COMPLETED]: [],
      [ScanJobStatus.FAILED]: [],
      [ScanJobStatus.CANCELED]: [],
    };

    return transitions[this._value].includes(newStatus._value);
  }

  equals(other: ScanJobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
