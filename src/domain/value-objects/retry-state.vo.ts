/**
 * Retry State Value Object
 * Reconnection bookkeeping for one job's event stream. A fresh instance is
 * created per job handle; instances are never shared.
 */
export interface RetryStateProps {
  attemptCount: number;
  lastEventId?: string;
  nextBackoffMs: number;
}

const NUMERIC_ID = /^\d+$/;

export class RetryStateVO {
  private constructor(private readonly props: RetryStateProps) {}

  static initial(): RetryStateVO {
    return new RetryStateVO({ attemptCount: 0, nextBackoffMs: 0 });
  }

  get attemptCount(): number {
    return this.props.attemptCount;
  }

  get lastEventId(): string | undefined {
    return this.props.lastEventId;
  }

  get nextBackoffMs(): number {
    return this.props.nextBackoffMs;
  }

  /**
   * Records an observed event id. Ids arrive in order; an empty id, or a
   * numeric id lower than the current numeric id, is ignored so replay never
   * moves backwards.
   */
  withEventId(eventId: string): RetryStateVO {
    if (eventId.length === 0) {
      return this;
    }
    const current = this.props.lastEventId;
    if (
      current !== undefined &&
      NUMERIC_ID.test(current) &&
      NUMERIC_ID.test(eventId) &&
      BigInt(eventId) < BigInt(current)
    ) {
      return this;
    }
    return new RetryStateVO({ ...this.props, lastEventId: eventId });
  }

  withFailedAttempt(nextBackoffMs: number): RetryStateVO {
    return new RetryStateVO({
      ...this.props,
      attemptCount: this.props.attemptCount + 1,
      nextBackoffMs,
    });
  }

  /** A record arrived: the connection is healthy again. */
  withProgress(): RetryStateVO {
    if (this.props.attemptCount === 0 && this.props.nextBackoffMs === 0) {
      return this;
    }
    return new RetryStateVO({ ...this.props, attemptCount: 0, nextBackoffMs: 0 });
  }

  toJSON(): RetryStateProps {
    return { ...this.props };
  }
}
