/**
 * Book Result Value Object
 * One identified book, as delivered by a `result` event, inline in a
 * `completed` event, or by the results endpoint. Frozen once created.
 */
export enum EnrichmentStatus {
  SUCCESS = 'success',
  PARTIAL = 'partial',
  DEGRADED = 'degraded',
  FAILED = 'failed',
}

export interface BookResult {
  /** May be empty when the spine was unreadable. */
  readonly title: string;
  readonly author: string;
  readonly isbn?: string;
  readonly coverUrl?: string;
  readonly publisher?: string;
  readonly publishedDate?: string;
  readonly pageCount?: number;
  readonly format?: string;
  /** Model confidence in [0, 1]. */
  readonly confidence?: number;
  readonly enrichmentStatus?: EnrichmentStatus;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace BookResult {
  export function create(props: BookResult): BookResult {
    if (
      props.confidence !== undefined &&
      (props.confidence < 0 || props.confidence > 1 || Number.isNaN(props.confidence))
    ) {
      throw new Error(`Confidence must be within [0, 1], got ${props.confidence}`);
    }

    return Object.freeze({ ...props });
  }
}
