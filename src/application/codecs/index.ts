export {
  type DecodeResult,
  type DecodeFailure,
  decoded,
  decodeFailure,
  decodeWith,
  parseJson,
} from './decode-result';
export { ProblemDetailsCodec, ProblemDetailsSchema } from './problem-details.codec';
export { EventCodec, BookResultSchema, isTerminalLabel } from './event.codec';
export { SseRecordParser, type SseRecord } from './sse-record.parser';
