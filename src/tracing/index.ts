export { PhaseEvent, logKV, spanClientTrace } from './client-trace.js';
export type { ClientTrace, GotConnInfo } from './client-trace.js';
export { SpanTag, startRequestSpan, setStatusCode } from './span.js';
export type { RequestSpanOptions } from './span.js';
