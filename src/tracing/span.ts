/**
 * Request span creation for the transport.
 *
 * @module tracing/span
 */

import { SpanKind, context, defaultTextMapSetter, trace } from '@opentelemetry/api';
import type { Span, Tracer } from '@opentelemetry/api';
import type { HeaderPropagator } from '../config/index.js';
import type { HttpRequest } from '../http/types.js';
import { errorContext } from '../observability/index.js';
import type { Logger } from '../observability/index.js';

/**
 * Attribute keys set on request spans.
 */
export const SpanTag = {
  COMPONENT: 'component',
  HTTP_URL: 'http.url',
  HTTP_METHOD: 'http.method',
  HTTP_STATUS_CODE: 'http.status_code',
  SPAN_KIND: 'span.kind',
} as const;

export interface RequestSpanOptions {
  tracer: Tracer;
  propagator: HeaderPropagator;
  logger: Logger;
  spanName: string;
  componentTag: string;
}

/**
 * Starts the client span for a request and writes its trace context into the
 * request headers.
 *
 * The span is a child of the span found in `request.context` (or the active
 * context), and a root span otherwise. Header injection is best effort: a
 * failing propagator is logged and the request goes out untraced downstream.
 */
export function startRequestSpan(request: HttpRequest, options: RequestSpanOptions): Span {
  const parentContext = request.context ?? context.active();
  const parentSpan = trace.getSpan(parentContext);

  const spanOptions = {
    kind: SpanKind.CLIENT,
    attributes: {
      [SpanTag.COMPONENT]: options.componentTag,
      [SpanTag.HTTP_URL]: request.url,
      [SpanTag.HTTP_METHOD]: request.method,
      [SpanTag.SPAN_KIND]: 'client',
    },
  };

  const span = parentSpan
    ? options.tracer.startSpan(options.spanName, spanOptions, parentContext)
    : options.tracer.startSpan(options.spanName, { ...spanOptions, root: true });

  try {
    options.propagator.inject(trace.setSpan(parentContext, span), request.headers, defaultTextMapSetter);
  } catch (error) {
    options.logger.debug('Failed to inject trace headers', errorContext(error, { url: request.url }));
  }

  return span;
}

/**
 * Records the response status as an unsigned 16-bit value.
 */
export function setStatusCode(span: Span, status: number): void {
  span.setAttribute(SpanTag.HTTP_STATUS_CODE, status & 0xffff);
}
