import {
  Context,
  Span,
  SpanStatusCode,
  context,
  trace,
  Tracer,
} from '@opentelemetry/api';
import { version as LATENCY_HARNESS_VERSION } from '../package.json';

export interface TelemetryInfo {
  span: Span;
  ctx: Context;
}

export function createSessionTelemetryInfo(
  tracer: Tracer,
  sessionId: string,
  peer: string,
): TelemetryInfo {
  const parentCtx = context.active();
  const span = tracer.startSpan(
    `latency.session.${sessionId}`,
    {
      attributes: {
        component: 'latency-harness',
        'latency.session.id': sessionId,
        'latency.session.peer': peer,
      },
    },
    parentCtx,
  );

  const ctx = trace.setSpan(parentCtx, span);

  return { span, ctx };
}

export function createConnectionTelemetryInfo(
  tracer: Tracer,
  connectionId: string,
  kind: 'control' | 'probe',
  info: TelemetryInfo,
): TelemetryInfo {
  const span = tracer.startSpan(
    `latency.${kind}.${connectionId}`,
    {
      attributes: {
        component: 'latency-harness',
        'latency.connection.id': connectionId,
        'latency.connection.kind': kind,
      },
      links: [{ context: info.span.spanContext() }],
    },
    info.ctx,
  );

  const ctx = trace.setSpan(info.ctx, span);

  return { span, ctx };
}

export function recordLatencyError(span: Span, code: string, message: string) {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message,
  });
  span.setAttributes({
    'latency.error_code': code,
    'latency.error_message': message,
  });
}

export function getTracer(): Tracer {
  return trace.getTracer('latency-harness', LATENCY_HARNESS_VERSION);
}
