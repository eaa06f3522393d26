import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { context, trace } from '@opentelemetry/api';

export type CreatePinoLoggerOptions = {
  level: string;
  name?: string;
  destination?: DestinationStream;
};

function traceContextFields(): Record<string, string> {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}

/**
 * Creates a Pino logger that stamps `traceId` / `spanId` from the active OpenTelemetry span.
 */
export function createPinoLogger(options: CreatePinoLoggerOptions): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level,
    ...(options.name ? { name: options.name } : {}),
    mixin: traceContextFields,
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
