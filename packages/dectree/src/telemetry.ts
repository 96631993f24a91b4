import { metrics, trace } from "@opentelemetry/api";

export const otelTracer = trace.getTracer("dectree");

const otelMeter = metrics.getMeter("dectree");
export const parseCounter = otelMeter.createCounter("dectree.parse.count", {
  description: "Total number of decay files parsed",
});
export const parseErrorCounter = otelMeter.createCounter("dectree.parse.errors", {
  description: "Total number of decay files rejected with a fatal error",
});
export const parseDurationHistogram = otelMeter.createHistogram("dectree.parse.duration", {
  description: "Decay file parse duration in milliseconds",
  unit: "ms",
});

/** Round milliseconds to 2 decimal places */
export function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Structured logger interface for parse events.
 * Accepts any compatible logger: pino, winston, bunyan, `console`, etc.
 * Arguments follow printf-style formatting (`"%s has %d channels"`).
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const noop = () => {};
export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
