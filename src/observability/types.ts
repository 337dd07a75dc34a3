export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  endpointId?: string;
  url?: string;
  fileName?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "fetch_ok"
  | "fetch_failed"
  | "connection_errors"
  | "http_status_errors"
  | "malformed_payloads";

export type MetricTimerName = "fetch_ms";
