export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  path?: string;
  status?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "digests_candidates"
  | "digests_saved"
  | "digests_empty"
  | "digests_failed"
  | "digests_write_failed";

export type MetricTimerName = "digest_fetch_ms" | "digest_write_ms";
