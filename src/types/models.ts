export type FetchErrorCause =
  | { type: "http"; status: number }
  | { type: "decode"; message: string }
  | { type: "network"; message: string }
  | { type: "filename"; message: string };

export interface DigestSaved {
  kind: "success";
  url: string;
  finalUrl: string;
  path: string;
  content: string;
}

export interface DigestEmpty {
  kind: "empty";
  url: string;
}

export interface DigestFailed {
  kind: "error";
  url: string;
  cause: FetchErrorCause;
}

export type FetchOutcome = DigestSaved | DigestEmpty | DigestFailed;

export interface ProgressState {
  completed: number;
  total: number;
}

export interface ArchiveSummary {
  total: number;
  saved: number;
  empty: number;
  failed: number;
  writeFailed: number;
  elapsedMs: number;
  outputDir: string;
}
