export { EMPTY_DIGEST_MARKER, EMPTY_DIGEST_MAX_LENGTH, isEmptyDigest } from "./classifier";
export { AuthenticationError, DigestUrlError, errorMessage } from "./errors";
export { decodeBody, fetchDigest } from "./fetcher";
export type { FetchDigestDeps } from "./fetcher";
export { ArchiveOrchestrator, processWithConcurrency } from "./orchestrator";
export type { ArchiveOrchestratorDeps, OrchestratorState, ProgressSink } from "./orchestrator";
export { ProgressReporter } from "./progress";
export type { ProgressReporterOptions } from "./progress";
export { ArchiveSession, isLoginForm } from "./session";
export type { ArchiveSessionOptions, DigestSession, SessionResponse } from "./session";
export { digestFilename, digestUrl, enumerateDigestUrls, FIRST_ARCHIVE_YEAR } from "./urls";
export { FileDigestWriter } from "./writer";
export type { DigestWriter } from "./writer";
