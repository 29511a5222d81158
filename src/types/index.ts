export type {
  ArchiveSummary,
  DigestEmpty,
  DigestFailed,
  DigestSaved,
  FetchErrorCause,
  FetchOutcome,
  ProgressState,
} from "./models";
