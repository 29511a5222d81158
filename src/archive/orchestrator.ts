import type { Logger, MetricsRegistry } from "../observability";
import type { ArchiveSummary, FetchOutcome } from "../types";
import { errorMessage } from "./errors";
import { fetchDigest } from "./fetcher";
import type { DigestSession } from "./session";
import type { DigestWriter } from "./writer";

export type OrchestratorState = "idle" | "authenticating" | "fetching" | "draining" | "done" | "failed";

export interface ProgressSink {
  update(completed: number): void;
}

export interface ArchiveOrchestratorDeps {
  urls: readonly string[];
  outputDir: string;
  /** Number of fetches in flight at once; 0 puts every URL in flight together. */
  concurrency: number;
  openSession: () => Promise<DigestSession>;
  writer: DigestWriter;
  logger: Logger;
  metrics: MetricsRegistry;
  progress?: ProgressSink;
  clock?: () => number;
}

interface OutcomeCounts {
  saved: number;
  empty: number;
  failed: number;
  writeFailed: number;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls pending. Slots
 * pull from a shared cursor, so results arrive in completion order.
 * `onExhausted` fires once, when the first slot finds the cursor at the end.
 * A failing worker stops its own slot only; the first failure is rethrown
 * after every other slot has finished.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  onExhausted?: () => void,
): Promise<void> {
  let index = 0;
  let exhausted = false;
  const slotCount = Math.max(1, concurrency > 0 ? concurrency : items.length);

  const slots = Array.from({ length: slotCount }, async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        if (!exhausted) {
          exhausted = true;
          onExhausted?.();
        }
        break;
      }
      await worker(items[current]);
    }
  });
  const settled = await Promise.allSettled(slots);
  const failure = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (failure) {
    throw failure.reason;
  }
}

export class ArchiveOrchestrator {
  private readonly deps: ArchiveOrchestratorDeps;
  private readonly clock: () => number;
  private current: OrchestratorState = "idle";

  constructor(deps: ArchiveOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  get state(): OrchestratorState {
    return this.current;
  }

  async run(): Promise<ArchiveSummary> {
    if (this.current !== "idle") {
      throw new Error(`Archive run already ${this.current}; create a new orchestrator per run`);
    }

    const { urls, outputDir, concurrency, logger, metrics } = this.deps;
    const startedAt = this.clock();
    this.transition("authenticating");
    metrics.incrementCounter("digests_candidates", urls.length);
    logger.info("archive_start", { candidates: urls.length, concurrency: concurrency > 0 ? concurrency : "unbounded" });

    let session: DigestSession;
    try {
      session = await this.deps.openSession();
    } catch (error) {
      this.transition("failed");
      logger.error("archive_auth_failed", { error: errorMessage(error) });
      throw error;
    }

    const counts: OutcomeCounts = { saved: 0, empty: 0, failed: 0, writeFailed: 0 };
    let completed = 0;
    this.transition("fetching");

    try {
      await processWithConcurrency(
        urls,
        concurrency,
        async (url) => {
          const stopTimer = metrics.startTimer("digest_fetch_ms");
          const outcome = await fetchDigest(url, session, { outputDir, logger });
          stopTimer();
          completed += 1;
          this.reportProgress(completed);
          await this.consume(outcome, counts);
        },
        () => this.transition("draining"),
      );
    } catch (error) {
      this.transition("failed");
      throw error;
    } finally {
      await session.close();
    }

    this.transition("done");
    const summary: ArchiveSummary = {
      total: urls.length,
      ...counts,
      elapsedMs: this.clock() - startedAt,
      outputDir,
    };
    logger.info("archive_complete", { ...summary });
    return summary;
  }

  private async consume(outcome: FetchOutcome, counts: OutcomeCounts): Promise<void> {
    const { writer, logger, metrics } = this.deps;

    switch (outcome.kind) {
      case "empty":
        counts.empty += 1;
        metrics.incrementCounter("digests_empty");
        return;
      case "error":
        counts.failed += 1;
        metrics.incrementCounter("digests_failed");
        return;
      case "success": {
        const stopTimer = metrics.startTimer("digest_write_ms");
        try {
          await writer.write(outcome.path, outcome.content);
        } catch (error) {
          stopTimer();
          counts.writeFailed += 1;
          metrics.incrementCounter("digests_write_failed");
          logger.error("digest_write_failed", { url: outcome.url, path: outcome.path, error: errorMessage(error) });
          return;
        }
        const durationMs = stopTimer();
        counts.saved += 1;
        metrics.incrementCounter("digests_saved");
        logger.debug("digest_saved", { url: outcome.url, path: outcome.path, durationMs });
        return;
      }
    }
  }

  private reportProgress(completed: number): void {
    try {
      this.deps.progress?.update(completed);
    } catch (error) {
      this.deps.logger.error("progress_update_failed", { completed, error: errorMessage(error) });
    }
  }

  private transition(next: OrchestratorState): void {
    this.deps.logger.debug("archive_state", { from: this.current, to: next });
    this.current = next;
  }
}
