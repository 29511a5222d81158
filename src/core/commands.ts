import type { Dispatcher } from "undici";
import {
  ArchiveOrchestrator,
  ArchiveSession,
  digestFilename,
  enumerateDigestUrls,
  FileDigestWriter,
  ProgressReporter,
} from "../archive";
import type { AppConfig, RunConfig } from "../config";
import type { Logger, MetricsRegistry } from "../observability";
import type { ArchiveSummary } from "../types";
import { createFetchDispatcher } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  run: RunConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: Date;
  /** Replaces the network dispatcher the session would otherwise create. */
  dispatcher?: Dispatcher;
  progressStream?: NodeJS.WritableStream;
}

function candidateUrls(ctx: CommandContext): string[] {
  const urls = enumerateDigestUrls(ctx.config.archiveBaseUrl, ctx.config.firstYear, ctx.now ?? new Date());
  ctx.logger.debug("archive_candidates", { count: urls.length, firstYear: ctx.config.firstYear });
  return urls;
}

export async function runArchive(ctx: CommandContext): Promise<ArchiveSummary> {
  const { config, run, metrics } = ctx;
  const urls = candidateUrls(ctx);

  // Verbose runs log every digest, which would tear up the progress line.
  const progress = run.verbose ? undefined : new ProgressReporter({ total: urls.length, stream: ctx.progressStream });
  // Error lines share stderr with the bar, so they start on a fresh line.
  const logger = progress
    ? ctx.logger.tap((level) => {
        if (level === "error") {
          progress.breakLine();
        }
      })
    : ctx.logger;

  const orchestrator = new ArchiveOrchestrator({
    urls,
    outputDir: run.outputDir,
    concurrency: config.fetchConcurrency,
    openSession: () =>
      ArchiveSession.open(run.credentials, {
        authUrl: config.authUrl,
        userAgent: config.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
        verifyLogin: config.verifyLogin,
        dispatcher:
          ctx.dispatcher ??
          createFetchDispatcher({ ignoreHttpsErrors: config.ignoreHttpsErrors, connections: config.fetchConcurrency }),
        ownsDispatcher: ctx.dispatcher === undefined,
        logger: logger.child("session"),
      }),
    writer: new FileDigestWriter(logger.child("writer")),
    logger,
    metrics,
    progress,
  });

  return orchestrator.run();
}

export function runDryRun(ctx: CommandContext): number {
  const urls = candidateUrls(ctx);
  for (const url of urls) {
    ctx.logger.info("dry_run_candidate", { url, filename: digestFilename(url) });
  }
  ctx.logger.info("dry_run_complete", { candidates: urls.length, outputDir: ctx.run.outputDir });
  return urls.length;
}
