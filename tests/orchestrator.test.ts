import path from "node:path";
import { describe, expect, it } from "vitest";
import { ArchiveOrchestrator, AuthenticationError, enumerateDigestUrls, processWithConcurrency } from "../src/archive";
import type { ArchiveOrchestratorDeps, DigestWriter } from "../src/archive";
import { MetricsRegistry } from "../src/observability";
import { captureLogger, FakeSession, sleep } from "./helpers";
import type { FakePage } from "./helpers";

const BASE = "https://archive.test/archiv/list/";
const OUT = path.resolve("/tmp/digests");
const URLS = enumerateDigestUrls(BASE, 2023, new Date(2024, 0, 1));

function digest(label: string): string {
  return `<html><body>${`<p>${label}</p>`.repeat(40)}</body></html>`;
}

class MemoryWriter implements DigestWriter {
  readonly files = new Map<string, string>();
  readonly order: string[] = [];

  constructor(
    private readonly timeline: string[] = [],
    private readonly failing: ReadonlySet<string> = new Set(),
  ) {}

  async write(filePath: string, content: string): Promise<void> {
    this.timeline.push(`write:${path.basename(filePath)}`);
    if (this.failing.has(path.basename(filePath))) {
      throw new Error("EACCES: permission denied");
    }
    this.files.set(filePath, content);
    this.order.push(path.basename(filePath));
  }
}

function setup(pages: Map<string, FakePage>, overrides: Partial<ArchiveOrchestratorDeps> = {}, failing?: Set<string>) {
  const timeline: string[] = [];
  const session = new FakeSession(pages, timeline);
  const writer = new MemoryWriter(timeline, failing);
  const updates: number[] = [];
  const { logger, events } = captureLogger();
  const metrics = new MetricsRegistry();
  const orchestrator = new ArchiveOrchestrator({
    urls: URLS,
    outputDir: OUT,
    concurrency: 4,
    openSession: async () => {
      timeline.push("open");
      return session;
    },
    writer,
    logger,
    metrics,
    progress: { update: (completed) => updates.push(completed) },
    ...overrides,
  });
  return { orchestrator, session, writer, updates, events, metrics, timeline };
}

describe("processWithConcurrency", () => {
  it("never runs more workers than the bound", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    await processWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(2);
      seen.push(item);
      active -= 1;
    });
    expect(peak).toBe(3);
    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("starts every item at once when the bound is 0", async () => {
    let active = 0;
    let peak = 0;
    await processWithConcurrency(["a", "b", "c", "d"], 0, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(2);
      active -= 1;
    });
    expect(peak).toBe(4);
  });

  it("lets the other slots finish before rethrowing a worker failure", async () => {
    const finished: number[] = [];
    const run = processWithConcurrency([1, 2, 3, 4], 2, async (item) => {
      if (item === 1) {
        throw new Error("slot broke");
      }
      await sleep(5);
      finished.push(item);
    });

    await expect(run).rejects.toThrow("slot broke");
    expect(finished.sort((a, b) => a - b)).toEqual([2, 3, 4]);
  });

  it("reports exhaustion once, even for an empty list", async () => {
    let calls = 0;
    await processWithConcurrency([], 5, async () => undefined, () => {
      calls += 1;
    });
    expect(calls).toBe(1);
  });
});

describe("ArchiveOrchestrator", () => {
  const june = `${BASE}2023-06/2023-06f.html`;
  const july = `${BASE}2023-07/2023-07f.html`;
  const march = `${BASE}2024-03/2024-03f.html`;

  it("writes one file per real digest and counts the rest", async () => {
    const pages = new Map<string, FakePage>([
      [june, { body: digest("june") }],
      [july, { body: digest("july") }],
      [march, { body: digest("march") }],
      [`${BASE}2023-01/2023-01f.html`, { status: 503, body: "<html>Service Unavailable</html>" }],
    ]);
    const { orchestrator, writer, metrics } = setup(pages);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ total: 24, saved: 3, empty: 20, failed: 1, writeFailed: 0, outputDir: OUT });
    expect(writer.files.size).toBe(3);
    expect(writer.files.get(path.join(OUT, "wggf-monthly-digest-2023-06.html"))).toBe(digest("june"));
    expect(writer.files.get(path.join(OUT, "wggf-monthly-digest-2024-03.html"))).toBe(digest("march"));
    expect(metrics.snapshot().counters).toEqual({
      digests_candidates: 24,
      digests_saved: 3,
      digests_empty: 20,
      digests_failed: 1,
      digests_write_failed: 0,
    });
  });

  it("advances progress once per URL up to the total", async () => {
    const { orchestrator, updates } = setup(new Map());
    await orchestrator.run();
    expect(updates).toEqual(Array.from({ length: 24 }, (_, i) => i + 1));
  });

  it("handles results in completion order", async () => {
    const pages = new Map<string, FakePage>([
      [june, { body: digest("june"), delayMs: 40 }],
      [july, { body: digest("july"), delayMs: 1 }],
    ]);
    const { orchestrator, writer, updates } = setup(pages, { concurrency: 0 });

    await orchestrator.run();

    expect(writer.order).toEqual(["wggf-monthly-digest-2023-07.html", "wggf-monthly-digest-2023-06.html"]);
    expect(updates).toHaveLength(24);
    expect(updates[23]).toBe(24);
  });

  it("keeps the number of requests in flight within the bound", async () => {
    const bounded = setup(new Map(), { concurrency: 3 });
    await bounded.orchestrator.run();
    expect(bounded.session.maxInFlight).toBe(3);

    const unbounded = setup(new Map(), { concurrency: 0 });
    await unbounded.orchestrator.run();
    expect(unbounded.session.maxInFlight).toBe(24);
  });

  it("keeps writing after one write fails", async () => {
    const pages = new Map<string, FakePage>([
      [june, { body: digest("june"), delayMs: 1 }],
      [july, { body: digest("july"), delayMs: 20 }],
      [march, { body: digest("march"), delayMs: 30 }],
    ]);
    const { orchestrator, writer, events } = setup(pages, {}, new Set(["wggf-monthly-digest-2023-06.html"]));

    const summary = await orchestrator.run();

    expect(summary.saved).toBe(2);
    expect(summary.writeFailed).toBe(1);
    expect(writer.order).toEqual(["wggf-monthly-digest-2023-07.html", "wggf-monthly-digest-2024-03.html"]);
    const failure = events.find((event) => event.msg === "digest_write_failed");
    expect(failure).toMatchObject({
      level: "error",
      url: june,
      path: path.join(OUT, "wggf-monthly-digest-2023-06.html"),
      error: "EACCES: permission denied",
    });
  });

  it("opens the session before the first fetch and closes it after the last write", async () => {
    const pages = new Map<string, FakePage>([[march, { body: digest("march"), delayMs: 30 }]]);
    const { orchestrator, session, timeline } = setup(pages);

    await orchestrator.run();

    expect(timeline[0]).toBe("open");
    expect(timeline[1]).toBe(`get:${URLS[0]}`);
    expect(timeline.at(-2)).toBe("write:wggf-monthly-digest-2024-03.html");
    expect(timeline.at(-1)).toBe("close");
    expect(session.closeCalls).toBe(1);
  });

  it("keeps going when the progress sink throws", async () => {
    const pages = new Map<string, FakePage>([[march, { body: digest("march"), delayMs: 30 }]]);
    const { orchestrator, writer, events, timeline } = setup(pages, {
      progress: {
        update: () => {
          throw new Error("terminal gone");
        },
      },
    });

    const summary = await orchestrator.run();

    expect(summary.saved).toBe(1);
    expect(writer.order).toEqual(["wggf-monthly-digest-2024-03.html"]);
    expect(timeline.at(-1)).toBe("close");
    const failures = events.filter((event) => event.msg === "progress_update_failed");
    expect(failures).toHaveLength(24);
    expect(failures[0]).toMatchObject({ level: "error", completed: 1, error: "terminal gone" });
  });

  it("walks through its states in order", async () => {
    const { orchestrator, events } = setup(new Map());
    expect(orchestrator.state).toBe("idle");

    await orchestrator.run();

    const states = events.filter((event) => event.msg === "archive_state").map((event) => event.to);
    expect(states).toEqual(["authenticating", "fetching", "draining", "done"]);
    expect(orchestrator.state).toBe("done");
  });

  it("aborts before any fetch when authentication fails", async () => {
    const { orchestrator, session, updates } = setup(new Map(), {
      openSession: async () => {
        throw new AuthenticationError("Login to https://archive.test failed");
      },
    });

    await expect(orchestrator.run()).rejects.toBeInstanceOf(AuthenticationError);
    expect(orchestrator.state).toBe("failed");
    expect(session.requested).toEqual([]);
    expect(updates).toEqual([]);
  });

  it("runs only once", async () => {
    const { orchestrator } = setup(new Map());
    await orchestrator.run();
    await expect(orchestrator.run()).rejects.toThrow("Archive run already done");
  });
});
