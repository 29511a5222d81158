import type { DigestSession, SessionResponse } from "../src/archive";
import { Logger } from "../src/observability";
import type { LogLevel } from "../src/observability";

export interface LogEvent {
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export function captureLogger(level: LogLevel = "debug"): { logger: Logger; events: LogEvent[] } {
  const events: LogEvent[] = [];
  const logger = new Logger(
    { component: "test", runId: "run_test" },
    {
      level,
      write: (_level, line) => {
        events.push(JSON.parse(line));
      },
    },
  );
  return { logger, events };
}

export function toArrayBuffer(body: string | Uint8Array): ArrayBuffer {
  const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body;
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FakePage {
  status?: number;
  body?: string | Uint8Array;
  finalUrl?: string;
  delayMs?: number;
  error?: Error;
  bodyError?: Error;
}

export const PLACEHOLDER_BODY = "<html>Das Archiv existiert nicht</html>";

/** In-memory session; pages not listed answer with the archive placeholder. */
export class FakeSession implements DigestSession {
  readonly requested: string[] = [];
  closeCalls = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly pages: ReadonlyMap<string, FakePage> = new Map(),
    private readonly timeline: string[] = [],
  ) {}

  async get(url: string): Promise<SessionResponse> {
    this.requested.push(url);
    this.timeline.push(`get:${url}`);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const page = this.pages.get(url) ?? { body: PLACEHOLDER_BODY };

    try {
      await sleep(page.delayMs ?? 1);
      if (page.error) {
        throw page.error;
      }
    } finally {
      this.inFlight -= 1;
    }

    const { bodyError } = page;
    const body = page.body ?? "";
    return {
      status: page.status ?? 200,
      url: page.finalUrl ?? url,
      arrayBuffer: async () => {
        if (bodyError) {
          throw bodyError;
        }
        return toArrayBuffer(body);
      },
    };
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.timeline.push("close");
  }
}
