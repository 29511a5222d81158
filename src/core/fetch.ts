import { Agent } from "undici";

export interface DispatcherOptions {
  ignoreHttpsErrors: boolean;
  /** Upper bound of sockets per origin; 0 leaves it to undici. */
  connections: number;
}

export function createFetchDispatcher(options: DispatcherOptions): Agent {
  return new Agent({
    connections: options.connections > 0 ? options.connections : null,
    connect: {
      rejectUnauthorized: !options.ignoreHttpsErrors,
    },
  });
}
