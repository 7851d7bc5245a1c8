import { createServer } from 'node:net';

export type PortProbe = (port: number) => Promise<boolean>;

export const DEFAULT_PORT_RANGE_START = 8080;
export const DEFAULT_PORT_RANGE_END = 9090;

export class PortAllocationError extends Error {
  constructor(
    readonly rangeStart: number,
    readonly rangeEnd: number,
  ) {
    super(`No free ports found. range_start=${rangeStart}, range_end=${rangeEnd}`);
    this.name = 'PortAllocationError';
  }
}

/** Free if a listener can bind it on the given host. */
export const listenProbe =
  (host = '127.0.0.1'): PortProbe =>
  (port) =>
    new Promise((resolve) => {
      const server = createServer();
      server.once('error', () => resolve(false));
      server.listen({ port, host }, () => {
        server.close(() => resolve(true));
      });
    });

export type PortAllocatorOptions = {
  rangeStart?: number;
  rangeEnd?: number;
  probe?: PortProbe;
};

/**
 * Hands out local ports from an inclusive range, never the same one twice.
 * One allocator is created per runner start.
 */
export class PortAllocator {
  readonly rangeStart: number;
  readonly rangeEnd: number;
  private readonly probe: PortProbe;
  private readonly used = new Set<number>();

  constructor(options: PortAllocatorOptions = {}) {
    this.rangeStart = options.rangeStart ?? DEFAULT_PORT_RANGE_START;
    this.rangeEnd = options.rangeEnd ?? DEFAULT_PORT_RANGE_END;
    this.probe = options.probe ?? listenProbe();
  }

  reserve(port: number): void {
    this.used.add(port);
  }

  async next(): Promise<number> {
    for (let port = this.rangeStart; port <= this.rangeEnd; port++) {
      if (this.used.has(port)) continue;
      // claimed before probing so concurrent callers skip it
      this.used.add(port);
      if (await this.probe(port)) return port;
    }
    throw new PortAllocationError(this.rangeStart, this.rangeEnd);
  }
}
