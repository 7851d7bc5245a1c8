import { connect, createServer, type Server, type Socket } from 'node:net';

import type { ProxyTarget } from '../provider/computeProvider.port';
import type { LoggerService } from '../service/logger.service';
import { closeServer, listenServer, type LocalProxy } from './localProxy';

/** Plain TCP relay from a local port to a remote instance port. */
export class LocalTcpProxy implements LocalProxy {
  private server?: Server;
  private readonly sockets = new Set<Socket>();
  private boundAddress?: string;

  constructor(
    private readonly target: ProxyTarget,
    private readonly logger: LoggerService,
  ) {}

  get address(): string | undefined {
    return this.boundAddress;
  }

  async listen(port: number, host: string): Promise<string> {
    const server = createServer((client) => this.relay(client));
    await listenServer(server, port, host);
    this.server = server;
    this.boundAddress = `${host}:${port}`;
    return this.boundAddress;
  }

  private relay(client: Socket) {
    const upstream = connect({ host: this.target.host, port: this.target.port });
    this.track(client);
    this.track(upstream);

    const fail = (side: string) => (error: Error) => {
      this.logger.warn('Local TCP proxy connection error', { side, error: error.message });
      client.destroy();
      upstream.destroy();
    };
    client.on('error', fail('client'));
    upstream.on('error', fail('upstream'));

    client.pipe(upstream);
    upstream.pipe(client);
  }

  private track(socket: Socket) {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    const closed = closeServer(server);
    for (const socket of this.sockets) socket.destroy();
    await closed;
  }
}
