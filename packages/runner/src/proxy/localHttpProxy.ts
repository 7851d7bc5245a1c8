import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';

import httpProxy from 'http-proxy';

import type { ProxyTarget } from '../provider/computeProvider.port';
import type { LoggerService } from '../service/logger.service';
import { closeServer, listenServer, type LocalProxy } from './localProxy';

type HttpProxyServer = ReturnType<typeof httpProxy.createProxyServer>;

/** Local HTTP listener forwarding requests (and websocket upgrades) to a remote instance port. */
export class LocalHttpProxy implements LocalProxy {
  private server?: HttpServer;
  private proxy?: HttpProxyServer;
  private boundAddress?: string;

  constructor(
    private readonly target: ProxyTarget,
    private readonly logger: LoggerService,
  ) {}

  get address(): string | undefined {
    return this.boundAddress;
  }

  async listen(port: number, host: string): Promise<string> {
    const proxy = httpProxy.createProxyServer({
      target: `http://${this.target.host}:${this.target.port}`,
      changeOrigin: true,
      ws: true,
    });
    proxy.on('error', (error: Error, req?: IncomingMessage) => {
      this.logger.warn('Local HTTP proxy error', { error: error.message, url: req?.url });
    });
    this.proxy = proxy;

    const server = createServer((req, res) => this.forward(req, res));
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      proxy.ws(req, socket, head, undefined, () => socket.destroy());
    });
    await listenServer(server, port, host);
    this.server = server;
    this.boundAddress = `http://${host}:${port}`;
    return this.boundAddress;
  }

  private forward(req: IncomingMessage, res: ServerResponse) {
    if (!this.proxy) {
      res.statusCode = 503;
      res.end();
      return;
    }
    this.proxy.web(req, res, undefined, (error) => {
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.statusCode = 502;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ error: 'proxy_failed', message: error instanceof Error ? error.message : 'proxy_failed' }));
    });
  }

  async close(): Promise<void> {
    this.proxy?.close();
    this.proxy = undefined;
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    const closed = closeServer(server);
    server.closeAllConnections();
    await closed;
  }
}
