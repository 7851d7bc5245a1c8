import type { Server } from 'node:net';

export type ProxyKind = 'http_proxy' | 'tcp_proxy';

export interface LocalProxy {
  readonly address: string | undefined;
  listen(port: number, host: string): Promise<string>;
  close(): Promise<void>;
}

export const listenServer = (server: Server, port: number, host: string): Promise<void> =>
  new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen({ port, host }, () => {
      server.off('error', reject);
      resolve();
    });
  });

export const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve) => {
    server.close(() => resolve());
  });
