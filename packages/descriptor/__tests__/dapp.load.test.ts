import { describe, expect, it } from 'vitest';

import {
  CycleError,
  DescriptorReferenceError,
  UnmetDependencyError,
  ValidationError,
  applyImplicitDefaults,
  loadDapp,
} from '../src';

const descriptor = () => ({
  payloads: {
    simple: { runtime: 'vm', params: { image_hash: 'hash-1' } },
  },
  nodes: {
    db: { payload: 'simple', init: [['/bin/start-db']] },
    http: {
      payload: 'simple',
      init: ['/bin/serve'],
      http_proxy: { ports: ['8080:80'] },
      depends_on: ['db'],
    },
  },
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a failure');
}

describe('loadDapp', () => {
  it('loads nodes, payloads and canonical commands', () => {
    const dapp = loadDapp(descriptor());

    expect(dapp.nodeCount).toBe(2);
    expect(dapp.nodesPrioritized()).toEqual(['db', 'http']);
    expect(dapp.nodes.db.init).toEqual([{ cmd: 'run', params: { args: ['/bin/start-db'] } }]);
    expect(dapp.nodes.http.init).toEqual([{ cmd: 'run', params: { args: ['/bin/serve'] } }]);
    expect(dapp.nodes.http.http_proxy?.ports).toEqual([{ remote_port: 80, local_port: 8080 }]);
    expect(dapp.meta).toEqual({});
  });

  it('assigns the default network to proxy nodes and adds the vpn capability', () => {
    const dapp = loadDapp(descriptor());

    expect(dapp.nodes.http.network).toBe('default');
    expect(dapp.nodes.db.network).toBeUndefined();
    expect(dapp.networks).toEqual({ default: { ip: '192.168.0.0/24' } });
    expect(dapp.payloads.simple.params).toEqual({ image_hash: 'hash-1', capabilities: ['vpn'] });
  });

  it('keeps an explicit network on proxy nodes', () => {
    const input = {
      payloads: { simple: { runtime: 'vm' } },
      networks: { private: { ip: '10.0.0.0/16' } },
      nodes: { proxy: { payload: 'simple', network: 'private', tcp_proxy: { ports: [22] } } },
    };
    const dapp = loadDapp(input);

    expect(dapp.nodes.proxy.network).toBe('private');
    expect(Object.keys(dapp.networks)).toEqual(['private']);
  });

  it('assigns the default network for a tcp proxy alone', () => {
    const dapp = loadDapp({
      payloads: { simple: { runtime: 'wasm' } },
      nodes: { ssh: { payload: 'simple', tcp_proxy: { ports: ['2222:22'] } } },
    });

    expect(dapp.nodes.ssh.network).toBe('default');
    expect(dapp.payloads.simple.params).toEqual({});
  });

  it('injects capabilities idempotently', () => {
    const dapp = loadDapp({
      payloads: {
        web: { runtime: 'vm/manifest', params: { capabilities: ['vpn'] } },
        plain: { runtime: 'vm/manifest' },
      },
      nodes: {
        web: { payload: 'web', http_proxy: { ports: [80] } },
        worker: { payload: 'plain' },
      },
    });

    expect(dapp.payloads.web.params.capabilities).toEqual(['vpn', 'manifest-support']);
    expect(dapp.payloads.plain.params.capabilities).toEqual(['manifest-support']);

    applyImplicitDefaults(dapp.tree);
    applyImplicitDefaults(dapp.tree);

    expect(dapp.payloads.web.params.capabilities).toEqual(['vpn', 'manifest-support']);
    expect(dapp.payloads.plain.params.capabilities).toEqual(['manifest-support']);
  });

  it('never mutates the caller input', () => {
    const input = {
      payloads: { simple: { runtime: 'vm', params: { capabilities: ['gpu'] } } },
      nodes: { web: { payload: 'simple', http_proxy: { ports: [80] } } },
    };
    const dapp = loadDapp(input);

    expect(dapp.payloads.simple.params.capabilities).toEqual(['gpu', 'vpn']);
    expect(input.payloads.simple.params.capabilities).toEqual(['gpu']);
    expect(input.nodes.web).toEqual({ payload: 'simple', http_proxy: { ports: [80] } });
  });

  it('serializes back to a loadable tree', () => {
    const dapp = loadDapp(descriptor());
    dapp.nodes.db.state = 'running';
    dapp.nodes.db.activity_id = 'activity-1';

    const serialized = dapp.toJSON();
    expect(serialized.nodes.http.init).toEqual([{ run: { args: ['/bin/serve'] } }]);
    expect(serialized.nodes.http.http_proxy?.ports).toEqual([{ remote_port: 80, local_port: 8080 }]);

    const reloaded = loadDapp(JSON.parse(JSON.stringify(dapp)));
    expect(reloaded.tree).toEqual(dapp.tree);
    expect(reloaded.nodes.db.activity_id).toBe('activity-1');
  });

  it('reports unexpected keys with their path', () => {
    const err = captureError(() => loadDapp({ ...descriptor(), extra: 1 }));

    expect(err).toBeInstanceOf(ValidationError);
    if (!(err instanceof ValidationError)) return;
    expect(err.unexpectedKeys).toEqual(['extra']);
    expect(err.message).toBe('Invalid dapp descriptor: Unexpected keys: `extra`');
  });

  it('reports unexpected keys inside a node', () => {
    const input = descriptor();
    const err = captureError(() =>
      loadDapp({ ...input, nodes: { ...input.nodes, db: { payload: 'simple', entrypoint: ['x'] } } }),
    );

    expect(err).toBeInstanceOf(ValidationError);
    if (!(err instanceof ValidationError)) return;
    expect(err.unexpectedKeys).toEqual(['nodes.db.entrypoint']);
    expect(err.issues).toEqual(['Unexpected keys: `entrypoint` at `nodes.db`']);
  });

  it('reports missing keys', () => {
    const err = captureError(() => loadDapp({ payloads: {}, nodes: { db: { init: [] } } }));

    expect(err).toBeInstanceOf(ValidationError);
    if (!(err instanceof ValidationError)) return;
    expect(err.missingKeys).toEqual(['nodes.db.payload']);
  });

  it('rejects a command map naming several verbs', () => {
    const input = descriptor();
    const db = { payload: 'simple', init: [{ run: ['/bin/a'], test: { param: 'x' } }] };

    expect(() => loadDapp({ ...input, nodes: { ...input.nodes, db } })).toThrow(
      'Command [0] must name exactly one verb, got: run, test',
    );
  });

  it('rejects invalid port strings', () => {
    const input = descriptor();
    const http = { ...input.nodes.http, http_proxy: { ports: ['80:abc'] } };

    expect(() => loadDapp({ ...input, nodes: { ...input.nodes, http } })).toThrow(ValidationError);
  });

  it('rejects an undefined payload', () => {
    const input = descriptor();
    const db = { payload: 'missing' };

    expect(() => loadDapp({ ...input, nodes: { ...input.nodes, db } })).toThrow(DescriptorReferenceError);
    expect(() => loadDapp({ ...input, nodes: { ...input.nodes, db } })).toThrow(
      'Undefined payload: `missing` in node: `db`',
    );
  });

  it('rejects an undefined network', () => {
    const input = descriptor();
    const db = { payload: 'simple', network: 'missing' };

    expect(() => loadDapp({ ...input, nodes: { ...input.nodes, db } })).toThrow(
      'Undefined network: `missing` in node: `db`',
    );
  });

  it('rejects circular dependencies', () => {
    const err = captureError(() =>
      loadDapp({
        payloads: { simple: { runtime: 'wasm' } },
        nodes: {
          a: { payload: 'simple', depends_on: ['b'] },
          b: { payload: 'simple', depends_on: ['a'] },
        },
      }),
    );

    expect(err).toBeInstanceOf(CycleError);
    if (!(err instanceof CycleError)) return;
    expect(err.cycle).toEqual(['a', 'b', 'a']);
    expect(err.message).toBe('Node definitions contain a circular `depends_on`: a -> b -> a');
  });

  it('rejects a self dependency', () => {
    expect(() =>
      loadDapp({
        payloads: { simple: { runtime: 'wasm' } },
        nodes: { a: { payload: 'simple', depends_on: ['a'] } },
      }),
    ).toThrow(CycleError);
  });

  it('rejects unmet dependencies', () => {
    expect(() =>
      loadDapp({
        payloads: { simple: { runtime: 'wasm' } },
        nodes: { a: { payload: 'simple', depends_on: ['ghost'] } },
      }),
    ).toThrow(new UnmetDependencyError('a', 'ghost'));
  });
});
