import { describe, expect, it } from 'vitest';

import { parsePortMapping, proxySchema } from '../src';

describe('parsePortMapping', () => {
  it('reads local and remote ports', () => {
    expect(parsePortMapping('8080:80')).toEqual({ remote_port: 80, local_port: 8080 });
    expect(parsePortMapping(' 8080 : 80 ')).toEqual({ remote_port: 80, local_port: 8080 });
  });

  it('reads a bare remote port', () => {
    expect(parsePortMapping('80')).toEqual({ remote_port: 80 });
    expect(parsePortMapping('80')?.local_port).toBeUndefined();
  });

  it('returns undefined for anything else', () => {
    expect(parsePortMapping('80:')).toBeUndefined();
    expect(parsePortMapping('http')).toBeUndefined();
    expect(parsePortMapping('1:2:3')).toBeUndefined();
  });
});

describe('proxySchema', () => {
  it('accepts numbers, shorthand strings and objects', () => {
    expect(proxySchema.parse({ ports: [80, '8080:80', { remote_port: 22, local_port: 2222 }] })).toEqual({
      ports: [{ remote_port: 80 }, { remote_port: 80, local_port: 8080 }, { remote_port: 22, local_port: 2222 }],
    });
  });

  it('rejects ports out of range', () => {
    expect(proxySchema.safeParse({ ports: ['70000'] }).success).toBe(false);
    expect(proxySchema.safeParse({ ports: [0] }).success).toBe(false);
  });

  it('requires at least one port', () => {
    expect(proxySchema.safeParse({ ports: [] }).success).toBe(false);
  });

  it('rejects unknown mapping keys', () => {
    expect(proxySchema.safeParse({ ports: [{ remote_port: 80, protocol: 'udp' }] }).success).toBe(false);
  });
});
