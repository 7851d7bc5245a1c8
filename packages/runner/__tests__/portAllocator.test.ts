import { describe, expect, it } from 'vitest';

import { PortAllocationError, PortAllocator } from '../src';

const freeExcept =
  (...busy: number[]) =>
  async (port: number) =>
    !busy.includes(port);

describe('PortAllocator', () => {
  it('returns the first free port and never repeats it', async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9005, probe: freeExcept(9000) });

    expect(await ports.next()).toBe(9001);
    expect(await ports.next()).toBe(9002);
  });

  it('skips reserved ports', async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9005, probe: freeExcept() });
    ports.reserve(9000);
    ports.reserve(9001);

    expect(await ports.next()).toBe(9002);
  });

  it('hands distinct ports to concurrent callers', async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9005, probe: freeExcept() });

    const allocated = await Promise.all([ports.next(), ports.next(), ports.next()]);

    expect(allocated).toEqual([9000, 9001, 9002]);
  });

  it('fails once the range is exhausted', async () => {
    const ports = new PortAllocator({ rangeStart: 9000, rangeEnd: 9001, probe: freeExcept(9001) });
    await ports.next();

    const error = await ports.next().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PortAllocationError);
    expect(error).toMatchObject({ message: 'No free ports found. range_start=9000, range_end=9001' });
  });

  it('defaults to the 8080-9090 range', () => {
    const ports = new PortAllocator();

    expect([ports.rangeStart, ports.rangeEnd]).toEqual([8080, 9090]);
  });
});
