import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { ConnectionPool } from './connection-pool.js';

describe('ConnectionPool', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'connection-pool-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('applies the default socket limit to both agents', () => {
    const pool = new ConnectionPool();

    expect(pool.httpAgent.maxSockets).toBe(100);
    expect(pool.httpsAgent.maxSockets).toBe(100);
    pool.close();
  });

  it('applies a configured socket limit', () => {
    const pool = new ConnectionPool({ maxSockets: 7 });

    expect(pool.httpAgent.maxSockets).toBe(7);
    expect(pool.httpsAgent.maxSockets).toBe(7);
    pool.close();
  });

  it('seeds the https agent with the CA bundle', async () => {
    const caFile = join(dir, 'ca.pem');
    await writeFile(caFile, 'test-ca');

    const pool = new ConnectionPool({ caFile });

    expect(pool.httpsAgent.options.ca).toEqual(Buffer.from('test-ca'));
    pool.close();
  });

  it('fails fast on an unreadable CA bundle', () => {
    expect(() => new ConnectionPool({ caFile: join(dir, 'missing.pem') })).toThrow(
      /ENOENT/,
    );
  });

  it('closes both agents once', () => {
    const pool = new ConnectionPool();
    const destroyHttp = vi.spyOn(pool.httpAgent, 'destroy');
    const destroyHttps = vi.spyOn(pool.httpsAgent, 'destroy');

    expect(pool.closed).toBe(false);
    pool.close();
    pool.close();

    expect(pool.closed).toBe(true);
    expect(destroyHttp).toHaveBeenCalledTimes(1);
    expect(destroyHttps).toHaveBeenCalledTimes(1);
  });
});
