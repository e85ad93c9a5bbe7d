import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadProxies, parseProxyList } from '../utils/proxies.js';
import { createTestLogger } from './helpers.js';

describe('parseProxyList', () => {
  it('keeps host:port lines and skips comments and blanks', () => {
    const content = '# maison\n10.0.0.1:3128\n\n  10.0.0.2:8080  \r\nnot-a-proxy\n';

    expect(parseProxyList(content)).toEqual(['http://10.0.0.1:3128', 'http://10.0.0.2:8080']);
  });
});

describe('loadProxies', () => {
  it('reads the proxy file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'proxies-'));
    const filePath = join(dir, 'proxies.txt');
    await writeFile(filePath, '10.0.0.1:3128\n', 'utf8');
    const logger = createTestLogger();

    try {
      await expect(loadProxies(filePath, logger)).resolves.toEqual(['http://10.0.0.1:3128']);
      expect(logger.info).toHaveBeenCalledWith(`1 proxies loaded from ${filePath}`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('returns an empty list when the file is missing', async () => {
    const logger = createTestLogger();

    await expect(loadProxies(join(tmpdir(), 'absent-proxies-file.txt'), logger)).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
