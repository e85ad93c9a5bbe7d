import { readFile } from 'node:fs/promises';
import type { Logger } from './logger.js';

export function parseProxyList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#') && line.includes(':'))
    .map((line) => `http://${line}`);
}

export async function loadProxies(filePath: string, logger: Logger): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    await logger.warn(`Proxy file ${filePath} not readable: ${String(error)}`);
    return [];
  }

  const proxies = parseProxyList(content);
  await logger.info(`${proxies.length} proxies loaded from ${filePath}`);
  return proxies;
}
