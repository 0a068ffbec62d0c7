import { openDatabase } from '../../src/db/schema.js';
import { TaskRepository } from '../../src/db/repository.js';

export const INFO_HASH = '0123456789abcdef0123456789abcdef01234567';
export const MAGNET = `magnet:?xt=urn:btih:${INFO_HASH.toUpperCase()}&dn=Test+File`;

/**
 * Minimal single-file torrent, keys in bencode order.
 */
export function makeTorrent(name = 'test-file.bin', length = 1024): Buffer {
  const announce = 'http://tracker.invalid/announce';
  return Buffer.concat([
    Buffer.from(`d8:announce${announce.length}:${announce}4:infod`, 'latin1'),
    Buffer.from(`6:lengthi${length}e4:name${Buffer.byteLength(name)}:`, 'latin1'),
    Buffer.from(name, 'utf8'),
    Buffer.from('12:piece lengthi16384e6:pieces20:', 'latin1'),
    Buffer.alloc(20, 0x61),
    Buffer.from('ee', 'latin1'),
  ]);
}

export function createTestStore(now?: () => number): TaskRepository {
  return new TaskRepository(openDatabase(':memory:'), now);
}

export async function flushAsync(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export function infoHashFor(n: number): string {
  return n.toString(16).padStart(40, '0');
}

export function magnetFor(n: number): string {
  return `magnet:?xt=urn:btih:${infoHashFor(n)}&dn=Test+File+${n}`;
}
