import { ValidationError } from '../errors.js';
import type { TaskSource } from '../types/task.js';

export interface ParsedMagnet {
  uri: string;
  infoHash: string;       // lower-case hex, or lower-case base32 as given
  name: string | null;    // dn parameter
}

export interface ParsedSource {
  source: TaskSource;
  name: string | null;
  infoHash: string | null;
}

const BTIH_PATTERN = /^urn:btih:([0-9a-fA-F]{40}|[A-Za-z2-7]{32})$/;

/**
 * Parse a magnet URI, returning null unless it carries a BitTorrent info hash
 */
export function parseMagnet(uri: string): ParsedMagnet | null {
  const trimmed = uri.trim();
  if (!trimmed.toLowerCase().startsWith('magnet:?')) {
    return null;
  }

  const params = new URLSearchParams(trimmed.slice('magnet:?'.length));
  let infoHash: string | null = null;
  for (const xt of params.getAll('xt')) {
    const match = xt.match(BTIH_PATTERN);
    if (match) {
      infoHash = match[1].toLowerCase();
      break;
    }
  }
  if (!infoHash) {
    return null;
  }

  const dn = params.get('dn');
  return {
    uri: trimmed,
    infoHash,
    name: dn && dn.trim() ? dn.trim() : null,
  };
}

/**
 * Cheap structural check: a bencoded dictionary holding an info dictionary
 */
export function isTorrentBuffer(data: Buffer): boolean {
  if (data.length < 2 || data[0] !== 0x64 /* d */ || data[data.length - 1] !== 0x65 /* e */) {
    return false;
  }
  return data.toString('latin1').includes('4:infod');
}

/**
 * Extract the torrent name from a torrent buffer
 */
export function extractNameFromTorrentBuffer(data: Buffer): string | null {
  // Use latin1 for bencode structure parsing (to get correct byte positions)
  const content = data.toString('latin1');

  // Parse name field in info dict: 4:name<length>:<value>
  const nameMatch = content.match(/4:name(\d+):/);
  if (!nameMatch || nameMatch.index === undefined) {
    return null;
  }

  const len = parseInt(nameMatch[1], 10);
  const start = nameMatch.index + nameMatch[0].length;
  if (start + len > data.length) {
    return null;
  }
  // Extract raw bytes and decode as UTF-8
  const name = data.subarray(start, start + len).toString('utf8');
  return name || null;
}

/**
 * Validate an add payload. Exactly one of torrent bytes or magnet URI is expected.
 */
export function parseSource(
  input: { torrent?: Buffer; magnet?: string },
  maxTorrentSize: number
): ParsedSource {
  const hasTorrent = input.torrent !== undefined && input.torrent.length > 0;
  const hasMagnet = input.magnet !== undefined && input.magnet.trim() !== '';

  if (hasTorrent === hasMagnet) {
    throw new ValidationError('Provide either a torrent file or a magnet URI');
  }

  if (input.torrent && hasTorrent) {
    if (input.torrent.length > maxTorrentSize) {
      throw new ValidationError(`Torrent file exceeds ${maxTorrentSize} bytes`);
    }
    if (!isTorrentBuffer(input.torrent)) {
      throw new ValidationError('Not a valid torrent file');
    }
    return {
      source: { kind: 'torrent', data: input.torrent },
      name: extractNameFromTorrentBuffer(input.torrent),
      infoHash: null,
    };
  }

  const magnet = parseMagnet(input.magnet ?? '');
  if (!magnet) {
    throw new ValidationError('Not a valid magnet URI');
  }
  return {
    source: { kind: 'magnet', uri: magnet.uri },
    name: magnet.name,
    infoHash: magnet.infoHash,
  };
}
