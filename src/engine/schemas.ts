import { z } from 'zod';
import type { EngineJobMetrics, EngineVersion } from './base.js';

// aria2 sends every number as a decimal string
const zNumeric = z
  .union([z.string(), z.number()])
  .transform((value) => (typeof value === 'number' ? value : parseInt(value, 10)))
  .pipe(z.number().int().nonnegative())
  .catch(0);

export const zRpcError = z.object({
  code: z.number(),
  message: z.string(),
});

export const zRpcResponse = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: zRpcError.optional(),
});

export const zGid = z.string().regex(/^[0-9a-fA-F]{16}$/);

export const zOk = z.literal('OK');

export const zEngineStatus = z.object({
  gid: zGid,
  status: z.enum(['active', 'waiting', 'paused', 'error', 'complete', 'removed']),
  totalLength: zNumeric,
  completedLength: zNumeric,
  downloadSpeed: zNumeric,
  uploadSpeed: zNumeric.optional(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
  infoHash: z.string().optional(),
  followedBy: z.array(zGid).optional(),
  bittorrent: z
    .object({
      info: z.object({ name: z.string() }).partial().optional(),
    })
    .passthrough()
    .optional(),
}).passthrough();

export type EngineStatusPayload = z.infer<typeof zEngineStatus>;

export const zEngineStatusList = z.array(zEngineStatus);

export const zEngineVersion = z.object({
  version: z.string(),
  enabledFeatures: z.array(z.string()).default([]),
});

export function toMetrics(payload: EngineStatusPayload): EngineJobMetrics {
  const total = payload.totalLength;
  const completed = Math.min(payload.completedLength, total || payload.completedLength);
  const speed = payload.downloadSpeed;
  const remaining = total - completed;

  return {
    gid: payload.gid,
    status: payload.status,
    totalLength: total,
    completedLength: completed,
    downloadSpeed: speed,
    uploadSpeed: payload.uploadSpeed ?? 0,
    progress: total > 0 ? (completed / total) * 100 : 0,
    eta: total > 0 && speed > 0 ? Math.ceil(remaining / speed) : null,
    errorCode: payload.errorCode && payload.errorCode !== '0' ? payload.errorCode : null,
    errorMessage: payload.errorMessage || null,
    infoHash: payload.infoHash ? payload.infoHash.toLowerCase() : null,
    name: payload.bittorrent?.info?.name || null,
    followedBy: payload.followedBy ?? [],
  };
}

export function toVersion(payload: z.infer<typeof zEngineVersion>): EngineVersion {
  return { version: payload.version, enabledFeatures: payload.enabledFeatures };
}
