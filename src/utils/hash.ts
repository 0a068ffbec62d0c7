import * as crypto from 'crypto';

/**
 * Generate a unique SHA-1 task id
 * Uses seed + timestamp + random bytes to ensure uniqueness
 */
export function generateTaskId(seed: string): string {
  const data = `${seed}:${Date.now()}:${crypto.randomBytes(16).toString('hex')}`;
  return crypto.createHash('sha1').update(data).digest('hex');
}

export function fallbackTaskName(taskId: string): string {
  return `Download_${taskId.slice(0, 8)}`;
}

export function isFallbackTaskName(name: string): boolean {
  return /^Download_[0-9a-f]{8}$/.test(name);
}
