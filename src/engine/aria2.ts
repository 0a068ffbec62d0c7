import axios from 'axios';
import type { z } from 'zod';
import type { EngineConfig } from '../config.js';
import { EngineRejected, EngineUnreachable, errorMessage } from '../errors.js';
import type { TaskSource } from '../types/task.js';
import type {
  EngineCallOptions,
  EngineClient,
  EngineJobMetrics,
  EngineSubmitOptions,
  EngineVersion,
} from './base.js';
import {
  toMetrics,
  toVersion,
  zEngineStatus,
  zEngineStatusList,
  zEngineVersion,
  zGid,
  zOk,
  zRpcResponse,
} from './schemas.js';

const STATUS_KEYS = [
  'gid',
  'status',
  'totalLength',
  'completedLength',
  'downloadSpeed',
  'uploadSpeed',
  'errorCode',
  'errorMessage',
  'infoHash',
  'followedBy',
  'bittorrent',
];

// tellWaiting / tellStopped page size
const LIST_LIMIT = 1000;

let requestCounter = 0;

/**
 * aria2 client via JSON-RPC
 * Documentation: https://aria2.github.io/manual/en/html/aria2c.html#rpc-interface
 */
export class Aria2Client implements EngineClient {
  readonly name = 'aria2';

  constructor(private readonly config: EngineConfig) {}

  private getUrl(): string {
    return `http://${this.config.host}:${this.config.port}/jsonrpc`;
  }

  private async rpcCall<T extends z.ZodTypeAny>(
    method: string,
    params: unknown[],
    schema: T,
    options: EngineCallOptions = {}
  ): Promise<z.output<T>> {
    // If secret is set, prepend it to params
    const rpcParams = this.config.secret
      ? [`token:${this.config.secret}`, ...params]
      : params;
    const timeout = options.timeoutMs ?? this.config.timeoutMs;

    let status: number;
    let body: unknown;
    try {
      const response = await axios.post<unknown>(this.getUrl(), {
        jsonrpc: '2.0',
        id: `orchestrator-${++requestCounter}`,
        method,
        params: rpcParams,
      }, {
        timeout,
        // aria2 answers RPC errors with HTTP 400 and a JSON-RPC error body
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
        throw new EngineUnreachable(`${method} timed out after ${timeout}ms`);
      }
      throw new EngineUnreachable(`${method} failed: ${errorMessage(error)}`);
    }

    const envelope = zRpcResponse.safeParse(body);
    if (envelope.success && envelope.data.error) {
      const { code, message } = envelope.data.error;
      throw new EngineRejected(`${method}: ${message}`, code);
    }
    if (status >= 500) {
      throw new EngineUnreachable(`${method} failed: HTTP ${status}`);
    }
    if (!envelope.success || status >= 300) {
      throw new EngineRejected(`${method}: unexpected response (HTTP ${status})`);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      console.error(`[aria2] ${method} returned an unexpected payload:`, result.error.message);
      throw new EngineRejected(`${method}: malformed result`);
    }
    return result.data;
  }

  async submit(source: TaskSource, options: EngineSubmitOptions = {}): Promise<string> {
    const jobOptions: Record<string, string> = {};
    if (this.config.dir) {
      jobOptions.dir = this.config.dir;
    }
    if (options.paused) {
      jobOptions.pause = 'true';
    }

    const gid = source.kind === 'torrent'
      ? await this.rpcCall('aria2.addTorrent', [source.data.toString('base64'), [], jobOptions], zGid, options)
      : await this.rpcCall('aria2.addUri', [[source.uri], jobOptions], zGid, options);

    console.log(`[aria2] Added ${source.kind} with GID ${gid}`);
    return gid;
  }

  async pause(gid: string, options?: EngineCallOptions): Promise<void> {
    await this.rpcCall('aria2.pause', [gid], zGid, options);
  }

  async resume(gid: string, options?: EngineCallOptions): Promise<void> {
    await this.rpcCall('aria2.unpause', [gid], zGid, options);
  }

  async remove(gid: string, options?: EngineCallOptions): Promise<void> {
    await this.rpcCall('aria2.remove', [gid], zGid, options);
  }

  async forgetResult(gid: string, options?: EngineCallOptions): Promise<void> {
    await this.rpcCall('aria2.removeDownloadResult', [gid], zOk, options);
  }

  async status(gid: string, options?: EngineCallOptions): Promise<EngineJobMetrics> {
    const payload = await this.rpcCall('aria2.tellStatus', [gid, STATUS_KEYS], zEngineStatus, options);
    return toMetrics(payload);
  }

  async listActive(options?: EngineCallOptions): Promise<EngineJobMetrics[]> {
    const payload = await this.rpcCall('aria2.tellActive', [STATUS_KEYS], zEngineStatusList, options);
    return payload.map(toMetrics);
  }

  async listWaiting(options?: EngineCallOptions): Promise<EngineJobMetrics[]> {
    const payload = await this.rpcCall('aria2.tellWaiting', [0, LIST_LIMIT, STATUS_KEYS], zEngineStatusList, options);
    return payload.map(toMetrics);
  }

  async listStopped(options?: EngineCallOptions): Promise<EngineJobMetrics[]> {
    const payload = await this.rpcCall('aria2.tellStopped', [0, LIST_LIMIT, STATUS_KEYS], zEngineStatusList, options);
    return payload.map(toMetrics);
  }

  async getVersion(options?: EngineCallOptions): Promise<EngineVersion> {
    const payload = await this.rpcCall('aria2.getVersion', [], zEngineVersion, options);
    return toVersion(payload);
  }
}
