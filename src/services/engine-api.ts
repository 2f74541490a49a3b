import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import https from 'https';
import { z } from 'zod';
import type {
  EngineCallOptions,
  EngineGateway,
  EngineResult,
  IostatResult,
  NamespaceAttachParams,
  NamespaceDetachParams,
  NamespaceListParams,
  NamespaceListResult,
} from '../types/engine';
import logger from '../lib/logger';

const log = logger.child('engine-api');

export type EngineApiOptions = {
  baseUrl: string;
  username?: string;
  password?: string;
  allowInsecureTls?: boolean;
  timeoutMs?: number;
  /** Replaces the HTTP transport, e.g. to answer requests in-process. */
  adapter?: AxiosAdapter;
};

const rpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const namespaceListSchema = z.object({
  name: z.string().optional(),
  cntlid: z.number().optional(),
  namespaces: z.array(
    z.object({
      nsid: z.number().int(),
      bdev: z.string().optional(),
      bdev_type: z.string().optional(),
      qn: z.string().optional(),
      protocol: z.string().optional(),
    })
  ),
});

const iostatSchema = z.object({
  tick_rate: z.number().optional(),
  controllers: z.array(
    z.object({
      name: z.string().optional(),
      cntlid: z.number().optional(),
      bdevs: z.array(
        z.object({
          bdev_name: z.string(),
          read_ios: z.number(),
          write_ios: z.number(),
          read_bytes: z.number().optional(),
          write_bytes: z.number().optional(),
        })
      ),
    })
  ),
});

const booleanResultSchema = z.boolean();

/**
 * JSON-RPC 2.0 client for the storage engine, spoken over HTTP (the
 * engine's RPC proxy). Every call resolves to a tagged EngineResult; it
 * never throws for engine or network failures.
 */
export class EngineApi implements EngineGateway {
  private readonly client: AxiosInstance;
  private readonly defaultTimeoutMs: number;
  private nextId = 1;

  constructor(options: EngineApiOptions) {
    this.defaultTimeoutMs = options.timeoutMs ?? 10_000;

    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ''),
      auth:
        options.username !== undefined
          ? { username: options.username, password: options.password ?? '' }
          : undefined,
      timeout: this.defaultTimeoutMs,
      httpsAgent,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });
  }

  /**
   * Send one command and validate its result with `schema`.
   */
  async call<T>(
    method: string,
    params: unknown,
    schema: z.ZodType<T>,
    opts: EngineCallOptions = {}
  ): Promise<EngineResult<T>> {
    const id = this.nextId++;
    const timeout = opts.timeoutMs ?? this.defaultTimeoutMs;
    log.debug('sending command', { method, id, params, timeoutMs: timeout });

    let body: unknown;
    try {
      const res = await this.client.post<unknown>(
        '/',
        { jsonrpc: '2.0', id, method, ...(params !== undefined ? { params } : {}) },
        { timeout }
      );
      body = res.data;
    } catch (err) {
      const timedOut = axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
      const message = err instanceof Error ? err.message : String(err);
      log.error('engine transport failure', { method, id, timedOut, err });
      return { kind: 'transport', message: `${method}: ${message}`, timedOut, cause: err };
    }

    const envelope = rpcResponseSchema.safeParse(body);
    if (!envelope.success) {
      log.error('malformed engine response', { method, id, body });
      return { kind: 'transport', message: `${method}: malformed JSON-RPC response`, timedOut: false };
    }
    if (envelope.data.error) {
      log.warn('engine rejected command', { method, id, error: envelope.data.error });
      return { kind: 'rejected', message: envelope.data.error.message, code: envelope.data.error.code };
    }

    const parsed = schema.safeParse(envelope.data.result);
    if (!parsed.success) {
      log.error('unexpected engine result shape', { method, id, result: envelope.data.result });
      return {
        kind: 'transport',
        message: `${method}: unexpected result shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        timedOut: false,
      };
    }
    log.debug('received from engine', { method, id, result: parsed.data });
    return { kind: 'ok', value: parsed.data };
  }

  // ---- Controller namespaces ----

  async attachNamespace(params: NamespaceAttachParams, opts?: EngineCallOptions): Promise<EngineResult<void>> {
    return this.expectTrue(
      'controller_nvme_namespace_attach',
      await this.call('controller_nvme_namespace_attach', params, booleanResultSchema, opts)
    );
  }

  async detachNamespace(params: NamespaceDetachParams, opts?: EngineCallOptions): Promise<EngineResult<void>> {
    return this.expectTrue(
      'controller_nvme_namespace_detach',
      await this.call('controller_nvme_namespace_detach', params, booleanResultSchema, opts)
    );
  }

  async listNamespaces(
    params: NamespaceListParams,
    opts?: EngineCallOptions
  ): Promise<EngineResult<NamespaceListResult>> {
    return this.call('controller_nvme_namespace_list', params, namespaceListSchema, opts);
  }

  // ---- Statistics ----

  async getIostat(opts?: EngineCallOptions): Promise<EngineResult<IostatResult>> {
    return this.call('controller_nvme_get_iostat', undefined, iostatSchema, opts);
  }

  private expectTrue(method: string, result: EngineResult<boolean>): EngineResult<void> {
    if (result.kind !== 'ok') return result;
    if (!result.value) {
      return { kind: 'rejected', message: `${method} returned false` };
    }
    return { kind: 'ok', value: undefined };
  }
}
