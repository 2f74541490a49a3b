/**
 * Parameters and results of the engine's JSON-RPC controller commands.
 * Field names follow the wire format.
 */

export type NamespaceAttachParams = {
  bdev_type: string;
  bdev: string;
  nsid: number;
  subnqn: string;
  cntlid: number;
  uuid?: string;
  nguid?: string;
  eui64?: string;
};

export type NamespaceDetachParams = {
  nsid: number;
  subnqn: string;
  cntlid: number;
};

export type NamespaceListParams = {
  subnqn: string;
  cntlid: number;
};

export type EngineNamespace = {
  nsid: number;
  bdev?: string;
  bdev_type?: string;
  qn?: string;
  protocol?: string;
};

export type NamespaceListResult = {
  name?: string;
  cntlid?: number;
  namespaces: EngineNamespace[];
};

export type BdevIostat = {
  bdev_name: string;
  read_ios: number;
  write_ios: number;
  read_bytes?: number;
  write_bytes?: number;
};

export type ControllerIostat = {
  name?: string;
  cntlid?: number;
  bdevs: BdevIostat[];
};

export type IostatResult = {
  tick_rate?: number;
  controllers: ControllerIostat[];
};

/**
 * Outcome of one engine command. `rejected` means the engine answered and
 * refused; `transport` means no usable answer arrived.
 */
export type EngineResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'rejected'; message: string; code?: number }
  | { kind: 'transport'; message: string; timedOut: boolean; cause?: unknown };

export type EngineCallOptions = {
  timeoutMs?: number;
};

export interface EngineGateway {
  attachNamespace(params: NamespaceAttachParams, opts?: EngineCallOptions): Promise<EngineResult<void>>;
  detachNamespace(params: NamespaceDetachParams, opts?: EngineCallOptions): Promise<EngineResult<void>>;
  listNamespaces(params: NamespaceListParams, opts?: EngineCallOptions): Promise<EngineResult<NamespaceListResult>>;
  getIostat(opts?: EngineCallOptions): Promise<EngineResult<IostatResult>>;
}
