import type { EngineCallOptions, EngineGateway, EngineResult, NamespaceListResult } from '../types/engine';
import {
  PciOperState,
  PciState,
  type ListNamespacesResult,
  type Namespace,
  type NamespaceStats,
  type NamespaceStatus,
  type NamespaceSummary,
  type Subsystem,
} from '../types/namespace';
import type {
  CreateNamespaceRequest,
  DeleteNamespaceRequest,
  GetNamespaceRequest,
  ListNamespacesRequest,
  NamespaceStatsRequest,
  UpdateNamespaceRequest,
} from '../schemas/namespace';
import { InMemoryResourceStore, type ResourceStore } from '../stores/registry';
import type { SubsystemDirectory } from '../stores/subsystems';
import { PaginationCursorStore, limitPagination } from '../stores/pagination';
import { ControllerError } from '../lib/errors';
import { KeyedMutex } from '../lib/mutex';
import {
  namespaceNameFromId,
  newSystemGeneratedId,
  resourceIdOf,
  validateFieldMask,
  validateResourceName,
  validateUserSettableId,
} from '../lib/resource';
import logger from '../lib/logger';

const log = logger.child('namespace-controller');

const ATTACHED_STATUS: NamespaceStatus = {
  pciState: PciState.ENABLED,
  pciOperState: PciOperState.ONLINE,
};

export type NamespaceControllerOptions = {
  engine: EngineGateway;
  subsystems: SubsystemDirectory;
  registry?: ResourceStore<Namespace>;
  cursors?: PaginationCursorStore;
  /** Controller slot every command targets. */
  controllerId?: number;
  bdevType?: string;
  /** Deadline for engine calls when the caller gives none. */
  engineTimeoutMs?: number;
};

export type CallContext = {
  /** Upper bound for each engine round-trip made by this request. */
  deadlineMs?: number;
};

/**
 * Lifecycle of NVMe namespaces on the storage engine.
 *
 * The registry records what this agent granted (names, volumes, NSIDs);
 * the engine is asked about what exists. Create, Delete and the volume
 * lookup of Stats trust the registry; List and the existence check of
 * Get trust the engine. The two are only compared while serving a request.
 */
export class NamespaceController {
  private readonly engine: EngineGateway;
  private readonly subsystems: SubsystemDirectory;
  private readonly registry: ResourceStore<Namespace>;
  private readonly cursors: PaginationCursorStore;
  private readonly controllerId: number;
  private readonly bdevType: string;
  private readonly engineTimeoutMs?: number;
  private readonly locks = new KeyedMutex();

  constructor(options: NamespaceControllerOptions) {
    this.engine = options.engine;
    this.subsystems = options.subsystems;
    this.registry = options.registry ?? new InMemoryResourceStore<Namespace>();
    this.cursors = options.cursors ?? new PaginationCursorStore();
    this.controllerId = options.controllerId ?? 0;
    this.bdevType = options.bdevType ?? 'spdk';
    this.engineTimeoutMs = options.engineTimeoutMs;
  }

  /**
   * Attach a volume as a namespace. Calling again with the same id returns
   * the stored namespace without touching the engine.
   */
  async create(req: CreateNamespaceRequest, ctx: CallContext = {}): Promise<Namespace> {
    return this.handle('CreateNamespace', req, async () => {
      const spec = req.namespace.spec;
      if (!spec.subsystemId) {
        throw ControllerError.invalidArgument('invalid input subsystem parameters', { field: 'subsystemId' });
      }

      let resourceId = newSystemGeneratedId();
      if (req.namespaceId) {
        validateUserSettableId(req.namespaceId);
        if (req.namespace.name) {
          log.info('client provided the ID of a resource, ignoring the name field', {
            namespaceId: req.namespaceId,
            name: req.namespace.name,
          });
        }
        resourceId = req.namespaceId;
      }
      const name = namespaceNameFromId(resourceId);

      return this.locks.runExclusive(name, async () => {
        const existing = await this.registry.get(name);
        if (existing) {
          log.info('namespace already exists', { name });
          return existing;
        }

        const subsystem = await this.subsystems.get(spec.subsystemId);
        if (!subsystem) {
          throw ControllerError.notFound(spec.subsystemId);
        }

        const result = await this.engine.attachNamespace(
          {
            bdev_type: this.bdevType,
            bdev: resourceIdOf(spec.volumeId),
            nsid: spec.hostNsid,
            subnqn: subsystem.spec.nqn,
            cntlid: this.controllerId,
            uuid: spec.uuid,
            nguid: spec.nguid,
            eui64: spec.eui64,
          },
          this.callOptions(ctx)
        );
        this.unwrap(result, `Could not create NS: ${name}`);

        const created: Namespace = { name, spec: structuredClone(spec), status: { ...ATTACHED_STATUS } };
        await this.registry.put(name, created);
        log.info('namespace created', { name, subnqn: subsystem.spec.nqn, nsid: spec.hostNsid });
        return structuredClone(created);
      });
    });
  }

  async delete(req: DeleteNamespaceRequest, ctx: CallContext = {}): Promise<void> {
    return this.handle('DeleteNamespace', req, async () => {
      validateResourceName(req.name);

      await this.locks.runExclusive(req.name, async () => {
        const namespace = await this.registry.get(req.name);
        if (!namespace) {
          if (req.allowMissing) {
            log.info('namespace already absent', { name: req.name });
            return;
          }
          throw ControllerError.notFound(req.name);
        }

        const subsystem = await this.subsystems.get(namespace.spec.subsystemId);
        if (!subsystem) {
          throw this.missingSubsystem(namespace);
        }

        const result = await this.engine.detachNamespace(
          { nsid: namespace.spec.hostNsid, subnqn: subsystem.spec.nqn, cntlid: this.controllerId },
          this.callOptions(ctx)
        );
        this.unwrap(result, `Could not delete NS: ${namespace.name}`);

        await this.registry.delete(namespace.name);
        log.info('namespace deleted', { name: namespace.name });
      });
    });
  }

  /**
   * Validates the request fully, then reports UNIMPLEMENTED: which fields
   * may change after attach is not decided yet.
   */
  async update(req: UpdateNamespaceRequest): Promise<Namespace> {
    return this.handle('UpdateNamespace', req, async () => {
      validateResourceName(req.namespace.name, 'namespace.name');

      if (!(await this.registry.get(req.namespace.name))) {
        throw ControllerError.notFound(req.namespace.name);
      }
      validateFieldMask(req.updateMask);
      throw ControllerError.unimplemented('UpdateNamespace');
    });
  }

  /**
   * List the namespaces the engine reports under a subsystem, ordered by
   * NSID and paged by server-side tokens.
   */
  async list(req: ListNamespacesRequest, ctx: CallContext = {}): Promise<ListNamespacesResult> {
    return this.handle('ListNamespaces', req, async () => {
      const window = this.cursors.extract(req.parent, req.pageSize, req.pageToken);

      const subsystem = await this.subsystems.get(req.parent);
      if (!subsystem) {
        throw ControllerError.notFound(req.parent);
      }

      const listed = await this.listEngineNamespaces(subsystem, ctx, `Could not list NS: ${req.parent}`);
      const sorted = listed.namespaces
        .map((entry): NamespaceSummary => ({ spec: { hostNsid: entry.nsid } }))
        .sort((a, b) => a.spec.hostNsid - b.spec.hostNsid);

      log.debug('limiting result', { total: sorted.length, offset: window.offset, size: window.size });
      const [page, hasMoreElements] = limitPagination(sorted, window.offset, window.size);
      const nextPageToken = hasMoreElements ? this.cursors.mint(req.parent, window.offset + window.size) : '';
      return { namespaces: page, nextPageToken };
    });
  }

  async get(req: GetNamespaceRequest, ctx: CallContext = {}): Promise<NamespaceSummary> {
    return this.handle('GetNamespace', req, async () => {
      validateResourceName(req.name);

      const namespace = await this.registry.get(req.name);
      if (!namespace) {
        throw ControllerError.notFound(req.name);
      }
      const subsystem = await this.subsystems.get(namespace.spec.subsystemId);
      if (!subsystem) {
        throw this.missingSubsystem(namespace);
      }

      const listed = await this.listEngineNamespaces(subsystem, ctx, `Could not list NS: ${subsystem.name}`);
      const match = listed.namespaces.find((entry) => entry.nsid === namespace.spec.hostNsid);
      if (!match) {
        throw ControllerError.invalidArgument(`Could not find HostNsid: ${namespace.spec.hostNsid}`, {
          resource: namespace.name,
        });
      }
      return { name: namespace.name, spec: { hostNsid: match.nsid }, status: { ...ATTACHED_STATUS } };
    });
  }

  async stats(req: NamespaceStatsRequest, ctx: CallContext = {}): Promise<NamespaceStats> {
    return this.handle('NamespaceStats', req, async () => {
      validateResourceName(req.namespaceId, 'namespaceId');

      const namespace = await this.registry.get(req.namespaceId);
      if (!namespace) {
        throw ControllerError.notFound(req.namespaceId);
      }

      const iostat = this.unwrap(await this.engine.getIostat(this.callOptions(ctx)), 'Could not read iostat');
      const bdevName = resourceIdOf(namespace.spec.volumeId);
      for (const controller of iostat.controllers) {
        const bdev = controller.bdevs.find((entry) => entry.bdev_name === bdevName);
        if (bdev) {
          return {
            id: req.namespaceId,
            stats: { readOpsCount: bdev.read_ios, writeOpsCount: bdev.write_ios },
          };
        }
      }
      throw ControllerError.invalidArgument(`Could not find BdevName: ${bdevName}`, { resource: namespace.name });
    });
  }

  private async listEngineNamespaces(
    subsystem: Subsystem,
    ctx: CallContext,
    rejectedMessage: string
  ): Promise<NamespaceListResult> {
    const result = await this.engine.listNamespaces(
      { subnqn: subsystem.spec.nqn, cntlid: this.controllerId },
      this.callOptions(ctx)
    );
    return this.unwrap(result, rejectedMessage);
  }

  private callOptions(ctx: CallContext): EngineCallOptions {
    const timeoutMs = ctx.deadlineMs ?? this.engineTimeoutMs;
    return timeoutMs !== undefined ? { timeoutMs } : {};
  }

  /**
   * Engine refusals surface as INVALID_ARGUMENT; failures to reach the
   * engine as UNAVAILABLE or DEADLINE_EXCEEDED.
   */
  private unwrap<T>(result: EngineResult<T>, rejectedMessage: string): T {
    if (result.kind === 'ok') return result.value;
    if (result.kind === 'rejected') {
      throw ControllerError.invalidArgument(rejectedMessage, {
        engineMessage: result.message,
        engineCode: result.code,
      });
    }
    throw result.timedOut
      ? ControllerError.deadlineExceeded(result.message, result.cause)
      : ControllerError.unavailable(result.message, result.cause);
  }

  private missingSubsystem(namespace: Namespace): ControllerError {
    return ControllerError.internal(`unable to find subsystem ${namespace.spec.subsystemId}`, {
      resource: namespace.name,
      subsystem: namespace.spec.subsystemId,
    });
  }

  private async handle<T>(method: string, req: unknown, operation: () => Promise<T>): Promise<T> {
    log.info(`${method}: received from client`, { req });
    try {
      return await operation();
    } catch (err) {
      log.error(`${method} failed`, { err });
      throw err;
    }
  }
}
