import { describe, it, expect, beforeEach } from 'vitest';

import { NamespaceController } from '../../src/controllers/namespace.controller';
import type { CreateNamespaceRequest } from '../../src/schemas/namespace';
import { InMemoryResourceStore } from '../../src/stores/registry';
import { InMemorySubsystemDirectory } from '../../src/stores/subsystems';
import { PaginationCursorStore } from '../../src/stores/pagination';
import { ErrorCode } from '../../src/lib/errors';
import type { Namespace } from '../../src/types/namespace';
import { FakeEngine } from '../helpers/fake-engine';

const NQN = 'nqn.2022-09.io.spdk:opi1';

function createRequest(overrides: Partial<CreateNamespaceRequest['namespace']['spec']> = {}, namespaceId = 'ns-1'): CreateNamespaceRequest {
  return {
    namespace: {
      spec: {
        subsystemId: 'subsystems/nqn-1',
        volumeId: 'volumes/v1',
        hostNsid: 5,
        ...overrides,
      },
    },
    namespaceId,
  };
}

describe('NamespaceController', () => {
  let engine: FakeEngine;
  let subsystems: InMemorySubsystemDirectory;
  let registry: InMemoryResourceStore<Namespace>;
  let controller: NamespaceController;

  beforeEach(() => {
    engine = new FakeEngine();
    subsystems = new InMemorySubsystemDirectory([
      { name: 'subsystems/nqn-1', spec: { nqn: NQN } },
      { name: 'subsystems/nqn-2', spec: { nqn: 'nqn.2022-09.io.spdk:opi2' } },
    ]);
    registry = new InMemoryResourceStore<Namespace>();
    controller = new NamespaceController({
      engine,
      subsystems,
      registry,
      cursors: new PaginationCursorStore({ defaultPageSize: 3, maxPageSize: 4 }),
    });
  });

  // ==========================================================================
  // create
  // ==========================================================================

  describe('create', () => {
    it('attaches the volume and stores the namespace as attached', async () => {
      const created = await controller.create(createRequest());

      expect(created).toEqual({
        name: 'namespaces/ns-1',
        spec: { subsystemId: 'subsystems/nqn-1', volumeId: 'volumes/v1', hostNsid: 5 },
        status: { pciState: 2, pciOperState: 1 },
      });
      expect(engine.callsTo('attach')).toHaveLength(1);
      expect(engine.callsTo('attach')[0].params).toEqual({
        bdev_type: 'spdk',
        bdev: 'v1',
        nsid: 5,
        subnqn: NQN,
        cntlid: 0,
      });
      expect(registry.size).toBe(1);
    });

    it('passes identity fields through, eui64 as a decimal string', async () => {
      await controller.create(
        createRequest({ uuid: '1b4e28ba-2fa1-11d2-883f-0016d3cca427', nguid: 'abcd', eui64: '1234' })
      );

      expect(engine.callsTo('attach')[0].params).toMatchObject({
        uuid: '1b4e28ba-2fa1-11d2-883f-0016d3cca427',
        nguid: 'abcd',
        eui64: '1234',
      });
    });

    it('returns the stored namespace on a repeated call without touching the engine', async () => {
      const first = await controller.create(createRequest());
      const second = await controller.create(createRequest());

      expect(second).toEqual(first);
      expect(engine.calls).toHaveLength(1);
    });

    it('issues a single attach for concurrent creates of the same id', async () => {
      const [a, b] = await Promise.all([controller.create(createRequest()), controller.create(createRequest())]);

      expect(a).toEqual(b);
      expect(engine.callsTo('attach')).toHaveLength(1);
    });

    it('generates an id when none is supplied', async () => {
      const created = await controller.create(createRequest({}, ''));

      expect(created.name).toMatch(/^namespaces\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });

    it('ignores a caller supplied name when an id is given', async () => {
      const req = createRequest();
      req.namespace.name = 'namespaces/other';

      const created = await controller.create(req);

      expect(created.name).toBe('namespaces/ns-1');
    });

    it('rejects malformed ids before any engine call', async () => {
      await expect(controller.create(createRequest({}, 'Bad_ID'))).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
      });
      await expect(
        controller.create(createRequest({}, 'abcdef12-3456-4789-8abc-def012345678'))
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
      expect(engine.calls).toHaveLength(0);
    });

    it('rejects an empty subsystem reference', async () => {
      await expect(controller.create(createRequest({ subsystemId: '' }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'invalid input subsystem parameters',
      });
    });

    it('fails NOT_FOUND for an unknown subsystem and stores nothing', async () => {
      await expect(controller.create(createRequest({ subsystemId: 'subsystems/missing' }))).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
        message: 'unable to find key subsystems/missing',
      });
      expect(engine.calls).toHaveLength(0);
      expect(registry.size).toBe(0);
    });

    it('reports an engine refusal as INVALID_ARGUMENT and stores nothing', async () => {
      engine.attachOverride = { kind: 'rejected', message: 'bdev not found' };

      await expect(controller.create(createRequest())).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Could not create NS: namespaces/ns-1',
      });
      expect(registry.size).toBe(0);
    });

    it('maps transport failures to DEADLINE_EXCEEDED or UNAVAILABLE', async () => {
      engine.attachOverride = { kind: 'transport', message: 'timeout of 250ms exceeded', timedOut: true };
      await expect(controller.create(createRequest())).rejects.toMatchObject({
        code: ErrorCode.DEADLINE_EXCEEDED,
      });

      engine.attachOverride = { kind: 'transport', message: 'connect ECONNREFUSED', timedOut: false };
      await expect(controller.create(createRequest())).rejects.toMatchObject({
        code: ErrorCode.UNAVAILABLE,
      });
      expect(registry.size).toBe(0);
    });

    it('hands out copies the caller cannot use to alter the registry', async () => {
      const created = await controller.create(createRequest());
      created.spec.hostNsid = 99;

      const again = await controller.create(createRequest());

      expect(again.spec.hostNsid).toBe(5);
    });

    it('bounds engine calls by the request deadline, else the configured timeout', async () => {
      const timed = new NamespaceController({ engine, subsystems, engineTimeoutMs: 5000 });

      await timed.create(createRequest({}, 'ns-a'));
      await timed.create(createRequest({ hostNsid: 6 }, 'ns-b'), { deadlineMs: 250 });

      expect(engine.callsTo('attach').map((call) => call.opts)).toEqual([{ timeoutMs: 5000 }, { timeoutMs: 250 }]);
    });

    it('uses the configured controller slot and bdev type', async () => {
      const custom = new NamespaceController({ engine, subsystems, controllerId: 3, bdevType: 'nvme' });

      await custom.create(createRequest());

      expect(engine.callsTo('attach')[0].params).toMatchObject({ cntlid: 3, bdev_type: 'nvme' });
    });
  });

  // ==========================================================================
  // delete
  // ==========================================================================

  describe('delete', () => {
    it('succeeds without an engine call for a missing name when allowMissing is set', async () => {
      await expect(controller.delete({ name: 'namespaces/unknown', allowMissing: true })).resolves.toBeUndefined();
      expect(engine.calls).toHaveLength(0);
    });

    it('fails NOT_FOUND for a missing name otherwise', async () => {
      await expect(controller.delete({ name: 'namespaces/unknown' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
      expect(engine.calls).toHaveLength(0);
    });

    it('detaches by NSID and subsystem NQN and forgets the namespace', async () => {
      await controller.create(createRequest());

      await controller.delete({ name: 'namespaces/ns-1' });

      expect(engine.callsTo('detach')[0].params).toEqual({ nsid: 5, subnqn: NQN, cntlid: 0 });
      expect(registry.size).toBe(0);
      await expect(controller.get({ name: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
    });

    it('keeps the namespace when the engine refuses the detach', async () => {
      await controller.create(createRequest());
      engine.detachOverride = { kind: 'rejected', message: 'busy' };

      await expect(controller.delete({ name: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Could not delete NS: namespaces/ns-1',
      });
      expect(registry.size).toBe(1);
    });

    it('reports a vanished subsystem as INTERNAL', async () => {
      await controller.create(createRequest());
      subsystems.unregister('subsystems/nqn-1');

      await expect(controller.delete({ name: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INTERNAL,
        message: 'unable to find subsystem subsystems/nqn-1',
      });
      expect(engine.callsTo('detach')).toHaveLength(0);
    });

    it('rejects malformed names', async () => {
      await expect(controller.delete({ name: 'namespaces//ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
      });
    });

    it('allows the id to be created again after delete', async () => {
      await controller.create(createRequest());
      await controller.delete({ name: 'namespaces/ns-1' });
      await controller.create(createRequest());

      expect(engine.callsTo('attach')).toHaveLength(2);
    });
  });

  // ==========================================================================
  // update
  // ==========================================================================

  describe('update', () => {
    it('fails NOT_FOUND for an unknown namespace', async () => {
      await expect(
        controller.update({ namespace: { name: 'namespaces/unknown' }, updateMask: ['spec.volumeId'] })
      ).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });

    it('rejects an update mask naming unknown fields', async () => {
      await controller.create(createRequest());

      await expect(
        controller.update({ namespace: { name: 'namespaces/ns-1' }, updateMask: ['spec.size'] })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT, message: 'invalid field path: spec.size' });
    });

    it('reports UNIMPLEMENTED for a valid request and leaves the namespace untouched', async () => {
      const created = await controller.create(createRequest());

      await expect(
        controller.update({
          namespace: { name: 'namespaces/ns-1', spec: { volumeId: 'volumes/v2' } },
          updateMask: ['spec.volumeId'],
        })
      ).rejects.toMatchObject({ code: ErrorCode.UNIMPLEMENTED, message: 'UpdateNamespace method is not implemented' });
      expect(engine.calls).toHaveLength(1);
      expect(await registry.get('namespaces/ns-1')).toEqual(created);
    });
  });

  // ==========================================================================
  // list
  // ==========================================================================

  describe('list', () => {
    beforeEach(() => {
      engine.listOverride = {
        kind: 'ok',
        value: { namespaces: [9, 2, 7, 4, 1].map((nsid) => ({ nsid })) },
      };
    });

    it('orders entries by NSID and walks the pages with continuation tokens', async () => {
      const first = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 2 });
      expect(first.namespaces.map((ns) => ns.spec.hostNsid)).toEqual([1, 2]);
      expect(first.nextPageToken).not.toBe('');

      const second = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 2, pageToken: first.nextPageToken });
      expect(second.namespaces.map((ns) => ns.spec.hostNsid)).toEqual([4, 7]);
      expect(second.nextPageToken).not.toBe('');

      const third = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 2, pageToken: second.nextPageToken });
      expect(third.namespaces.map((ns) => ns.spec.hostNsid)).toEqual([9]);
      expect(third.nextPageToken).toBe('');
    });

    it('builds entries from engine NSIDs only', async () => {
      const result = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 1 });

      expect(result.namespaces).toEqual([{ spec: { hostNsid: 1 } }]);
      expect(engine.callsTo('list')[0].params).toEqual({ subnqn: NQN, cntlid: 0 });
    });

    it('uses the default page size for zero and caps large sizes', async () => {
      const byDefault = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 0 });
      expect(byDefault.namespaces).toHaveLength(3);

      const capped = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 100 });
      expect(capped.namespaces).toHaveLength(4);
      expect(capped.nextPageToken).not.toBe('');
    });

    it('returns no token when everything fits', async () => {
      engine.listOverride = { kind: 'ok', value: { namespaces: [{ nsid: 3 }] } };
      const small = await controller.list({ parent: 'subsystems/nqn-1' });
      expect(small).toEqual({ namespaces: [{ spec: { hostNsid: 3 } }], nextPageToken: '' });
    });

    it('rejects negative page sizes before calling the engine', async () => {
      await expect(controller.list({ parent: 'subsystems/nqn-1', pageSize: -1 })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
      });
      expect(engine.calls).toHaveLength(0);
    });

    it('rejects unknown tokens', async () => {
      await expect(
        controller.list({ parent: 'subsystems/nqn-1', pageToken: 'not-a-token' })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT, message: 'unable to find pagination token not-a-token' });
    });

    it('rejects a token minted for another parent', async () => {
      const first = await controller.list({ parent: 'subsystems/nqn-1', pageSize: 2 });

      await expect(
        controller.list({ parent: 'subsystems/nqn-2', pageSize: 2, pageToken: first.nextPageToken })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
    });

    it('fails NOT_FOUND for an unknown parent', async () => {
      await expect(controller.list({ parent: 'subsystems/missing' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
      expect(engine.calls).toHaveLength(0);
    });

    it('reports an engine refusal as INVALID_ARGUMENT', async () => {
      engine.listOverride = { kind: 'rejected', message: 'no such subsystem' };

      await expect(controller.list({ parent: 'subsystems/nqn-1' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Could not list NS: subsystems/nqn-1',
      });
    });
  });

  // ==========================================================================
  // get
  // ==========================================================================

  describe('get', () => {
    it('returns the NSID the engine reports with an attached status', async () => {
      await controller.create(createRequest());

      const found = await controller.get({ name: 'namespaces/ns-1' });

      expect(found).toEqual({
        name: 'namespaces/ns-1',
        spec: { hostNsid: 5 },
        status: { pciState: 2, pciOperState: 1 },
      });
    });

    it('fails NOT_FOUND for an unregistered name', async () => {
      await expect(controller.get({ name: 'namespaces/unknown' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
      expect(engine.calls).toHaveLength(0);
    });

    it('fails INVALID_ARGUMENT when the engine does not report the NSID', async () => {
      await controller.create(createRequest());
      engine.listOverride = { kind: 'ok', value: { namespaces: [{ nsid: 6 }] } };

      await expect(controller.get({ name: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Could not find HostNsid: 5',
      });
    });

    it('reports a vanished subsystem as INTERNAL', async () => {
      await controller.create(createRequest());
      subsystems.unregister('subsystems/nqn-1');

      await expect(controller.get({ name: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INTERNAL,
      });
    });
  });

  // ==========================================================================
  // stats
  // ==========================================================================

  describe('stats', () => {
    it('returns the counters of the bdev backing the volume', async () => {
      await controller.create(createRequest());
      engine.iostat = {
        controllers: [
          { name: 'ctrl0', bdevs: [{ bdev_name: 'v9', read_ios: 1, write_ios: 1 }] },
          { name: 'ctrl1', bdevs: [{ bdev_name: 'v1', read_ios: 10, write_ios: 3 }] },
        ],
      };

      const stats = await controller.stats({ namespaceId: 'namespaces/ns-1' });

      expect(stats).toEqual({ id: 'namespaces/ns-1', stats: { readOpsCount: 10, writeOpsCount: 3 } });
    });

    it('fails INVALID_ARGUMENT when no bdev matches', async () => {
      await controller.create(createRequest());
      engine.iostat = { controllers: [{ bdevs: [{ bdev_name: 'v2', read_ios: 1, write_ios: 2 }] }] };

      await expect(controller.stats({ namespaceId: 'namespaces/ns-1' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Could not find BdevName: v1',
      });
    });

    it('fails NOT_FOUND for an unregistered namespace without an engine call', async () => {
      await expect(controller.stats({ namespaceId: 'namespaces/unknown' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
      expect(engine.calls).toHaveLength(0);
    });
  });
});
