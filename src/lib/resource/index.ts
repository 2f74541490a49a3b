import { randomUUID } from 'crypto';
import { ControllerError } from '../errors';

export const NAMESPACE_COLLECTION = 'namespaces';

// RFC-1034 label restricted to lower case
const USER_SETTABLE_ID = /^[a-z]([a-z0-9-]{0,61}[a-z0-9])?$/;
const UUID_SHAPED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DNS_LABEL = /^[A-Za-z0-9_]([A-Za-z0-9_-]{0,61}[A-Za-z0-9_])?$/;

/**
 * Check a caller-chosen resource id. Ids that look like UUIDs are refused
 * so they can never collide with system generated ones.
 */
export function validateUserSettableId(id: string): void {
  if (!USER_SETTABLE_ID.test(id)) {
    throw ControllerError.invalidArgument(
      `user-settable ID must only contain lowercase letters, numbers and hyphens, start with a letter, end with a letter or number and be at most 63 characters: '${id}'`,
      { field: 'namespaceId' }
    );
  }
  if (UUID_SHAPED.test(id)) {
    throw ControllerError.invalidArgument(`user-settable ID must not be a UUID: '${id}'`, {
      field: 'namespaceId',
    });
  }
}

export function newSystemGeneratedId(): string {
  return randomUUID();
}

export function namespaceNameFromId(id: string): string {
  return `${NAMESPACE_COLLECTION}/${id}`;
}

// Segments must be DNS names. A segment of digits alone is not one.
function isDomainName(segment: string): boolean {
  if (segment.length > 254) return false;
  if (!segment.split('.').every((label) => DNS_LABEL.test(label))) return false;
  return /[^0-9.]/.test(segment);
}

/**
 * Validate a hierarchical resource name such as `namespaces/ns-1` or
 * `//storage.example.com/namespaces/ns-1`.
 */
export function validateResourceName(name: string, field = 'name'): void {
  if (!name) {
    throw ControllerError.invalidArgument('resource name must not be empty', { field });
  }
  const path = name.startsWith('//') ? name.slice(2) : name;
  const segments = path.split('/');
  for (const segment of segments) {
    if (segment === '') {
      throw ControllerError.invalidArgument(`resource name '${name}' contains an empty segment`, { field });
    }
    if (segment === '-' || segment === '*') {
      throw ControllerError.invalidArgument(`resource name '${name}' must not contain wildcards`, { field });
    }
    if (!isDomainName(segment)) {
      throw ControllerError.invalidArgument(`resource name '${name}' contains invalid characters`, { field });
    }
  }
}

/** Last segment of a resource name; `volumes/v1` -> `v1`. */
export function resourceIdOf(name: string): string {
  const trimmed = name.replace(/\/+$/, '');
  const idx = trimmed.lastIndexOf('/');
  return idx === -1 ? trimmed : trimmed.slice(idx + 1);
}

/** Field paths an update mask may name on a Namespace. */
export const NAMESPACE_FIELD_PATHS: ReadonlySet<string> = new Set([
  'name',
  'spec',
  'spec.subsystemId',
  'spec.volumeId',
  'spec.hostNsid',
  'spec.uuid',
  'spec.nguid',
  'spec.eui64',
  'status',
  'status.pciState',
  'status.pciOperState',
]);

/**
 * Validate an update mask against the known field paths. A lone `*` means
 * full replacement; an absent or empty mask means "all fields present".
 */
export function validateFieldMask(paths: readonly string[] | undefined, known = NAMESPACE_FIELD_PATHS): void {
  if (!paths || paths.length === 0) return;
  if (paths.includes('*')) {
    if (paths.length > 1) {
      throw ControllerError.invalidArgument("update mask wildcard '*' must be the only path", {
        field: 'updateMask',
      });
    }
    return;
  }
  for (const path of paths) {
    if (!known.has(path)) {
      throw ControllerError.invalidArgument(`invalid field path: ${path}`, { field: 'updateMask' });
    }
  }
}
