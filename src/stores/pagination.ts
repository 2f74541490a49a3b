import { randomUUID } from 'crypto';
import { ControllerError } from '../lib/errors';

export type PaginationCursor = {
  offset: number;
  parent: string;
  expiresAt: number;
};

export type PaginationOptions = {
  defaultPageSize?: number;
  maxPageSize?: number;
  /** Lifetime of a minted token. */
  ttlMs?: number;
  /** Oldest tokens are evicted past this count. */
  maxCursors?: number;
  clock?: () => number;
};

export type PageWindow = {
  size: number;
  offset: number;
};

/**
 * Server-side continuation tokens for list calls. Tokens are opaque
 * UUIDs bound to the parent they were minted for.
 *
 * All methods are synchronous, so concurrent handlers cannot interleave
 * inside them.
 */
export class PaginationCursorStore {
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
  private readonly ttlMs: number;
  private readonly maxCursors: number;
  private readonly clock: () => number;
  // Map iteration order is insertion order, which makes eviction FIFO.
  private readonly cursors = new Map<string, PaginationCursor>();

  constructor(options: PaginationOptions = {}) {
    this.defaultPageSize = options.defaultPageSize ?? 50;
    this.maxPageSize = options.maxPageSize ?? 250;
    this.ttlMs = options.ttlMs ?? 10 * 60_000;
    this.maxCursors = options.maxCursors ?? 1000;
    this.clock = options.clock ?? Date.now;

    // Every bound must be a positive integer.
    for (const [key, value] of Object.entries({
      defaultPageSize: this.defaultPageSize,
      maxPageSize: this.maxPageSize,
      ttlMs: this.ttlMs,
      maxCursors: this.maxCursors,
    })) {
      if (!Number.isInteger(value) || value < 1) {
        throw new Error(`pagination ${key} must be a positive integer, got ${value}`);
      }
    }
    if (this.defaultPageSize > this.maxPageSize) {
      throw new Error(`pagination defaultPageSize ${this.defaultPageSize} exceeds maxPageSize ${this.maxPageSize}`);
    }
  }

  /**
   * Resolve the requested page size and the offset a token points at.
   */
  extract(parent: string, pageSize = 0, pageToken = ''): PageWindow {
    let size: number;
    if (!Number.isInteger(pageSize)) {
      throw ControllerError.invalidArgument('PageSize must be an integer', { field: 'pageSize' });
    } else if (pageSize < 0) {
      throw ControllerError.invalidArgument('negative PageSize is not allowed', { field: 'pageSize' });
    } else if (pageSize === 0) {
      size = this.defaultPageSize;
    } else {
      size = Math.min(pageSize, this.maxPageSize);
    }

    if (!pageToken) return { size, offset: 0 };

    const cursor = this.cursors.get(pageToken);
    if (!cursor || cursor.expiresAt <= this.clock()) {
      this.cursors.delete(pageToken);
      throw ControllerError.invalidArgument(`unable to find pagination token ${pageToken}`, {
        field: 'pageToken',
      });
    }
    if (cursor.parent !== parent) {
      throw ControllerError.invalidArgument(`pagination token ${pageToken} was issued for a different parent`, {
        field: 'pageToken',
      });
    }
    return { size, offset: cursor.offset };
  }

  mint(parent: string, offset: number): string {
    this.prune();
    const token = randomUUID();
    this.cursors.set(token, { parent, offset, expiresAt: this.clock() + this.ttlMs });
    return token;
  }

  get size(): number {
    return this.cursors.size;
  }

  private prune(): void {
    const now = this.clock();
    for (const [token, cursor] of this.cursors) {
      if (cursor.expiresAt <= now) this.cursors.delete(token);
    }
    while (this.cursors.size >= this.maxCursors) {
      const oldest = this.cursors.keys().next();
      if (oldest.done) break;
      this.cursors.delete(oldest.value);
    }
  }
}

/**
 * Cut `items` down to the window; reports whether anything lies past it.
 */
export function limitPagination<T>(items: readonly T[], offset: number, size: number): [T[], boolean] {
  const end = offset + size;
  return [items.slice(offset, end), end < items.length];
}
