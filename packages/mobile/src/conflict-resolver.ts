import { KinesyncError, type JsonObject, type SyncOperationType } from '@kinesync/core';

/**
 * One side of a conflict: the local or the server version of an entity
 */
export interface ConflictCandidate {
  id: string;
  operationType: SyncOperationType;
  data: JsonObject;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms; falls back to `createdAt` when absent */
  updatedAt?: number;
}

/**
 * Conflict resolution strategies
 */
export type ConflictStrategy = 'server-wins' | 'last-write-wins' | 'merge';

/**
 * Conflict resolution result
 */
export interface ConflictResolution<T extends ConflictCandidate = ConflictCandidate> {
  /** Resolved candidate */
  item: T;
  /** Which side the result came from */
  winner: 'local' | 'server' | 'merged';
}

/**
 * A delete on either side wins over any other operation; the server's
 * delete wins when both sides deleted. Returns `null` when neither deleted.
 */
function resolveDelete<T extends ConflictCandidate>(local: T, server: T): ConflictResolution<T> | null {
  if (server.operationType === 'delete') {
    return { item: server, winner: 'server' };
  }
  if (local.operationType === 'delete') {
    return { item: local, winner: 'local' };
  }
  return null;
}

function writeTime(candidate: ConflictCandidate): number {
  return candidate.updatedAt ?? candidate.createdAt;
}

/**
 * Always take the server version (subject to delete precedence)
 */
export function serverWins<T extends ConflictCandidate>(local: T, server: T): T {
  return resolveDelete(local, server)?.item ?? server;
}

/**
 * Take the later write; ties go to the server
 */
export function lastWriteWins<T extends ConflictCandidate>(local: T, server: T): T {
  const deleted = resolveDelete(local, server);
  if (deleted) return deleted.item;

  return writeTime(local) > writeTime(server) ? local : server;
}

/**
 * Field-level merge: start from the server's fields and add the keys only
 * the local side has. Shared keys keep the server value.
 */
export function mergeItems<T extends ConflictCandidate>(local: T, server: T): T {
  const deleted = resolveDelete(local, server);
  if (deleted) return deleted.item;

  // fromEntries defines own properties, so keys like __proto__ stay data
  const entries = Object.entries(server.data);
  for (const [key, value] of Object.entries(local.data)) {
    if (!Object.hasOwn(server.data, key)) {
      entries.push([key, value]);
    }
  }

  const data: JsonObject = Object.fromEntries(entries);
  return { ...server, data };
}

/**
 * Conflict resolver bound to one strategy
 *
 * @example
 * ```typescript
 * const resolver = new ConflictResolver('last-write-wins');
 * const { item, winner } = resolver.resolve(localVersion, serverVersion);
 * ```
 */
export class ConflictResolver {
  readonly strategy: ConflictStrategy;

  constructor(strategy: ConflictStrategy = 'server-wins') {
    this.strategy = strategy;
  }

  /**
   * Resolve a conflict between the local and server versions of one entity
   *
   * @throws {KinesyncError} `KINESYNC_C503` when the ids differ
   */
  resolve<T extends ConflictCandidate>(local: T, server: T): ConflictResolution<T> {
    if (local.id !== server.id) {
      throw new KinesyncError({
        code: 'KINESYNC_C503',
        context: { localId: local.id, serverId: server.id },
      });
    }

    const deleted = resolveDelete(local, server);
    if (deleted) return deleted;

    switch (this.strategy) {
      case 'server-wins':
        return { item: server, winner: 'server' };

      case 'last-write-wins': {
        const item = lastWriteWins(local, server);
        return { item, winner: item === local ? 'local' : 'server' };
      }

      case 'merge':
        return { item: mergeItems(local, server), winner: 'merged' };
    }
  }
}
