/**
 * @fileoverview Recursive, forward-only folder tree replication.
 *
 * Only the top-level destination folder is matched by identity tag. Below
 * it, children are matched by literal name: anything already present is
 * skipped without descending into it, anything missing is copied in full.
 * Errors abort the walk; whatever was copied before the failure stays.
 */

import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type {
  ReplicationResult,
  ReplicationStats,
  ReplicationTask,
  StorageClient,
} from '../types.js';
import { Reconciler } from './reconciler.js';
import { SYSTEM_FOLDER_NAME } from './identity-tags.js';

const defaultLog = createLogger({ domain: 'replicator' });

export function emptyStats(): ReplicationStats {
  return { filesCopied: 0, foldersCreated: 0, itemsSkipped: 0, reservedSkipped: 0 };
}

export class TreeReplicator {
  constructor(
    private readonly storage: StorageClient,
    private readonly reconciler: Reconciler = new Reconciler(storage),
    private readonly log: AppLogger = defaultLog
  ) {}

  /**
   * Reconcile the top-level destination folder for a task, then copy every
   * source child that is not yet present in it.
   */
  async replicate(task: ReplicationTask): Promise<ReplicationResult> {
    const { containerId, outcome } = await this.reconciler.reconcile(
      task.sourceContainerId,
      task.destinationParentId,
      task.logicalName
    );

    const stats = emptyStats();
    await this.copyMissingChildren(task.sourceContainerId, containerId, stats, true);

    this.log.info('tree_replicated', {
      containerId,
      identifier: task.logicalName,
      outcome,
      ...stats,
    });
    return { containerId, outcome, stats };
  }

  /**
   * @param tagged - whether `destinationId` carries an identity tag, in which
   *   case its `_system` folder is metadata rather than content
   */
  private async copyMissingChildren(
    sourceId: string,
    destinationId: string,
    stats: ReplicationStats,
    tagged: boolean
  ): Promise<void> {
    const existing = await this.storage.listChildren(destinationId);
    const existingNames = new Set(
      existing
        .filter(item => !(tagged && item.name === SYSTEM_FOLDER_NAME))
        .map(item => item.name)
    );

    const children = await this.storage.listChildren(sourceId);

    for (const child of children) {
      if (tagged && child.name === SYSTEM_FOLDER_NAME) {
        stats.reservedSkipped++;
        this.log.warn('reserved_name_skipped', { sourceId: child.id, name: child.name, destinationId });
        continue;
      }

      if (existingNames.has(child.name)) {
        stats.itemsSkipped++;
        this.log.debug('item_exists', { name: child.name, kind: child.kind, destinationId });
        continue;
      }

      if (child.kind === 'container') {
        const folderId = await this.storage.createContainer(child.name, destinationId);
        stats.foldersCreated++;
        this.log.debug('folder_copied', { sourceId: child.id, folderId, name: child.name });
        await this.copyMissingChildren(child.id, folderId, stats, false);
      } else {
        await this.storage.copyLeaf(child.id, child.name, destinationId);
        stats.filesCopied++;
        this.log.debug('file_copied', { sourceId: child.id, name: child.name, destinationId });
      }
    }
  }
}
