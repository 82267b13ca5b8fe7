/**
 * @fileoverview Create-or-reuse decision for a top-level destination folder.
 */

import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type { ReconcileResult, StorageClient, StorageItem } from '../types.js';
import { IdentityTagStore, SYSTEM_FOLDER_NAME, tagsEqual } from './identity-tags.js';

const defaultLog = createLogger({ domain: 'reconciler' });

/**
 * Finds the destination folder previously created for a source folder, by
 * identity tag rather than by name, or creates and tags a new one.
 */
export class Reconciler {
  constructor(
    private readonly storage: StorageClient,
    private readonly tags: IdentityTagStore = new IdentityTagStore(storage),
    private readonly log: AppLogger = defaultLog
  ) {}

  async reconcile(
    sourceContainerId: string,
    destinationParentId: string,
    logicalName: string
  ): Promise<ReconcileResult> {
    const wanted = { source_id: sourceContainerId, identifier: logicalName };
    const candidates = await this.storage.listChildren(destinationParentId, 'container');

    for (const candidate of orderCandidates(candidates, logicalName)) {
      const tag = await this.tags.read(candidate.id);
      if (tag && tagsEqual(tag, wanted)) {
        this.log.info('folder_reused', {
          containerId: candidate.id,
          name: candidate.name,
          identifier: logicalName,
          renamed: candidate.name !== logicalName,
        });
        return { containerId: candidate.id, outcome: 'reused' };
      }
    }

    const containerId = await this.storage.createContainer(logicalName, destinationParentId);
    await this.tags.attach(containerId, wanted);

    this.log.info('folder_created', { containerId, identifier: logicalName, sourceId: sourceContainerId });
    return { containerId, outcome: 'created' };
  }
}

/**
 * Same-named folders are checked first since they are the likeliest match;
 * the reserved metadata folder is never a candidate.
 */
function orderCandidates(candidates: StorageItem[], logicalName: string): StorageItem[] {
  const eligible = candidates.filter(candidate => candidate.name !== SYSTEM_FOLDER_NAME);
  return [
    ...eligible.filter(candidate => candidate.name === logicalName),
    ...eligible.filter(candidate => candidate.name !== logicalName),
  ];
}
