/**
 * @fileoverview Batch planner: resolves the run's root folders and drives one
 * tree replication per requested source folder.
 *
 * Resolution order:
 * 1. Source folder under the root (required; a run without it is fatal)
 * 2. Destination folder under the root (created when absent)
 * 3. Per batch: batch folder under the destination folder, by plain name
 * 4. Per requested name: tree replication with a collision-free logical name
 */

import { SourceFolderNotFoundError } from '../../../utils/errors.js';
import {
  createLogger,
  withBatchContext,
  withRunContext,
  type AppLogger,
} from '../../../utils/observability/index.js';
import type {
  Batch,
  BatchReport,
  ReplicationPlan,
  RunReport,
  StorageClient,
  StorageItem,
} from '../types.js';
import { TreeReplicator } from './replicator.js';

const defaultLog = createLogger({ domain: 'planner' });

/**
 * Give repeated names a 1-based occurrence suffix: the first occurrence keeps
 * the bare name, later ones become "<name> (2)", "<name> (3)", ...
 */
export function assignLogicalNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return names.map(name => {
    const occurrence = (seen.get(name) ?? 0) + 1;
    seen.set(name, occurrence);
    return occurrence === 1 ? name : `${name} (${occurrence})`;
  });
}

export interface ReplicationPlannerOptions {
  replicator?: TreeReplicator;
  log?: AppLogger;
}

export class ReplicationPlanner {
  private readonly replicator: TreeReplicator;
  private readonly log: AppLogger;

  constructor(
    private readonly storage: StorageClient,
    options: ReplicationPlannerOptions = {}
  ) {
    this.replicator = options.replicator ?? new TreeReplicator(storage);
    this.log = options.log ?? defaultLog;
  }

  /**
   * Execute every batch of the plan, in order.
   *
   * @throws SourceFolderNotFoundError before any batch runs if the source
   *   folder is missing
   */
  async run(plan: ReplicationPlan): Promise<RunReport> {
    return withRunContext(async () => {
      const sourceFolder = await this.findContainer(plan.rootFolderId, plan.sourceFolderName);
      if (!sourceFolder) {
        throw new SourceFolderNotFoundError(plan.sourceFolderName, plan.rootFolderId);
      }

      const destination = await this.findOrCreateContainer(plan.rootFolderId, plan.destinationFolderName);

      const sources = await this.storage.listChildren(sourceFolder.id, 'container');
      const sourcesByName = new Map<string, StorageItem>();
      for (const source of sources) {
        if (!sourcesByName.has(source.name)) {
          sourcesByName.set(source.name, source);
        }
      }

      const batches: BatchReport[] = [];
      for (const batch of plan.batches) {
        const report = await withBatchContext(batch.name, () =>
          this.runBatch(batch, destination.containerId, sourcesByName)
        );
        batches.push(report);
      }

      const report: RunReport = {
        sourceFolderId: sourceFolder.id,
        destinationFolderId: destination.containerId,
        destinationCreated: destination.created,
        batches,
      };

      this.log.info('run_completed', {
        batchCount: batches.length,
        missingCount: batches.reduce((sum, b) => sum + b.missing.length, 0),
        treeCount: batches.reduce((sum, b) => sum + b.trees.length, 0),
      });
      return report;
    });
  }

  private async runBatch(
    batch: Batch,
    destinationFolderId: string,
    sourcesByName: Map<string, StorageItem>
  ): Promise<BatchReport> {
    const batchFolder = await this.findOrCreateContainer(destinationFolderId, batch.name);
    this.log.info('batch_started', {
      containerId: batchFolder.containerId,
      created: batchFolder.created,
      itemCount: batch.items.length,
    });

    const logicalNames = assignLogicalNames(batch.items);
    const report: BatchReport = {
      name: batch.name,
      containerId: batchFolder.containerId,
      containerCreated: batchFolder.created,
      missing: [],
      trees: [],
    };

    for (const [index, sourceName] of batch.items.entries()) {
      const source = sourcesByName.get(sourceName);
      if (!source) {
        if (!report.missing.includes(sourceName)) {
          report.missing.push(sourceName);
          this.log.warn('source_not_found', { name: sourceName });
        }
        continue;
      }

      const logicalName = logicalNames[index];
      const result = await this.replicator.replicate({
        sourceContainerId: source.id,
        destinationParentId: batchFolder.containerId,
        logicalName,
      });
      report.trees.push({ ...result, sourceName, logicalName, sourceId: source.id });
    }

    this.log.info('batch_completed', {
      containerId: batchFolder.containerId,
      replicated: report.trees.length,
      missing: report.missing,
    });
    return report;
  }

  private async findContainer(parentId: string, name: string): Promise<StorageItem | undefined> {
    const folders = await this.storage.listChildren(parentId, 'container');
    return folders.find(folder => folder.name === name);
  }

  private async findOrCreateContainer(
    parentId: string,
    name: string
  ): Promise<{ containerId: string; created: boolean }> {
    const existing = await this.findContainer(parentId, name);
    if (existing) {
      return { containerId: existing.id, created: false };
    }
    const containerId = await this.storage.createContainer(name, parentId);
    this.log.info('container_created', { containerId, name, parentId });
    return { containerId, created: true };
  }
}
