/**
 * @fileoverview Replication domain type definitions.
 *
 * The engine only talks to storage through {@link StorageClient}; the Google
 * Drive adapter and the in-memory test double both implement it.
 */

/** Whether a node can hold children. */
export type ItemKind = 'container' | 'leaf';

/** A node in the source or destination hierarchy. */
export interface StorageItem {
  id: string;
  name: string;
  kind: ItemKind;
}

/**
 * Storage operations consumed by the engine.
 *
 * listChildren must drain every page and leave out trashed items.
 */
export interface StorageClient {
  createContainer(name: string, parentId?: string): Promise<string>;
  listChildren(containerId: string, kind?: ItemKind): Promise<StorageItem[]>;
  copyLeaf(leafId: string, newName: string, destParentId: string): Promise<void>;
  readLeafBytes(leafId: string): Promise<Uint8Array>;
  /** Creates a leaf, or rewrites the content of `existingLeafId` in place. */
  writeLeafBytes(
    name: string,
    bytes: Uint8Array,
    parentId: string,
    existingLeafId?: string
  ): Promise<string>;
}

/** Binds a destination container to the source it was created from. */
export interface IdentityTag {
  source_id: string;
  identifier: string;
}

/** Seeds one Tree Replicator invocation. */
export interface ReplicationTask {
  sourceContainerId: string;
  destinationParentId: string;
  logicalName: string;
}

/** A named group of source folders copied into one destination folder. */
export interface Batch {
  name: string;
  items: string[];
}

/** Everything one run needs; passed explicitly to the planner. */
export interface ReplicationPlan {
  rootFolderId: string;
  sourceFolderName: string;
  destinationFolderName: string;
  batches: Batch[];
}

export type ReconcileOutcome = 'created' | 'reused';

export interface ReconcileResult {
  containerId: string;
  outcome: ReconcileOutcome;
}

/** Per-tree counters collected while replicating. */
export interface ReplicationStats {
  filesCopied: number;
  foldersCreated: number;
  itemsSkipped: number;
  reservedSkipped: number;
}

export interface ReplicationResult extends ReconcileResult {
  stats: ReplicationStats;
}

export interface TreeReport extends ReplicationResult {
  sourceName: string;
  logicalName: string;
  sourceId: string;
}

export interface BatchReport {
  name: string;
  containerId: string;
  containerCreated: boolean;
  missing: string[];
  trees: TreeReport[];
}

export interface RunReport {
  sourceFolderId: string;
  destinationFolderId: string;
  destinationCreated: boolean;
  batches: BatchReport[];
}
