/**
 * In-memory StorageClient for engine tests.
 *
 * Behaves like a tiny Drive: every node has an id, a name and one parent;
 * names are not unique among siblings; trashed nodes are hidden from listings.
 */

import type { ItemKind, StorageClient, StorageItem } from '../../src/domains/replication/types.js';

interface MemoryNode {
  id: string;
  name: string;
  kind: ItemKind;
  parentId?: string;
  trashed: boolean;
  content?: Uint8Array;
}

type Operation = keyof StorageClient;

export const ROOT_ID = 'root';

export class MemoryStorage implements StorageClient {
  private readonly nodes = new Map<string, MemoryNode>();
  private nextId = 1;
  private readonly failures = new Map<Operation, Error>();

  /** Every storage call, as "<operation>:<name or id>". */
  readonly calls: string[] = [];

  constructor() {
    this.nodes.set(ROOT_ID, { id: ROOT_ID, name: 'My Drive', kind: 'container', trashed: false });
  }

  // --- Fixture helpers ------------------------------------------------------

  addFolder(name: string, parentId: string = ROOT_ID): string {
    return this.insert({ name, kind: 'container', parentId });
  }

  addFile(name: string, parentId: string, content = ''): string {
    return this.insert({ name, kind: 'leaf', parentId, content: Buffer.from(content, 'utf-8') });
  }

  rename(id: string, name: string): void {
    this.node(id).name = name;
  }

  trash(id: string): void {
    this.node(id).trashed = true;
  }

  readText(id: string): string {
    return Buffer.from(this.node(id).content ?? new Uint8Array()).toString('utf-8');
  }

  /** Make the next call to `operation` throw `error`. */
  failNext(operation: Operation, error: Error): void {
    this.failures.set(operation, error);
  }

  countCalls(operation: Operation): number {
    return this.calls.filter(call => call.startsWith(`${operation}:`)).length;
  }

  /**
   * Sorted paths below `id`, folders ending in "/".
   */
  paths(id: string, prefix = ''): string[] {
    const result: string[] = [];
    for (const child of this.visibleChildren(id)) {
      if (child.kind === 'container') {
        const path = `${prefix}${child.name}/`;
        result.push(path, ...this.paths(child.id, path));
      } else {
        result.push(`${prefix}${child.name}`);
      }
    }
    return result.sort();
  }

  // --- StorageClient --------------------------------------------------------

  async createContainer(name: string, parentId: string = ROOT_ID): Promise<string> {
    this.record('createContainer', name);
    this.node(parentId);
    return this.insert({ name, kind: 'container', parentId });
  }

  async listChildren(containerId: string, kind?: ItemKind): Promise<StorageItem[]> {
    this.record('listChildren', containerId);
    return this.visibleChildren(containerId)
      .filter(child => !kind || child.kind === kind)
      .map(({ id, name, kind: childKind }) => ({ id, name, kind: childKind }));
  }

  async copyLeaf(leafId: string, newName: string, destParentId: string): Promise<void> {
    this.record('copyLeaf', newName);
    const source = this.node(leafId);
    this.node(destParentId);
    this.insert({ name: newName, kind: 'leaf', parentId: destParentId, content: source.content });
  }

  async readLeafBytes(leafId: string): Promise<Uint8Array> {
    this.record('readLeafBytes', leafId);
    return this.node(leafId).content ?? new Uint8Array();
  }

  async writeLeafBytes(
    name: string,
    bytes: Uint8Array,
    parentId: string,
    existingLeafId?: string
  ): Promise<string> {
    this.record('writeLeafBytes', name);
    if (existingLeafId) {
      this.node(existingLeafId).content = bytes;
      return existingLeafId;
    }
    this.node(parentId);
    return this.insert({ name, kind: 'leaf', parentId, content: bytes });
  }

  // --- Internals ------------------------------------------------------------

  private record(operation: Operation, detail: string): void {
    this.calls.push(`${operation}:${detail}`);
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      throw failure;
    }
  }

  private insert(fields: Omit<MemoryNode, 'id' | 'trashed'>): string {
    const id = `node-${this.nextId++}`;
    this.nodes.set(id, { ...fields, id, trashed: false });
    return id;
  }

  private node(id: string): MemoryNode {
    const node = this.nodes.get(id);
    if (!node || node.trashed) {
      throw new Error(`File not found: ${id}`);
    }
    return node;
  }

  private visibleChildren(parentId: string): MemoryNode[] {
    this.node(parentId);
    return [...this.nodes.values()].filter(node => node.parentId === parentId && !node.trashed);
  }
}
