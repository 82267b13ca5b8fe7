/**
 * @fileoverview Identity tags for reconciled destination folders.
 *
 * A tag lives at `<folder>/_system/.meta.json` and records which source
 * folder (and which logical name) the destination folder was created from.
 * Matching on the tag instead of the folder name lets a re-run find a
 * destination folder that was renamed after the first run.
 */

import { describeError } from '../../../utils/errors.js';
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type { IdentityTag, StorageClient } from '../types.js';

/** Reserved child folder holding replication metadata. */
export const SYSTEM_FOLDER_NAME = '_system';

/** Tag file inside the reserved folder. */
export const TAG_FILE_NAME = '.meta.json';

const defaultLog = createLogger({ domain: 'identity-tags' });

/**
 * Serialize a tag. Only the two tag fields are written.
 */
export function encodeIdentityTag(tag: IdentityTag): Uint8Array {
  const payload = { source_id: tag.source_id, identifier: tag.identifier };
  return Buffer.from(JSON.stringify(payload), 'utf-8');
}

/**
 * Parse tag bytes. Any decoding or shape problem yields null.
 */
export function decodeIdentityTag(bytes: Uint8Array): IdentityTag | null {
  let parsed: unknown;
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  if (!('source_id' in parsed) || !('identifier' in parsed)) return null;

  const { source_id, identifier } = parsed;
  if (typeof source_id !== 'string' || typeof identifier !== 'string') return null;

  return { source_id, identifier };
}

export function tagsEqual(a: IdentityTag, b: IdentityTag): boolean {
  return a.source_id === b.source_id && a.identifier === b.identifier;
}

/**
 * Reads and writes identity tags through the storage client.
 */
export class IdentityTagStore {
  constructor(
    private readonly storage: StorageClient,
    private readonly log: AppLogger = defaultLog
  ) {}

  /**
   * Read the tag attached to a folder.
   * Returns null when the folder has no tag, or when the tag file cannot be
   * downloaded or decoded.
   */
  async read(containerId: string): Promise<IdentityTag | null> {
    const tagFileId = await this.findTagFile(containerId);
    if (!tagFileId) return null;

    let bytes: Uint8Array;
    try {
      bytes = await this.storage.readLeafBytes(tagFileId);
    } catch (error) {
      this.log.warn('identity_tag_invalid', { containerId, tagFileId, error: describeError(error) });
      return null;
    }

    const tag = decodeIdentityTag(bytes);
    if (!tag) {
      this.log.warn('identity_tag_invalid', { containerId, tagFileId });
    }
    return tag;
  }

  /**
   * Tag a folder that was just created: adds `_system/.meta.json` to it.
   *
   * @returns ID of the tag file
   */
  async attach(containerId: string, tag: IdentityTag): Promise<string> {
    const systemFolderId = await this.storage.createContainer(SYSTEM_FOLDER_NAME, containerId);
    const tagFileId = await this.storage.writeLeafBytes(TAG_FILE_NAME, encodeIdentityTag(tag), systemFolderId);

    this.log.info('identity_tag_written', {
      containerId,
      sourceId: tag.source_id,
      identifier: tag.identifier,
    });
    return tagFileId;
  }

  private async findTagFile(containerId: string): Promise<string | undefined> {
    const folders = await this.storage.listChildren(containerId, 'container');
    const systemFolder = folders.find(folder => folder.name === SYSTEM_FOLDER_NAME);
    if (!systemFolder) return undefined;

    const files = await this.storage.listChildren(systemFolder.id, 'leaf');
    return files.find(file => file.name === TAG_FILE_NAME)?.id;
  }
}
