/**
 * @fileoverview Google Drive storage adapter.
 *
 * Implements the replication engine's StorageClient on top of the Drive v3
 * API. Every call goes through withRetry, so transient 429/5xx responses are
 * retried here and nowhere else.
 */

import { Readable } from 'stream';
import { drive as driveApi, type drive_v3 } from '@googleapis/drive';
import config from '../../../config.js';
import { getAuthenticatedClient, withRetry } from '../../google-core/providers/auth.js';
import type { ItemKind, StorageClient, StorageItem } from '../../replication/types.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/** Content type for written leaves; the engine only writes tag files. */
const JSON_MIME_TYPE = 'application/json';

const PAGE_SIZE = 1000;

type SharedDriveListParams = Pick<
  drive_v3.Params$Resource$Files$List,
  'driveId' | 'supportsAllDrives' | 'includeItemsFromAllDrives' | 'corpora'
>;

export interface GoogleDriveStorageOptions {
  sharedDriveId?: string;
}

/**
 * Convert a files.get media payload into bytes.
 */
export function toBytes(data: unknown): Uint8Array {
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (data instanceof Uint8Array) return data;
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  throw new Error('Drive API returned an unexpected media payload');
}

export class GoogleDriveStorage implements StorageClient {
  private readonly sharedDriveId?: string;

  constructor(
    private readonly account: string,
    options: GoogleDriveStorageOptions = { sharedDriveId: config.google.sharedDriveId }
  ) {
    this.sharedDriveId = options.sharedDriveId;
  }

  private async getDriveClient(): Promise<drive_v3.Drive> {
    const oauth2Client = await getAuthenticatedClient(this.account);
    return driveApi({ version: 'v3', auth: oauth2Client });
  }

  /**
   * Build common Drive API list parameters for Shared Drive support.
   */
  private getSharedDriveParams(): SharedDriveListParams {
    if (this.sharedDriveId) {
      return {
        driveId: this.sharedDriveId,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
        corpora: 'drive',
      };
    }
    return { supportsAllDrives: true, includeItemsFromAllDrives: true };
  }

  async createContainer(name: string, parentId?: string): Promise<string> {
    const drive = await this.getDriveClient();
    const parent = parentId ?? this.sharedDriveId;

    const response = await withRetry(() =>
      drive.files.create({
        requestBody: {
          name,
          mimeType: FOLDER_MIME_TYPE,
          parents: parent ? [parent] : undefined,
        },
        fields: 'id',
        supportsAllDrives: true,
      }), this.account, 'create_folder'
    );

    // Boundary: require id from API response
    if (!response.data.id) {
      throw new Error(`Drive API returned folder "${name}" without an id`);
    }
    return response.data.id;
  }

  async listChildren(containerId: string, kind?: ItemKind): Promise<StorageItem[]> {
    const drive = await this.getDriveClient();

    let query = `'${containerId}' in parents and trashed = false`;
    if (kind === 'container') {
      query += ` and mimeType = '${FOLDER_MIME_TYPE}'`;
    } else if (kind === 'leaf') {
      query += ` and mimeType != '${FOLDER_MIME_TYPE}'`;
    }

    const items: StorageItem[] = [];
    let pageToken: string | undefined;
    do {
      const response = await withRetry(() =>
        drive.files.list({
          q: query,
          fields: 'nextPageToken, files(id, name, mimeType)',
          pageSize: PAGE_SIZE,
          pageToken,
          ...this.getSharedDriveParams(),
        }), this.account, 'list_children'
      );

      for (const file of response.data.files || []) {
        if (!file.id || typeof file.name !== 'string') continue;
        items.push({
          id: file.id,
          name: file.name,
          kind: file.mimeType === FOLDER_MIME_TYPE ? 'container' : 'leaf',
        });
      }
      pageToken = response.data.nextPageToken || undefined;
    } while (pageToken);

    return items;
  }

  async copyLeaf(leafId: string, newName: string, destParentId: string): Promise<void> {
    const drive = await this.getDriveClient();
    await withRetry(() =>
      drive.files.copy({
        fileId: leafId,
        requestBody: { name: newName, parents: [destParentId] },
        fields: 'id',
        supportsAllDrives: true,
      }), this.account, 'copy_file'
    );
  }

  async readLeafBytes(leafId: string): Promise<Uint8Array> {
    const drive = await this.getDriveClient();
    const response = await withRetry(() =>
      drive.files.get(
        {
          fileId: leafId,
          alt: 'media',
          supportsAllDrives: true,
        },
        { responseType: 'arraybuffer' }
      ), this.account, 'read_file'
    );
    return toBytes(response.data);
  }

  async writeLeafBytes(
    name: string,
    bytes: Uint8Array,
    parentId: string,
    existingLeafId?: string
  ): Promise<string> {
    const drive = await this.getDriveClient();
    // One stream per attempt.
    const media = () => ({
      mimeType: JSON_MIME_TYPE,
      body: Readable.from(Buffer.from(bytes)),
    });

    if (existingLeafId) {
      const response = await withRetry(() =>
        drive.files.update({
          fileId: existingLeafId,
          media: media(),
          fields: 'id',
          supportsAllDrives: true,
        }), this.account, 'update_file'
      );
      return response.data.id || existingLeafId;
    }

    const response = await withRetry(() =>
      drive.files.create({
        requestBody: { name, parents: [parentId], mimeType: JSON_MIME_TYPE },
        media: media(),
        fields: 'id',
        supportsAllDrives: true,
      }), this.account, 'upload_file'
    );

    if (!response.data.id) {
      throw new Error(`Drive API returned file "${name}" without an id`);
    }
    return response.data.id;
  }
}
