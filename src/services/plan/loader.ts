/**
 * @fileoverview Replication plan file loader.
 *
 * The plan is a JSON document:
 *
 *   {
 *     "rootFolderId": "root",
 *     "sourceFolderName": "Templates",
 *     "destinationFolderName": "Client Copies",
 *     "batches": [{ "name": "Spring Intake", "items": ["Onboarding Pack"] }]
 *   }
 *
 * Every problem is reported at once.
 */

import fs from 'fs';
import { PlanValidationError } from '../../utils/errors.js';
import type { Batch, ReplicationPlan } from '../../domains/replication/types.js';

/** My Drive root alias understood by the Drive API. */
export const DEFAULT_ROOT_FOLDER_ID = 'root';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readName(
  source: Record<string, unknown>,
  key: string,
  label: string,
  problems: string[]
): string {
  const value = source[key];
  if (typeof value !== 'string' || !value.trim()) {
    problems.push(`${label} must be a non-empty string`);
    return '';
  }
  return value;
}

function parseBatch(value: unknown, index: number, problems: string[]): Batch | null {
  const label = `batches[${index}]`;
  if (!isRecord(value)) {
    problems.push(`${label} must be an object`);
    return null;
  }

  const name = readName(value, 'name', `${label}.name`, problems);

  const items: string[] = [];
  if (!Array.isArray(value.items) || value.items.length === 0) {
    problems.push(`${label}.items must be a non-empty array`);
  } else {
    value.items.forEach((item: unknown, itemIndex: number) => {
      if (typeof item !== 'string' || !item.trim()) {
        problems.push(`${label}.items[${itemIndex}] must be a non-empty string`);
      } else {
        items.push(item);
      }
    });
  }

  return { name, items };
}

/**
 * Validate an already-parsed plan document.
 *
 * @throws PlanValidationError listing every problem found
 */
export function parseReplicationPlan(raw: unknown, planPath: string): ReplicationPlan {
  const problems: string[] = [];

  if (!isRecord(raw)) {
    throw new PlanValidationError(planPath, ['plan must be a JSON object']);
  }

  let rootFolderId = DEFAULT_ROOT_FOLDER_ID;
  if (raw.rootFolderId !== undefined) {
    rootFolderId = readName(raw, 'rootFolderId', 'rootFolderId', problems);
  }

  const sourceFolderName = readName(raw, 'sourceFolderName', 'sourceFolderName', problems);
  const destinationFolderName = readName(raw, 'destinationFolderName', 'destinationFolderName', problems);

  const batches: Batch[] = [];
  if (!Array.isArray(raw.batches) || raw.batches.length === 0) {
    problems.push('batches must be a non-empty array');
  } else {
    raw.batches.forEach((value: unknown, index: number) => {
      const batch = parseBatch(value, index, problems);
      if (batch) batches.push(batch);
    });

    const seen = new Set<string>();
    for (const batch of batches) {
      if (!batch.name) continue;
      if (seen.has(batch.name)) {
        problems.push(`batch name "${batch.name}" is used more than once`);
      }
      seen.add(batch.name);
    }
  }

  if (problems.length > 0) {
    throw new PlanValidationError(planPath, problems);
  }

  return { rootFolderId, sourceFolderName, destinationFolderName, batches };
}

/**
 * Read and validate the plan file at `planPath`.
 *
 * @throws PlanValidationError if the file is missing, unreadable or invalid
 */
export function loadReplicationPlan(planPath: string): ReplicationPlan {
  if (!fs.existsSync(planPath)) {
    throw new PlanValidationError(planPath, ['file not found']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(planPath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PlanValidationError(planPath, [`invalid JSON: ${detail}`]);
  }

  return parseReplicationPlan(raw, planPath);
}
