/**
 * @fileoverview Operator-facing run summary.
 */

import type { RunReport } from '../types.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Render a run report as plain text, one line per replicated or missing
 * source, followed by run totals.
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];
  let created = 0;
  let reused = 0;
  let missing = 0;
  let files = 0;
  let folders = 0;

  lines.push(`Destination folder: ${report.destinationFolderId}${report.destinationCreated ? ' (created)' : ''}`);

  for (const batch of report.batches) {
    lines.push(`Batch "${batch.name}" -> ${batch.containerId}${batch.containerCreated ? ' (created)' : ''}`);

    for (const tree of batch.trees) {
      if (tree.outcome === 'created') created++;
      else reused++;
      files += tree.stats.filesCopied;
      folders += tree.stats.foldersCreated;

      const label = tree.outcome === 'created' ? 'created' : 'reused ';
      const renamed = tree.logicalName === tree.sourceName ? '' : ` (from "${tree.sourceName}")`;
      lines.push(
        `  ${label} ${tree.logicalName}${renamed}: ` +
        `${plural(tree.stats.filesCopied, 'file')}, ${plural(tree.stats.foldersCreated, 'folder')} copied`
      );
    }

    for (const name of batch.missing) {
      missing++;
      lines.push(`  missing ${name}`);
    }
  }

  lines.push(
    `Done: ${created} created, ${reused} reused, ${missing} missing; ` +
    `${plural(files, 'file')} and ${plural(folders, 'folder')} copied`
  );
  return lines.join('\n');
}
