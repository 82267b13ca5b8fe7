/**
 * CLI command implementations.
 */

import express from 'express';
import config, { validateConfig } from '../config.js';
import { GoogleDriveStorage } from '../domains/drive/providers/google-drive.js';
import { ReplicationPlanner } from '../domains/replication/service/planner.js';
import { formatRunSummary } from '../domains/replication/service/summary.js';
import type { RunReport, StorageClient } from '../domains/replication/types.js';
import { createAuthRouter } from '../routes/auth.js';
import { loadReplicationPlan } from '../services/plan/loader.js';
import { createLogger } from '../utils/observability/index.js';

const log = createLogger({ domain: 'cli' });

export interface RunCommandOptions {
  planPath?: string;
  account?: string;
  /** Storage override, used by tests. */
  storage?: StorageClient;
}

/**
 * Load the plan, replicate every batch and print the summary.
 */
export async function runReplication(options: RunCommandOptions = {}): Promise<RunReport> {
  const planPath = options.planPath ?? config.replication.planPath;
  const plan = loadReplicationPlan(planPath);
  const storage = options.storage ?? new GoogleDriveStorage(options.account ?? config.google.account);

  log.info('run_started', {
    planPath,
    batchCount: plan.batches.length,
    sourceFolder: plan.sourceFolderName,
    destinationFolder: plan.destinationFolderName,
  });

  const report = await new ReplicationPlanner(storage).run(plan);
  console.log(formatRunSummary(report));
  return report;
}

/**
 * Serve the consent flow on localhost until tokens are stored.
 */
export function runAuthorization(account: string = config.google.account): Promise<void> {
  validateConfig();

  return new Promise((resolve, reject) => {
    const app = express();
    const server = app.listen(config.port, () => {
      console.log(`Open http://localhost:${config.port}/auth/google to connect Google Drive for "${account}".`);
    });

    app.use(createAuthRouter({
      account,
      onAuthorized: () => {
        server.close(closeError => (closeError ? reject(closeError) : resolve()));
      },
    }));

    server.on('error', reject);
  });
}
