/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - SourceFolderNotFoundError / PlanValidationError: fatal run preconditions
 * - describeError: renders any thrown value for logs and the CLI
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * The configured source folder does not exist under the root folder.
 * Aborts the run before any batch is processed.
 */
export class SourceFolderNotFoundError extends AppError {
  constructor(
    public readonly folderName: string,
    public readonly rootId: string
  ) {
    super(
      `Source folder "${folderName}" was not found under ${rootId}`,
      'SOURCE_FOLDER_NOT_FOUND',
      false,
      { folderName, rootId }
    );
    this.name = 'SourceFolderNotFoundError';
  }
}

/**
 * The replication plan file is missing or malformed.
 */
export class PlanValidationError extends AppError {
  constructor(
    public readonly planPath: string,
    public readonly problems: string[]
  ) {
    super(
      `Replication plan ${planPath} is invalid:\n  - ${problems.join('\n  - ')}`,
      'PLAN_INVALID',
      false,
      { planPath, problems }
    );
    this.name = 'PlanValidationError';
  }
}

/**
 * Render an unknown thrown value as a single message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
