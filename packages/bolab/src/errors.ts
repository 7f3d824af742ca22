/**
 * Error classes for the campaign core.
 *
 * Only ValidationError, IncompatibleSchemaError, StorageError, BatchNotFound,
 * CampaignNotFound, CampaignLockedError and OperationCancelled reach callers.
 * OptimizerUnavailable and StaleStateError are absorbed by the orchestrator
 * and adapter (fallback or rebuild) and only show up in the event log.
 */

export class BolabError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class ValidationError extends BolabError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'VALIDATION_ERROR', context);
    this.issues = issues;
  }
}

export class IncompatibleSchemaError extends BolabError {
  constructor(found: number, supported: number, context?: Record<string, unknown>) {
    super(
      `Campaign schema version ${found} is not supported (current: ${supported}) and no migration exists`,
      'INCOMPATIBLE_SCHEMA',
      { found, supported, ...context },
    );
  }
}

export class OptimizerUnavailable extends BolabError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'OPTIMIZER_UNAVAILABLE', context, options);
  }
}

export class StaleStateError extends BolabError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STALE_STATE', context);
  }
}

export class StorageError extends BolabError {
  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', { path }, options);
  }
}

export class BatchNotFound extends BolabError {
  constructor(batchId: string) {
    super(`Batch not found: ${batchId}`, 'BATCH_NOT_FOUND', { batchId });
  }
}

export class CampaignNotFound extends BolabError {
  constructor(campaignId: string) {
    super(`Campaign not found: ${campaignId}`, 'CAMPAIGN_NOT_FOUND', { campaignId });
  }
}

export class CampaignLockedError extends BolabError {
  constructor(campaignId: string, ownerPid: number) {
    super(
      `Campaign ${campaignId} is open in another process (pid ${ownerPid})`,
      'CAMPAIGN_LOCKED',
      { campaignId, ownerPid },
    );
  }
}

export class OperationCancelled extends BolabError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 'CANCELLED', { operation });
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
