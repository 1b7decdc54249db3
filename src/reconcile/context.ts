import type { ActionReport } from '../ActionReport.js';
import type { Gateway } from '../gateway/types.js';

export interface ReconcileContext {
  gateway: Gateway;
  report: ActionReport;
  /** Decide and report, but never write */
  dryRun: boolean;
  signal?: AbortSignal;
}

/**
 * Picks the wording for a decision: what will happen in a dry run, what
 * happened otherwise.
 */
export const tense = (ctx: ReconcileContext, planned: string, applied: string) =>
  ctx.dryRun ? planned : applied;
