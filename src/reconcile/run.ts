import type { ActionReport } from '../ActionReport.js';
import type { Gateway } from '../gateway/types.js';
import type { ReconcileContext } from './context.js';
import { reconcileMembers } from './members.js';
import { reconcileRepositories } from './repos.js';
import { reconcileTeams } from './teams.js';
import type { OrganizationConfig } from './types.js';

export type Entity = 'members' | 'teams' | 'repos';

export const ALL_ENTITIES: readonly Entity[] = ['members', 'teams', 'repos'];

export interface RunOptions {
  dryRun: boolean;
  /** Entities to reconcile, always in members, teams, repos order */
  only?: readonly Entity[];
  signal?: AbortSignal;
}

/**
 * Reconciles one organization. Stops at the first failure; whatever was
 * already applied stays applied.
 */
export async function reconcileOrganization(
  gateway: Gateway,
  report: ActionReport,
  org: OrganizationConfig,
  { dryRun, only = ALL_ENTITIES, signal }: RunOptions,
) {
  const ctx: ReconcileContext = { gateway, report, dryRun, signal };

  report.header('Org');
  if (only.includes('members')) await reconcileMembers(ctx, org);
  if (only.includes('teams')) await reconcileTeams(ctx, org);
  if (only.includes('repos')) await reconcileRepositories(ctx, org);
}
