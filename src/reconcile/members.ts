import { expectOk } from '../errors.js';
import { equalFold } from '../helpers.js';
import type { RemoteUser } from '../gateway/types.js';
import { tense, type ReconcileContext } from './context.js';
import type { OrganizationConfig, PersonConfig } from './types.js';

export interface PendingInvitation {
  kind: 'invite';
  username: string;
}

export interface MembershipDiff {
  /** On GitHub but not in the manifest, reported only */
  unmanaged: RemoteUser[];
  /** In the manifest but not on GitHub */
  missing: PersonConfig[];
}

export function diffMembers(people: PersonConfig[], members: RemoteUser[]): MembershipDiff {
  return {
    unmanaged: members.filter((m) => !people.some((p) => equalFold(p.username, m.login))),
    missing: people.filter((p) => !members.some((m) => equalFold(p.username, m.login))),
  };
}

export const planInvitations = (missing: PersonConfig[]): PendingInvitation[] =>
  missing.map((person): PendingInvitation => ({ kind: 'invite', username: person.username }));

/**
 * Works through the invitations decided during planning, in order. Nothing
 * is sent in a dry run.
 */
export async function drainInvitations(
  ctx: ReconcileContext,
  org: string,
  pending: PendingInvitation[],
) {
  for (const invitation of pending) {
    if (!ctx.dryRun) {
      const user = expectOk(
        await ctx.gateway.getUser(invitation.username, ctx.signal),
        `get user ${invitation.username}`,
      );
      expectOk(
        await ctx.gateway.createInvitation(org, user.id, ctx.signal),
        `invite ${invitation.username} to ${org}`,
      );
    }
    ctx.report.add(`${tense(ctx, 'invite', 'invited')} ${invitation.username}`);
  }
}

export async function reconcileMembers(ctx: ReconcileContext, org: OrganizationConfig) {
  ctx.report.header('Members');

  const members = expectOk(
    await ctx.gateway.listMembers(org.name, ctx.signal),
    `list members ${org.name}`,
  );
  const { unmanaged, missing } = diffMembers(org.people, members);

  for (const member of members) {
    if (unmanaged.includes(member)) {
      ctx.report.warn(`${member.login} exists in github but not in manifest`);
    } else {
      ctx.report.info(`${member.login} exists in github`);
    }
  }

  await drainInvitations(ctx, org.name, planInvitations(missing));
}
