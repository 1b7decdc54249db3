import { expectOk } from '../errors.js';
import { equalFold, quote } from '../helpers.js';
import type { RemoteTeam, RemoteUser, TeamPatch, TeamSettings } from '../gateway/types.js';
import { tense, type ReconcileContext } from './context.js';
import type { OrganizationConfig, TeamConfig } from './types.js';

export function computeTeamPatch(team: TeamConfig, current: RemoteTeam): TeamPatch {
  const patch: TeamPatch = {};
  if (team.description !== undefined && !equalFold(current.description ?? '', team.description)) {
    patch.description = team.description;
  }
  if (team.privacy !== undefined && current.privacy !== team.privacy) {
    patch.privacy = team.privacy;
  }
  return patch;
}

async function createTeam(
  ctx: ReconcileContext,
  org: string,
  team: TeamConfig,
): Promise<RemoteTeam | null> {
  const settings: TeamSettings = { name: team.name };
  if (team.description !== undefined) settings.description = team.description;
  if (team.privacy !== undefined) settings.privacy = team.privacy;

  let created: RemoteTeam | null = null;
  if (!ctx.dryRun) {
    created = expectOk(
      await ctx.gateway.createTeam(org, settings, ctx.signal),
      `create team ${team.name} in ${org}`,
    );
  }

  ctx.report.warn(`${tense(ctx, 'creating', 'created')} team ${team.name}`);
  const verb = tense(ctx, 'setting', 'set');
  if (settings.description !== undefined) {
    ctx.report.add(`${verb} team ${team.name} description to ${quote(settings.description)}`);
  }
  if (settings.privacy !== undefined) {
    ctx.report.add(`${verb} team ${team.name} privacy to ${quote(settings.privacy)}`);
  }
  return created;
}

async function updateTeam(
  ctx: ReconcileContext,
  org: string,
  team: TeamConfig,
  current: RemoteTeam,
) {
  const patch = computeTeamPatch(team, current);
  if (patch.description === undefined && patch.privacy === undefined) {
    ctx.report.info(`team ${team.name} exists in github`);
    return;
  }

  if (!ctx.dryRun) {
    expectOk(
      await ctx.gateway.updateTeam(org, current.slug, patch, ctx.signal),
      `update team ${team.name} in ${org}`,
    );
  }

  const verb = tense(ctx, 'updating', 'updated');
  if (patch.description !== undefined) {
    ctx.report.add(`${verb} team ${team.name} description to ${quote(patch.description)}`);
  }
  if (patch.privacy !== undefined) {
    ctx.report.add(`${verb} team ${team.name} privacy to ${quote(patch.privacy)}`);
  }
}

async function ensureTeamMembers(
  ctx: ReconcileContext,
  org: string,
  team: TeamConfig,
  remote: RemoteTeam | null,
  created: boolean,
) {
  // A team created during this run starts out empty
  const members: RemoteUser[] =
    remote && !created
      ? expectOk(
          await ctx.gateway.listTeamMembers(org, remote.slug, ctx.signal),
          `list members of team ${team.name} in ${org}`,
        )
      : [];

  for (const member of members) {
    if (!team.members.some((username) => equalFold(username, member.login))) {
      ctx.report.warn(`${member.login} is in team ${team.name} but not in manifest`);
    }
  }

  for (const username of team.members) {
    if (members.some((m) => equalFold(username, m.login))) continue;

    if (!ctx.dryRun && remote) {
      expectOk(
        await ctx.gateway.addTeamMember(org, remote.slug, username, ctx.signal),
        `add ${username} to team ${team.name} in ${org}`,
      );
    }
    ctx.report.add(`${tense(ctx, 'adding', 'added')} ${username} to team ${team.name}`);
  }
}

export async function reconcileTeams(ctx: ReconcileContext, org: OrganizationConfig) {
  ctx.report.header('Teams');

  const remoteTeams = expectOk(
    await ctx.gateway.listTeams(org.name, ctx.signal),
    `list teams ${org.name}`,
  );

  for (const remoteTeam of remoteTeams) {
    if (!org.teams.some((t) => equalFold(t.name, remoteTeam.name))) {
      ctx.report.warn(`team ${remoteTeam.name} exists in github but not in manifest`);
    }
  }

  for (const team of org.teams) {
    const existing = remoteTeams.find((t) => equalFold(t.name, team.name));
    if (existing) {
      await updateTeam(ctx, org.name, team, existing);
      await ensureTeamMembers(ctx, org.name, team, existing, false);
    } else {
      const created = await createTeam(ctx, org.name, team);
      await ensureTeamMembers(ctx, org.name, team, created, true);
    }
  }
}
