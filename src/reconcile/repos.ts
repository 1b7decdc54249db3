import { expectOk, toError } from '../errors.js';
import { equalFold, formatList, quote, sameMembers } from '../helpers.js';
import type { RemoteRepository, RepositoryPatch, RepositorySettings } from '../gateway/types.js';
import { ensureProtectedBranches } from './branches.js';
import { tense, type ReconcileContext } from './context.js';
import type { OrganizationConfig, RepositoryConfig } from './types.js';

type PatchLine = [label: string, value: string | boolean | undefined];

const describePatch = (patch: RepositoryPatch): PatchLine[] => [
  ['description', patch.description],
  ['archived', patch.archived],
  ['private', patch.private],
  ['default branch', patch.default_branch],
];

/**
 * Fields the manifest sets that differ from the remote. Description and
 * default branch compare case-insensitively.
 */
export function computeRepositoryPatch(
  repo: RepositoryConfig,
  current: RemoteRepository,
): RepositoryPatch {
  const patch: RepositoryPatch = {};

  if (repo.description !== undefined && !equalFold(current.description ?? '', repo.description)) {
    patch.description = repo.description;
  }
  if (repo.archived !== undefined && current.archived !== repo.archived) {
    patch.archived = repo.archived;
  }
  if (repo.private !== undefined && current.private !== repo.private) {
    patch.private = repo.private;
  }
  if (
    repo.default_branch !== undefined &&
    !equalFold(current.defaultBranch, repo.default_branch)
  ) {
    patch.default_branch = repo.default_branch;
  }

  return patch;
}

export function projectRepository(repo: RepositoryConfig): RepositorySettings {
  const settings: RepositorySettings = { name: repo.name };
  if (repo.description !== undefined) settings.description = repo.description;
  if (repo.archived !== undefined) settings.archived = repo.archived;
  if (repo.labels?.length) settings.topics = [...repo.labels];
  if (repo.private !== undefined) settings.private = repo.private;
  if (repo.default_branch !== undefined) settings.default_branch = repo.default_branch;
  return settings;
}

// What a repository created from these settings looks like, used in place of
// the real one when a dry run skips creating it
const settingsToRemote = (settings: RepositorySettings): RemoteRepository => ({
  name: settings.name,
  description: settings.description ?? null,
  archived: settings.archived ?? false,
  private: settings.private ?? false,
  defaultBranch: settings.default_branch ?? '',
  topics: settings.topics ?? [],
});

async function createRepository(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
): Promise<RemoteRepository> {
  const settings = projectRepository(repo);

  let created = settingsToRemote(settings);
  if (!ctx.dryRun) {
    created = expectOk(
      await ctx.gateway.createRepository(owner, settings, ctx.signal),
      `create repo ${owner}/${repo.name}`,
    );
  }

  ctx.report.warn(`${tense(ctx, 'creating', 'created')} repo ${repo.name}`);
  const verb = tense(ctx, 'setting', 'set');
  if (settings.description !== undefined) {
    ctx.report.add(`${verb} description to ${quote(settings.description)}`);
  }
  if (settings.archived !== undefined) {
    ctx.report.add(`${verb} archived to ${quote(settings.archived)}`);
  }
  if (settings.topics) {
    ctx.report.add(`${verb} topics to ${formatList(settings.topics)}`);
  }
  if (settings.private !== undefined) {
    ctx.report.add(`${verb} private to ${quote(settings.private)}`);
  }
  if (settings.default_branch !== undefined) {
    ctx.report.add(`${verb} default branch to ${quote(settings.default_branch)}`);
  }

  return created;
}

async function updateRepository(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  current: RemoteRepository,
) {
  const patch = computeRepositoryPatch(repo, current);
  const lines = describePatch(patch).filter(
    (line): line is [string, string | boolean] => line[1] !== undefined,
  );
  if (lines.length === 0) return;

  if (!ctx.dryRun) {
    expectOk(
      await ctx.gateway.updateRepository(owner, repo.name, patch, ctx.signal),
      `update repo ${owner}/${repo.name}`,
    );
  }

  for (const [label, value] of lines) {
    ctx.report.add(`${tense(ctx, 'updating', 'updated')} ${label} to ${quote(value)}`);
  }
}

async function ensureTopics(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  current: RemoteRepository,
  created: boolean,
) {
  if (!repo.labels?.length) return;

  const currentTopics = created
    ? current.topics
    : expectOk(
        await ctx.gateway.listTopics(owner, repo.name, ctx.signal),
        `get repo topics ${owner}/${repo.name}`,
      );
  const labels = [...repo.labels].sort();

  if (sameMembers(currentTopics, labels)) {
    ctx.report.info(`labels are ${formatList(labels)}`);
    return;
  }

  if (!ctx.dryRun) {
    expectOk(
      await ctx.gateway.setTopics(owner, repo.name, labels, ctx.signal),
      `set repo topics ${owner}/${repo.name}`,
    );
  }
  ctx.report.add(`${tense(ctx, 'updating', 'updated')} labels to ${formatList(labels)}`);
}

export async function ensureRepository(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
) {
  const lookup = await ctx.gateway.getRepository(owner, repo.name, ctx.signal);

  let current: RemoteRepository;
  let created = false;
  switch (lookup.kind) {
    case 'ok':
      current = lookup.value;
      break;
    case 'not-found':
      current = await createRepository(ctx, owner, repo);
      created = true;
      break;
    default:
      throw toError(lookup, `get repo ${owner}/${repo.name}`);
  }

  await updateRepository(ctx, owner, repo, current);
  await ensureTopics(ctx, owner, repo, current, created);
  await ensureProtectedBranches(ctx, owner, repo, created);
}

async function reportUnmanagedRepositories(ctx: ReconcileContext, org: OrganizationConfig) {
  const remote = expectOk(
    await ctx.gateway.listRepositories(org.name, ctx.signal),
    `list repos ${org.name}`,
  );
  if (remote.length === 0) {
    ctx.report.info(`no repos found in github for ${org.name}`);
    return;
  }

  for (const repo of remote) {
    if (!org.repositories.some((r) => equalFold(r.name, repo.name))) {
      ctx.report.warn(`${repo.name} exists in github but not in manifest`);
    }
  }
}

export async function reconcileRepositories(ctx: ReconcileContext, org: OrganizationConfig) {
  ctx.report.header('Repos');
  await reportUnmanagedRepositories(ctx, org);

  for (const repo of org.repositories) {
    ctx.report.header(repo.name);
    await ensureRepository(ctx, org.name, repo);
  }
}
