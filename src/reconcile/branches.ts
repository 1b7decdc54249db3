import { expectOk, toError } from '../errors.js';
import { formatList, quote } from '../helpers.js';
import type { ProtectionRequest, RemoteBranch } from '../gateway/types.js';
import { tense, type ReconcileContext } from './context.js';
import type { BranchConfig, ProtectionConfig, RepositoryConfig } from './types.js';

/**
 * Each rule the manifest sets adds its requirement, whatever its value, so
 * the request always matches the lines reported for it.
 */
export function buildProtectionRequest(protection: ProtectionConfig): ProtectionRequest {
  return {
    pullRequestReviews: protection.require_pr !== undefined,
    statusChecks:
      protection.checks_must_pass !== undefined
        ? { checks: [...(protection.required_checks ?? [])] }
        : null,
  };
}

function reportProtection(ctx: ReconcileContext, protection: ProtectionConfig, verb: string) {
  if (protection.require_pr !== undefined) {
    ctx.report.add(`${verb} require pr to ${quote(protection.require_pr)}`);
  }
  if (protection.checks_must_pass !== undefined) {
    ctx.report.add(`${verb} require status checks to ${quote(protection.checks_must_pass)}`);
    if (protection.required_checks?.length) {
      ctx.report.add(`${verb} required checks to ${formatList(protection.required_checks)}`);
    }
  }
}

async function applyProtection(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  branch: BranchConfig,
) {
  if (ctx.dryRun) return;
  expectOk(
    await ctx.gateway.updateBranchProtection(
      owner,
      repo.name,
      branch.name,
      buildProtectionRequest(branch.protection),
      ctx.signal,
    ),
    `protect branch ${branch.name} of ${owner}/${repo.name}`,
  );
}

async function createBranchProtection(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  branch: BranchConfig,
) {
  await applyProtection(ctx, owner, repo, branch);
  ctx.report.warn(
    `${tense(ctx, 'creating', 'created')} protected branch ${branch.name} for repo ${repo.name}`,
  );
  reportProtection(ctx, branch.protection, tense(ctx, 'setting', 'set'));
}

/**
 * Existing protection is not read back for comparison, so a protected branch
 * gets its full rule set re-applied on every run.
 */
async function updateBranchProtection(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  branch: BranchConfig,
) {
  ctx.report.info(`protected branch ${quote(branch.name)} for repo ${repo.name}`);
  await applyProtection(ctx, owner, repo, branch);
  reportProtection(ctx, branch.protection, tense(ctx, 'updating', 'updated'));
}

async function ensureSignedCommits(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  branch: BranchConfig,
) {
  const desired = branch.protection.signed_commits;
  if (desired === undefined) return;

  const operation = `get signed commits for branch ${branch.name} of ${owner}/${repo.name}`;
  const lookup = await ctx.gateway.getSignedCommits(owner, repo.name, branch.name, ctx.signal);
  let current: boolean;
  switch (lookup.kind) {
    case 'ok':
      current = lookup.value;
      break;
    // Branch has no protection (yet), so nothing is enforced
    case 'not-found':
      current = false;
      break;
    default:
      throw toError(lookup, operation);
  }

  if (current === desired) {
    ctx.report.info(`require signed commits is ${quote(desired)}`);
    return;
  }

  if (!ctx.dryRun) {
    expectOk(
      await ctx.gateway.requireSignedCommits(owner, repo.name, branch.name, desired, ctx.signal),
      `require signed commits for branch ${branch.name} of ${owner}/${repo.name}`,
    );
  }
  ctx.report.add(
    `${tense(ctx, 'updating', 'updated')} require signed commits to ${quote(desired)}`,
  );
}

async function ensureBranch(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  branch: BranchConfig,
) {
  const lookup = await ctx.gateway.getBranchProtection(owner, repo.name, branch.name, ctx.signal);
  switch (lookup.kind) {
    case 'not-found':
      await createBranchProtection(ctx, owner, repo, branch);
      break;
    case 'ok':
      await updateBranchProtection(ctx, owner, repo, branch);
      break;
    default:
      throw toError(lookup, `get branch protection ${branch.name} of ${owner}/${repo.name}`);
  }

  await ensureSignedCommits(ctx, owner, repo, branch);
}

export async function ensureProtectedBranches(
  ctx: ReconcileContext,
  owner: string,
  repo: RepositoryConfig,
  created: boolean,
) {
  const branches = repo.protected_branches ?? [];
  if (branches.length === 0) return;

  // A repository created during this run has no branches to protect yet
  const remoteBranches: RemoteBranch[] = created
    ? []
    : expectOk(
        await ctx.gateway.listBranches(owner, repo.name, ctx.signal),
        `list branches ${owner}/${repo.name}`,
      );

  for (const branch of branches) {
    if (!remoteBranches.some((b) => b.name === branch.name)) {
      ctx.report.warn(
        `branch ${branch.name} does not exist in repo ${repo.name}, skipping protection`,
      );
      continue;
    }
    await ensureBranch(ctx, owner, repo, branch);
  }
}
