import type { Octokit } from '@octokit/rest';

import { classify, ok, type GatewayResult } from './result.js';
import type { Limiter } from './rate-limiter.js';
import type {
  Gateway,
  ProtectionRequest,
  RemoteAccount,
  RemoteBranch,
  RemoteBranchProtection,
  RemoteRepository,
  RemoteTeam,
  RemoteUser,
  RepositoryPatch,
  RepositorySettings,
  TeamPatch,
  TeamSettings,
} from './types.js';

export const REPOSITORY_PAGE_SIZE = 100;

export interface GitHubGatewayOptions {
  octokit: Octokit;
  limiter: Limiter;
  pageSize?: number;
}

type RepositoryData = {
  name: string;
  description: string | null;
  private: boolean;
  archived?: boolean;
  default_branch?: string;
  topics?: string[];
};

type TeamData = {
  name: string;
  slug: string;
  description: string | null;
  privacy?: string;
};

const toRemoteRepository = (repo: RepositoryData): RemoteRepository => ({
  name: repo.name,
  description: repo.description,
  archived: repo.archived ?? false,
  private: repo.private,
  defaultBranch: repo.default_branch ?? '',
  topics: repo.topics ?? [],
});

const toRemoteTeam = (team: TeamData): RemoteTeam => ({
  name: team.name,
  slug: team.slug,
  description: team.description,
  privacy: team.privacy === 'secret' || team.privacy === 'closed' ? team.privacy : undefined,
});

const toRemoteUser = (user: { login: string; id: number }): RemoteUser => ({
  login: user.login,
  id: user.id,
});

const hasNextPage = (link: string | undefined) => !!link && /rel="next"/.test(link);

export class GitHubGateway implements Gateway {
  private readonly octokit: Octokit;
  private readonly pageSize: number;

  constructor({ octokit, limiter, pageSize = REPOSITORY_PAGE_SIZE }: GitHubGatewayOptions) {
    this.octokit = octokit;
    this.pageSize = pageSize;
    // Every HTTP request waits for a token, including each page of a paginated read
    this.octokit.hook.before('request', async (options) => {
      await limiter.acquire(options.request?.signal);
    });
  }

  private async call<T>(fn: () => Promise<T>): Promise<GatewayResult<T>> {
    try {
      return ok(await fn());
    } catch (err) {
      return classify(err);
    }
  }

  getOrganization = (org: string, signal?: AbortSignal) =>
    this.call(async (): Promise<RemoteAccount> => {
      const { data } = await this.octokit.orgs.get({ org, request: { signal } });
      return {
        login: data.login,
        id: data.id,
        publicRepos: data.public_repos,
        privateRepos: data.total_private_repos ?? 0,
      };
    });

  getUser = (username: string, signal?: AbortSignal) =>
    this.call(async (): Promise<RemoteAccount> => {
      const { data } = await this.octokit.users.getByUsername({ username, request: { signal } });
      return {
        login: data.login,
        id: data.id,
        publicRepos: data.public_repos,
        privateRepos: 'total_private_repos' in data ? (data.total_private_repos ?? 0) : 0,
      };
    });

  listMembers = (org: string, signal?: AbortSignal) =>
    this.call(async () => {
      const members = await this.octokit.paginate(this.octokit.orgs.listMembers, {
        org,
        per_page: 100,
        request: { signal },
      });
      return members.map(toRemoteUser);
    });

  createInvitation = (org: string, inviteeId: number, signal?: AbortSignal) =>
    this.call(async () => {
      await this.octokit.orgs.createInvitation({
        org,
        invitee_id: inviteeId,
        role: 'direct_member',
        request: { signal },
      });
    });

  listTeams = (org: string, signal?: AbortSignal) =>
    this.call(async () => {
      const teams = await this.octokit.paginate(this.octokit.teams.list, {
        org,
        per_page: 100,
        request: { signal },
      });
      return teams.map(toRemoteTeam);
    });

  createTeam = (org: string, settings: TeamSettings, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.teams.create({
        org,
        name: settings.name,
        description: settings.description,
        privacy: settings.privacy,
        request: { signal },
      });
      return toRemoteTeam(data);
    });

  updateTeam = (org: string, slug: string, patch: TeamPatch, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.teams.updateInOrg({
        org,
        team_slug: slug,
        ...patch,
        request: { signal },
      });
      return toRemoteTeam(data);
    });

  listTeamMembers = (org: string, slug: string, signal?: AbortSignal) =>
    this.call(async () => {
      const members = await this.octokit.paginate(this.octokit.teams.listMembersInOrg, {
        org,
        team_slug: slug,
        per_page: 100,
        request: { signal },
      });
      return members.map(toRemoteUser);
    });

  addTeamMember = (org: string, slug: string, username: string, signal?: AbortSignal) =>
    this.call(async () => {
      await this.octokit.teams.addOrUpdateMembershipForUserInOrg({
        org,
        team_slug: slug,
        username,
        role: 'member',
        request: { signal },
      });
    });

  async listRepositories(
    account: string,
    signal?: AbortSignal,
  ): Promise<GatewayResult<RemoteRepository[]>> {
    let isOrg = true;
    let owner = await this.getOrganization(account, signal);
    if (owner.kind === 'not-found') {
      isOrg = false;
      owner = await this.getUser(account, signal);
    }
    if (owner.kind !== 'ok') return owner;

    if (owner.value.publicRepos + owner.value.privateRepos < 1) return ok([]);

    return this.call(async () => {
      const repos: RemoteRepository[] = [];
      for (let page = 1; ; page++) {
        const params = { type: 'all' as const, per_page: this.pageSize, page, request: { signal } };
        const response = isOrg
          ? await this.octokit.repos.listForOrg({ org: account, ...params })
          : await this.octokit.repos.listForUser({ username: account, ...params });

        for (const repo of response.data) {
          if (repo.archived) continue;
          repos.push(toRemoteRepository(repo));
        }

        if (!hasNextPage(response.headers.link)) break;
      }
      return repos;
    });
  }

  getRepository = (owner: string, name: string, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.get({ owner, repo: name, request: { signal } });
      return toRemoteRepository(data);
    });

  createRepository = (owner: string, settings: RepositorySettings, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.createInOrg({
        org: owner,
        name: settings.name,
        description: settings.description,
        private: settings.private,
        request: { signal },
      });
      let created = toRemoteRepository(data);

      if (settings.topics?.length) {
        const topics = await this.octokit.repos.replaceAllTopics({
          owner,
          repo: settings.name,
          names: settings.topics,
          request: { signal },
        });
        created = { ...created, topics: topics.data.names };
      }

      // Neither of these can be given at creation time
      if (settings.archived !== undefined || settings.default_branch !== undefined) {
        const updated = await this.octokit.repos.update({
          owner,
          repo: settings.name,
          archived: settings.archived,
          default_branch: settings.default_branch,
          request: { signal },
        });
        created = { ...toRemoteRepository(updated.data), topics: created.topics };
      }

      return created;
    });

  updateRepository = (owner: string, name: string, patch: RepositoryPatch, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.update({
        owner,
        repo: name,
        ...patch,
        request: { signal },
      });
      return toRemoteRepository(data);
    });

  listTopics = (owner: string, name: string, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.getAllTopics({
        owner,
        repo: name,
        per_page: 100,
        request: { signal },
      });
      return data.names;
    });

  setTopics = (owner: string, name: string, topics: string[], signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.replaceAllTopics({
        owner,
        repo: name,
        names: topics,
        request: { signal },
      });
      return data.names;
    });

  listBranches = (owner: string, repo: string, signal?: AbortSignal) =>
    this.call(async () => {
      const branches = await this.octokit.paginate(this.octokit.repos.listBranches, {
        owner,
        repo,
        per_page: 100,
        request: { signal },
      });
      return branches.map((b): RemoteBranch => ({ name: b.name, protected: b.protected }));
    });

  getBranchProtection = (owner: string, repo: string, branch: string, signal?: AbortSignal) =>
    this.call(async (): Promise<RemoteBranchProtection> => {
      const { data } = await this.octokit.repos.getBranchProtection({
        owner,
        repo,
        branch,
        request: { signal },
      });
      return {
        pullRequestReviews: !!data.required_pull_request_reviews,
        statusChecks: data.required_status_checks
          ? (data.required_status_checks.contexts ?? [])
          : null,
        signedCommits: data.required_signatures?.enabled ?? false,
      };
    });

  updateBranchProtection = (
    owner: string,
    repo: string,
    branch: string,
    request: ProtectionRequest,
    signal?: AbortSignal,
  ) =>
    this.call(async () => {
      await this.octokit.repos.updateBranchProtection({
        owner,
        repo,
        branch,
        required_status_checks: request.statusChecks
          ? { strict: false, contexts: request.statusChecks.checks }
          : null,
        enforce_admins: null,
        required_pull_request_reviews: request.pullRequestReviews ? {} : null,
        restrictions: null,
        request: { signal },
      });
    });

  getSignedCommits = (owner: string, repo: string, branch: string, signal?: AbortSignal) =>
    this.call(async () => {
      const { data } = await this.octokit.repos.getCommitSignatureProtection({
        owner,
        repo,
        branch,
        request: { signal },
      });
      return data.enabled;
    });

  requireSignedCommits = (
    owner: string,
    repo: string,
    branch: string,
    enabled: boolean,
    signal?: AbortSignal,
  ) =>
    this.call(async () => {
      if (enabled) {
        await this.octokit.repos.createCommitSignatureProtection({
          owner,
          repo,
          branch,
          request: { signal },
        });
      } else {
        await this.octokit.repos.deleteCommitSignatureProtection({
          owner,
          repo,
          branch,
          request: { signal },
        });
      }
    });
}
