import type { GatewayResult } from './result.js';

export interface RemoteAccount {
  login: string;
  id: number;
  publicRepos: number;
  privateRepos: number;
}

export interface RemoteUser {
  login: string;
  id: number;
}

export type TeamPrivacy = 'secret' | 'closed';

export interface RemoteTeam {
  name: string;
  slug: string;
  description: string | null;
  privacy?: TeamPrivacy;
}

export interface TeamPatch {
  description?: string;
  privacy?: TeamPrivacy;
}

export interface TeamSettings extends TeamPatch {
  name: string;
}

export interface RemoteRepository {
  name: string;
  description: string | null;
  archived: boolean;
  private: boolean;
  defaultBranch: string;
  topics: string[];
}

/**
 * Partial repository update. Keys left out are not sent, so GitHub leaves
 * them untouched.
 */
export interface RepositoryPatch {
  description?: string;
  archived?: boolean;
  private?: boolean;
  default_branch?: string;
}

export interface RepositorySettings extends RepositoryPatch {
  name: string;
  topics?: string[];
}

export interface RemoteBranch {
  name: string;
  protected: boolean;
}

export interface RemoteBranchProtection {
  pullRequestReviews: boolean;
  statusChecks: string[] | null;
  signedCommits: boolean;
}

export interface ProtectionRequest {
  pullRequestReviews: boolean;
  statusChecks: { checks: string[] } | null;
}

type Call<T> = Promise<GatewayResult<T>>;

export interface Gateway {
  getOrganization(org: string, signal?: AbortSignal): Call<RemoteAccount>;
  getUser(username: string, signal?: AbortSignal): Call<RemoteAccount>;
  listMembers(org: string, signal?: AbortSignal): Call<RemoteUser[]>;
  createInvitation(org: string, inviteeId: number, signal?: AbortSignal): Call<void>;

  listTeams(org: string, signal?: AbortSignal): Call<RemoteTeam[]>;
  createTeam(org: string, settings: TeamSettings, signal?: AbortSignal): Call<RemoteTeam>;
  updateTeam(org: string, slug: string, patch: TeamPatch, signal?: AbortSignal): Call<RemoteTeam>;
  listTeamMembers(org: string, slug: string, signal?: AbortSignal): Call<RemoteUser[]>;
  addTeamMember(org: string, slug: string, username: string, signal?: AbortSignal): Call<void>;

  /**
   * Every non-archived repository of an organization, or of a user account
   * when no organization has that name. Resolves to an empty list without
   * paging when the account reports no repositories at all.
   */
  listRepositories(account: string, signal?: AbortSignal): Call<RemoteRepository[]>;
  getRepository(owner: string, name: string, signal?: AbortSignal): Call<RemoteRepository>;
  createRepository(
    owner: string,
    settings: RepositorySettings,
    signal?: AbortSignal,
  ): Call<RemoteRepository>;
  updateRepository(
    owner: string,
    name: string,
    patch: RepositoryPatch,
    signal?: AbortSignal,
  ): Call<RemoteRepository>;
  listTopics(owner: string, name: string, signal?: AbortSignal): Call<string[]>;
  setTopics(owner: string, name: string, topics: string[], signal?: AbortSignal): Call<string[]>;

  listBranches(owner: string, repo: string, signal?: AbortSignal): Call<RemoteBranch[]>;
  getBranchProtection(
    owner: string,
    repo: string,
    branch: string,
    signal?: AbortSignal,
  ): Call<RemoteBranchProtection>;
  updateBranchProtection(
    owner: string,
    repo: string,
    branch: string,
    request: ProtectionRequest,
    signal?: AbortSignal,
  ): Call<void>;
  getSignedCommits(
    owner: string,
    repo: string,
    branch: string,
    signal?: AbortSignal,
  ): Call<boolean>;
  requireSignedCommits(
    owner: string,
    repo: string,
    branch: string,
    enabled: boolean,
    signal?: AbortSignal,
  ): Call<void>;
}
