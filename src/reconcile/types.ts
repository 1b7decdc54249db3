import type { TeamPrivacy } from '../gateway/types.js';

/*
 * Optional keys are unmanaged when absent: nothing is ever cleared on GitHub
 * because a key was left out of the manifest.
 */

export interface PersonConfig {
  name: string;
  username: string;
}

export interface TeamConfig {
  name: string;
  description?: string;
  privacy?: TeamPrivacy;
  /**
   * Usernames, each of which must also be listed under `people`
   */
  members: string[];
}

export interface ProtectionConfig {
  require_pr?: boolean;
  checks_must_pass?: boolean;
  required_checks?: string[];
  signed_commits?: boolean;
}

export interface BranchConfig {
  name: string;
  protection: ProtectionConfig;
}

export interface RepositoryConfig {
  name: string;
  description?: string;
  archived?: boolean;
  private?: boolean;
  default_branch?: string;
  /**
   * Repository topics. An explicit empty list clears them.
   */
  labels?: string[];
  protected_branches?: BranchConfig[];
}

export interface OrganizationConfig {
  name: string;
  people: PersonConfig[];
  teams: TeamConfig[];
  repositories: RepositoryConfig[];
}
