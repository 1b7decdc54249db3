import { Octokit } from '@octokit/rest';
import {
  appCredentialsFromString,
  type AuthNarrowing,
  getAuthOptionsForOrg,
} from '@electron/github-app-auth';

import {
  GITHUB_TOKEN,
  STEWARD_GITHUB_APP_CREDS,
  STEWARD_REQUEST_BURST,
  STEWARD_REQUESTS_PER_SECOND,
} from './constants.js';
import { GitHubGateway } from './gateway/GitHubGateway.js';
import { RateLimiter } from './gateway/rate-limiter.js';
import type { Gateway } from './gateway/types.js';

function getAuthNarrowing(dryRun: boolean): AuthNarrowing {
  // A dry run never needs to write, so never ask for a token that can
  if (dryRun) {
    return {
      permissions: {
        administration: 'read',
        members: 'read',
        metadata: 'read',
      },
    };
  }
  return {
    permissions: {
      administration: 'write',
      members: 'write',
      metadata: 'read',
    },
  };
}

let limiter: RateLimiter | null = null;
function getLimiter() {
  if (!limiter) {
    limiter = new RateLimiter({
      perSecond: STEWARD_REQUESTS_PER_SECOND,
      burst: STEWARD_REQUEST_BURST,
    });
  }
  return limiter;
}

export async function getOctokit(org: string, dryRun: boolean): Promise<Octokit> {
  if (STEWARD_GITHUB_APP_CREDS) {
    const creds = appCredentialsFromString(STEWARD_GITHUB_APP_CREDS);
    const authOpts = await getAuthOptionsForOrg(org, creds, getAuthNarrowing(dryRun));
    if (!authOpts) {
      throw new Error(`GitHub app is not installed on "${org}"`);
    }
    return new Octokit({ ...authOpts });
  }
  if (!GITHUB_TOKEN) {
    throw new Error('Missing GITHUB_TOKEN or STEWARD_GITHUB_APP_CREDS env var');
  }
  return new Octokit({ auth: GITHUB_TOKEN });
}

export async function getGateway(org: string, dryRun: boolean): Promise<Gateway> {
  return new GitHubGateway({
    octokit: await getOctokit(org, dryRun),
    limiter: getLimiter(),
  });
}
