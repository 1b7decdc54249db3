const numberFromEnv = (name: string, fallback: number) => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Expected "${name}" to be a positive number, got "${raw}"`);
  }
  return value;
};

export const GITHUB_TOKEN = process.env.GITHUB_TOKEN || '';
export const STEWARD_GITHUB_APP_CREDS = process.env.STEWARD_GITHUB_APP_CREDS;

export const STEWARD_REQUESTS_PER_SECOND = numberFromEnv('STEWARD_REQUESTS_PER_SECOND', 10);
export const STEWARD_REQUEST_BURST = numberFromEnv(
  'STEWARD_REQUEST_BURST',
  STEWARD_REQUESTS_PER_SECOND,
);

export const SLACK_WEBHOOK_URL = process.env.SLACK_WEBHOOK_URL;
