import fs from 'fs-extra';
import Joi from 'joi';
import yml from 'js-yaml';

import { ManifestError } from '../errors.js';
import type { OrganizationConfig } from './types.js';

const protectionValidator = Joi.object({
  require_pr: Joi.boolean().optional(),
  checks_must_pass: Joi.boolean().optional(),
  required_checks: Joi.array().items(Joi.string().min(1)).optional(),
  signed_commits: Joi.boolean().optional(),
});

const schema = Joi.object<OrganizationConfig>({
  name: Joi.string().min(1).required(),
  people: Joi.array()
    .items({
      name: Joi.string().min(1).required(),
      username: Joi.string().min(1).required(),
    })
    .default([]),
  teams: Joi.array()
    .items({
      name: Joi.string().min(1).required(),
      description: Joi.string().allow('').optional(),
      privacy: Joi.string().valid('secret', 'closed').optional(),
      members: Joi.array().items(Joi.string().min(1)).default([]),
    })
    .default([]),
  repositories: Joi.array()
    .items({
      name: Joi.string().min(1).required(),
      description: Joi.string().allow('').optional(),
      archived: Joi.boolean().optional(),
      private: Joi.boolean().optional(),
      default_branch: Joi.string().min(1).optional(),
      labels: Joi.array().items(Joi.string().min(1)).optional(),
      protected_branches: Joi.array()
        .items({
          name: Joi.string().min(1).required(),
          protection: protectionValidator.required(),
        })
        .optional(),
    })
    .default([]),
}).required();

const findDuplicate = (names: string[]) => {
  const seen = new Set<string>();
  for (const name of names) {
    const key = name.toLowerCase();
    if (seen.has(key)) return name;
    seen.add(key);
  }
  return null;
};

const repeated = (what: string, where: string) =>
  new ManifestError(`${what} appears multiple times in ${where}, it should only appear once`);

function checkReferences(org: OrganizationConfig) {
  const inManifest = `the manifest for "${org.name}"`;

  const duplicatePerson = findDuplicate(org.people.map((p) => p.username));
  if (duplicatePerson) {
    throw repeated(`Person "${duplicatePerson}"`, inManifest);
  }

  const duplicateTeam = findDuplicate(org.teams.map((t) => t.name));
  if (duplicateTeam) {
    throw repeated(`Team "${duplicateTeam}"`, inManifest);
  }

  const duplicateRepo = findDuplicate(org.repositories.map((r) => r.name));
  if (duplicateRepo) {
    throw repeated(`Repository "${duplicateRepo}"`, inManifest);
  }

  for (const team of org.teams) {
    for (const member of team.members) {
      if (!org.people.some((p) => p.username.toLowerCase() === member.toLowerCase())) {
        throw new ManifestError(
          `Team "${team.name}" in "${org.name}" lists member "${member}" ` +
            'who does not appear in "people"',
        );
      }
    }
  }

  for (const repo of org.repositories) {
    const duplicateBranch = findDuplicate((repo.protected_branches ?? []).map((b) => b.name));
    if (duplicateBranch) {
      throw new ManifestError(
        `Branch "${duplicateBranch}" is protected multiple times in repository "${repo.name}", ` +
          'it should only appear once',
      );
    }
  }
}

export async function parseManifest(source: string): Promise<OrganizationConfig> {
  let raw: unknown;
  try {
    raw = yml.load(source);
  } catch (err) {
    throw new ManifestError('Manifest is not valid YAML', { cause: err });
  }

  let org: OrganizationConfig;
  try {
    org = await schema.validateAsync(raw);
  } catch (err) {
    throw new ManifestError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  checkReferences(org);
  return org;
}

export async function loadManifest(file: string): Promise<OrganizationConfig> {
  if (!(await fs.pathExists(file))) {
    throw new ManifestError(`Manifest "${file}" does not exist`);
  }
  return parseManifest(await fs.readFile(file, 'utf8'));
}
