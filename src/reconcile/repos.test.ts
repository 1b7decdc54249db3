import { describe, it, expect, beforeEach } from 'vitest';

import { ActionReport } from '../ActionReport.js';
import { RateLimitError } from '../errors.js';
import { FakeGateway } from '../testing/FakeGateway.js';
import { computeRepositoryPatch, ensureRepository, reconcileRepositories } from './repos.js';
import type { OrganizationConfig, RepositoryConfig } from './types.js';

describe('computeRepositoryPatch', () => {
  const current = {
    name: 'widgets',
    description: 'Widgets for everyone',
    archived: false,
    private: false,
    defaultBranch: 'main',
    topics: [],
  };

  it('includes only fields that are set and differ', () => {
    expect(
      computeRepositoryPatch(
        { name: 'widgets', description: 'Widgets', archived: false, private: true },
        current,
      ),
    ).toEqual({ description: 'Widgets', private: true });
  });

  it('compares description and default branch ignoring case', () => {
    expect(
      computeRepositoryPatch(
        { name: 'widgets', description: 'WIDGETS FOR EVERYONE', default_branch: 'Main' },
        current,
      ),
    ).toEqual({});
  });

  it('treats a missing remote description as empty', () => {
    expect(
      computeRepositoryPatch(
        { name: 'widgets', description: '' },
        { ...current, description: null },
      ),
    ).toEqual({});
  });
});

describe('ensureRepository', () => {
  let fake: FakeGateway;
  let report: ActionReport;

  beforeEach(() => {
    fake = new FakeGateway('acme');
    report = ActionReport.create({ echo: false });
  });

  const ensure = (repo: RepositoryConfig, dryRun = false) =>
    ensureRepository({ gateway: fake, report, dryRun }, 'acme', repo);

  it('sends one update with only the changed fields', async () => {
    fake.addRepository({ name: 'widgets', description: 'Old' });

    await ensure({ name: 'widgets', description: 'New', private: false });

    expect(fake.writes).toEqual([
      { method: 'updateRepository', args: ['acme', 'widgets', { description: 'New' }] },
    ]);
    expect(report.lines).toEqual([{ category: 'add', text: "updated description to 'New'" }]);
  });

  it('leaves a matching repository alone', async () => {
    fake.addRepository({ name: 'widgets', description: 'Widgets' });

    await ensure({ name: 'widgets', description: 'widgets', private: false });

    expect(fake.writes).toEqual([]);
    expect(report.lines).toEqual([]);
  });

  it('compares topics as a set', async () => {
    fake.addRepository({ name: 'widgets', topics: ['web', 'tools'] });

    await ensure({ name: 'widgets', labels: ['tools', 'web'] });

    expect(fake.writes).toEqual([]);
    expect(report.lines).toEqual([{ category: 'info', text: 'labels are [tools, web]' }]);
  });

  it('replaces topics with the sorted labels', async () => {
    fake.addRepository({ name: 'widgets', topics: ['tools'] });

    await ensure({ name: 'widgets', labels: ['web', 'api'] });

    expect(fake.writes).toEqual([
      { method: 'setTopics', args: ['acme', 'widgets', ['api', 'web']] },
    ]);
    expect(report.lines).toEqual([{ category: 'add', text: 'updated labels to [api, web]' }]);
  });

  it('leaves topics alone when labels are not managed', async () => {
    fake.addRepository({ name: 'widgets', topics: ['tools'] });

    await ensure({ name: 'widgets' });

    expect(fake.calls.map((c) => c.method)).toEqual(['getRepository']);
  });

  it('leaves topics alone for an empty label list', async () => {
    fake.addRepository({ name: 'widgets', topics: ['tools'] });

    await ensure({ name: 'widgets', labels: [] });

    expect(fake.calls.map((c) => c.method)).toEqual(['getRepository']);
    expect(fake.repositories.get('widgets')?.topics).toEqual(['tools']);
    expect(report.lines).toEqual([]);
  });

  const gadgets: RepositoryConfig = {
    name: 'gadgets',
    description: 'Gadgets',
    private: true,
    labels: ['web', 'api'],
    default_branch: 'main',
  };

  it('creates a missing repository with its settings in one call', async () => {
    await ensure(gadgets);

    expect(fake.writes).toEqual([
      {
        method: 'createRepository',
        args: [
          'acme',
          {
            name: 'gadgets',
            description: 'Gadgets',
            private: true,
            topics: ['web', 'api'],
            default_branch: 'main',
          },
        ],
      },
    ]);
    expect(report.lines).toEqual([
      { category: 'warn', text: 'created repo gadgets' },
      { category: 'add', text: "set description to 'Gadgets'" },
      { category: 'add', text: 'set topics to [web, api]' },
      { category: 'add', text: "set private to 'true'" },
      { category: 'add', text: "set default branch to 'main'" },
      { category: 'info', text: 'labels are [api, web]' },
    ]);
  });

  it('plans the same creation without writing in a dry run', async () => {
    await ensure(gadgets, true);

    expect(fake.writes).toEqual([]);
    expect(report.lines.map((l) => l.text)).toEqual([
      'creating repo gadgets',
      "setting description to 'Gadgets'",
      'setting topics to [web, api]',
      "setting private to 'true'",
      "setting default branch to 'main'",
      'labels are [api, web]',
    ]);
  });

  it('has nothing left to do on a second run', async () => {
    await ensure(gadgets);
    const writes = fake.writes.length;

    await ensure(gadgets);

    expect(fake.writes).toHaveLength(writes);
  });

  it('stops on a rate limit', async () => {
    fake.failOn('getRepository', {
      kind: 'rate-limited',
      error: new Error('API rate limit exceeded'),
    });

    await expect(ensure(gadgets)).rejects.toThrow(RateLimitError);
    await expect(ensure(gadgets)).rejects.toThrow(
      'github: hit rate limit while get repo acme/gadgets',
    );
    expect(fake.writes).toEqual([]);
  });
});

describe('reconcileRepositories', () => {
  const org = (repositories: RepositoryConfig[]): OrganizationConfig => ({
    name: 'acme',
    people: [],
    teams: [],
    repositories,
  });

  it('reports repositories missing from the manifest', async () => {
    const fake = new FakeGateway('acme')
      .addRepository({ name: 'legacy' })
      .addRepository({ name: 'widgets' })
      .addRepository({ name: 'old', archived: true });
    const report = ActionReport.create({ echo: false });

    await reconcileRepositories(
      { gateway: fake, report, dryRun: true },
      org([{ name: 'Widgets' }]),
    );

    expect(report.lines).toEqual([
      { category: 'header', text: 'Repos' },
      { category: 'warn', text: 'legacy exists in github but not in manifest' },
      { category: 'header', text: 'Widgets' },
    ]);
  });

  it('notes an organization without repositories', async () => {
    const fake = new FakeGateway('acme');
    const report = ActionReport.create({ echo: false });

    await reconcileRepositories({ gateway: fake, report, dryRun: true }, org([]));

    expect(report.lines.map((l) => l.text)).toEqual(['Repos', 'no repos found in github for acme']);
  });
});
