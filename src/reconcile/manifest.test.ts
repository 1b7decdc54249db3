import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';

import { ManifestError } from '../errors.js';
import { loadManifest, parseManifest } from './manifest.js';

describe('parseManifest', () => {
  it('reads a full organization', async () => {
    const org = await parseManifest(`
name: acme
people:
  - name: Alice Example
    username: alice
teams:
  - name: core
    privacy: closed
    members: [alice]
repositories:
  - name: widgets
    description: Widgets
    labels: [web]
    protected_branches:
      - name: main
        protection:
          require_pr: true
          signed_commits: false
`);

    expect(org).toEqual({
      name: 'acme',
      people: [{ name: 'Alice Example', username: 'alice' }],
      teams: [{ name: 'core', privacy: 'closed', members: ['alice'] }],
      repositories: [
        {
          name: 'widgets',
          description: 'Widgets',
          labels: ['web'],
          protected_branches: [
            { name: 'main', protection: { require_pr: true, signed_commits: false } },
          ],
        },
      ],
    });
  });

  it('defaults every list to empty', async () => {
    expect(await parseManifest('name: acme\n')).toEqual({
      name: 'acme',
      people: [],
      teams: [],
      repositories: [],
    });
  });

  it('keeps unset optional fields absent', async () => {
    const org = await parseManifest('name: acme\nrepositories:\n  - name: widgets\n');
    expect(org.repositories[0]).toEqual({ name: 'widgets' });
    expect('labels' in org.repositories[0]).toBe(false);
  });

  it('rejects unknown keys', async () => {
    await expect(parseManifest('name: acme\nowner: someone\n')).rejects.toThrow(
      '"owner" is not allowed',
    );
  });

  it('rejects an empty document', async () => {
    await expect(parseManifest('')).rejects.toThrow(ManifestError);
  });

  it('rejects invalid YAML', async () => {
    await expect(parseManifest('name: [acme')).rejects.toThrow('Manifest is not valid YAML');
  });

  it('rejects a person listed twice', async () => {
    const source = `
name: acme
people:
  - { name: Alice Example, username: alice }
  - { name: Alice Again, username: Alice }
`;
    await expect(parseManifest(source)).rejects.toThrow(
      'Person "Alice" appears multiple times in the manifest for "acme", ' +
        'it should only appear once',
    );
  });

  it('rejects a team member missing from people', async () => {
    const source = `
name: acme
people:
  - { name: Alice Example, username: alice }
teams:
  - { name: core, members: [alice, bob] }
`;
    await expect(parseManifest(source)).rejects.toThrow(
      'Team "core" in "acme" lists member "bob" who does not appear in "people"',
    );
  });

  it('rejects a branch protected twice', async () => {
    const source = `
name: acme
repositories:
  - name: widgets
    protected_branches:
      - { name: main, protection: { require_pr: true } }
      - { name: main, protection: { require_pr: false } }
`;
    await expect(parseManifest(source)).rejects.toThrow(
      'Branch "main" is protected multiple times in repository "widgets", ' +
        'it should only appear once',
    );
  });
});

describe('loadManifest', () => {
  it('rejects a file that does not exist', async () => {
    await expect(loadManifest('/nonexistent/acme.yaml')).rejects.toThrow(
      'Manifest "/nonexistent/acme.yaml" does not exist',
    );
  });

  it('loads the sample manifest', async () => {
    const org = await loadManifest(
      fileURLToPath(new URL('../../manifests/acme.yaml', import.meta.url)),
    );
    expect(org.name).toBe('acme');
    expect(org.repositories.map((r) => r.name)).toEqual(['widgets', 'gadgets']);
  });
});
