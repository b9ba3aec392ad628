import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigError } from '../src/core/errors.js';
import { firstHeading, parseFrontMatter } from '../src/scanner/frontmatter.js';
import { scanChanges } from '../src/scanner/scanner.js';
import { parseTasks } from '../src/scanner/tasks.js';

async function changesRepo(changes: Record<string, Record<string, string>>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'changeq-scan-'));
  for (const [id, files] of Object.entries(changes)) {
    await mkdir(join(dir, 'changes', id), { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(dir, 'changes', id, name), content);
    }
  }
  return dir;
}

describe('scanChanges', () => {
  it('reads every change directory with a proposal, sorted by id', async () => {
    const dir = await changesRepo({
      'b-ui': {
        'proposal.md': [
          '---',
          'depends_on: a-api',
          'priority: 2',
          'risk: high',
          'max_retries: 5',
          'verification:',
          '  strategy: unanimous',
          '  requires_human_confirmation: false',
          '---',
          '# Login page',
          '',
          'Adds the form.',
          ''
        ].join('\n'),
        'tasks.md': '# Tasks\n\n## task-1: Form\nFields and validation.\n\n## task-2: Route\n'
      },
      'a-api': { 'proposal.md': 'No heading here.\n' },
      'notes': { 'README.md': 'not a change' },
      'archive': { 'proposal.md': '# Old\n' }
    });

    const specs = await scanChanges({ repoRoot: dir, changesDir: 'changes', exclude: ['archive'] });

    expect(specs.map((s) => s.id)).toEqual(['a-api', 'b-ui']);
    expect(specs[0]).toMatchObject({
      changeDir: join('changes', 'a-api'),
      title: 'a-api',
      proposal: 'No heading here.',
      dependsOn: [],
      priority: 0,
      risk: 'medium',
      tasks: []
    });
    expect(specs[1]).toMatchObject({
      title: 'Login page',
      proposal: '# Login page\n\nAdds the form.',
      dependsOn: ['a-api'],
      priority: 2,
      risk: 'high',
      overrides: { maxRetries: 5, verification: { strategy: 'unanimous', requires_human_confirmation: false } },
      tasks: [
        { id: 'task-1', title: 'Form', description: 'Fields and validation.' },
        { id: 'task-2', title: 'Route', description: '' }
      ]
    });
  });

  it('returns nothing when the changes directory does not exist', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-scan-'));
    expect(await scanChanges({ repoRoot: dir, changesDir: 'changes' })).toEqual([]);
  });

  it('rejects unknown risk levels with the change and key named', async () => {
    const dir = await changesRepo({ x: { 'proposal.md': '---\nrisk: extreme\n---\n# X\n' } });
    let caught: unknown;
    try {
      await scanChanges({ repoRoot: dir, changesDir: 'changes' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.message).toMatch(/^Change 'x': invalid front matter at risk: /);
  });

  it('rejects front matter that is not valid yaml', async () => {
    const dir = await changesRepo({ y: { 'proposal.md': '---\ndepends_on: [a\n---\n# Y\n' } });
    await expect(scanChanges({ repoRoot: dir, changesDir: 'changes' })).rejects.toThrow(
      /^Change 'y': malformed front matter: /
    );
  });
});

describe('proposal parsing', () => {
  it('leaves text without a front matter block untouched', () => {
    expect(parseFrontMatter('# Title\n---\nnot meta\n')).toEqual({ meta: {}, body: '# Title\n---\nnot meta\n' });
  });

  it('splits metadata from the body', () => {
    expect(parseFrontMatter('---\nrisk: low\n---\n# T\n')).toEqual({ meta: { risk: 'low' }, body: '# T\n' });
  });

  it('finds the first level-one heading only', () => {
    expect(firstHeading('intro\n## Sub\n# Main title \n# Later')).toBe('Main title');
    expect(firstHeading('## only sub')).toBeNull();
  });

  it('collects task headings with the lines beneath them', () => {
    expect(parseTasks('preamble\n## task-a: One\nline 1\nline 2\n## Notes\n## TASK-b:  Two  \n')).toEqual([
      { id: 'task-a', title: 'One', description: 'line 1\nline 2\n## Notes' },
      { id: 'TASK-b', title: 'Two', description: '' }
    ]);
  });
});
