import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { buildSidebarItems } from '../lib/sidebar';
import { makeWorkspace } from './helpers/fakeNbconvert';

describe('buildSidebarItems', () => {
  it('lists rendered notebooks, directories first, figures hidden', () => {
    const root = makeWorkspace();
    fs.mkdirSync(path.join(root, 'spin_files'));
    fs.mkdirSync(path.join(root, 'advanced'));
    fs.mkdirSync(path.join(root, 'public'));
    fs.writeFileSync(path.join(root, 'spin.md'), '');
    fs.writeFileSync(path.join(root, 'jaynes-cummings.md'), '');
    fs.writeFileSync(path.join(root, 'index.md'), '');
    fs.writeFileSync(path.join(root, 'notes.txt'), '');
    fs.writeFileSync(path.join(root, 'advanced', 'master_equation.md'), '');

    expect(buildSidebarItems(root)).toEqual([
      {
        text: 'advanced',
        collapsed: true,
        items: [{ text: 'master equation', link: '/advanced/master_equation' }],
      },
      { text: 'jaynes cummings', link: '/jaynes-cummings' },
      { text: 'spin', link: '/spin' },
    ]);
  });

  it('keeps a *_files directory that has no matching page', () => {
    const root = makeWorkspace();
    fs.mkdirSync(path.join(root, 'shared_files'));
    fs.writeFileSync(path.join(root, 'shared_files', 'intro.md'), '');

    expect(buildSidebarItems(root, '/examples/')).toEqual([
      {
        text: 'shared_files',
        collapsed: true,
        items: [{ text: 'intro', link: '/examples/shared_files/intro' }],
      },
    ]);
  });
});
