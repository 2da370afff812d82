import fs from 'fs';
import path from 'path';

export interface SidebarItem {
  text: string;
  link?: string;
  collapsed?: boolean;
  items?: SidebarItem[];
}

// nbconvert writes figures for `foo.ipynb` into `foo_files/`
function isFigureDir(dir: string, name: string): boolean {
  return name.endsWith('_files') && fs.existsSync(path.join(dir, name.replace(/_files$/, '.md')));
}

/** Sidebar entries for every rendered notebook under `dir`, directories first. */
export function buildSidebarItems(dir: string, urlBase = '/'): SidebarItem[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .filter(e =>
      e.name !== 'sidebar.ts' &&
      e.name !== 'index.md' &&
      e.name !== 'public' &&
      !(e.isDirectory() && isFigureDir(dir, e.name))
    )
    .sort((a, b) => {
      if (a.isDirectory() !== b.isDirectory()) return a.isDirectory() ? -1 : 1;
      return a.name.localeCompare(b.name);
    });

  return entries.flatMap((entry): SidebarItem[] => {
    const urlPath = `${urlBase}${entry.name}`;

    if (entry.isDirectory()) {
      return [{
        text:      entry.name,
        collapsed: true,
        items:     buildSidebarItems(path.join(dir, entry.name), urlPath + '/'),
      }];
    }

    if (entry.name.endsWith('.md')) {
      return [{
        text: entry.name.replace(/\.md$/, '').replace(/[-_]/g, ' '),
        link: urlPath.replace(/\.md$/, ''),
      }];
    }

    return [];
  });
}
