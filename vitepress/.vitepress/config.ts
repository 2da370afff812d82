import { defineConfig } from 'vitepress';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULTS } from '../../lib/config';
import { buildSidebarItems } from '../../lib/sidebar';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const markdownDir = path.resolve(__dirname, '../..', DEFAULTS.markdownDir);

const sidebar = fs.existsSync(markdownDir) ? buildSidebarItems(markdownDir, '/') : [];

// Local preview of the rendered notebooks before they are published.
export default defineConfig({
  title: 'Examples',
  description: 'Rendered example notebooks',
  srcDir: `../${DEFAULTS.markdownDir}`,
  themeConfig: {
    search: {
      provider: 'local',
    },
    sidebar,
    nav: [
      { text: 'Examples', link: sidebar[0]?.link ?? '/' },
    ],
  },
});
