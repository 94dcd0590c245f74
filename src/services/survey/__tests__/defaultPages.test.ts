import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatDefaultPagesForPrompt, loadDefaultPages, parseDefaultPageNames } from '../defaultPages.js';

describe('default pages', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'default-pages-'));
    await fs.writeFile(
      join(dir, 'introduction.json'),
      JSON.stringify({ name: 'introduction', title: 'Welcome', elements: [{ type: 'html', name: 'intro' }] })
    );
    await fs.writeFile(join(dir, 'consent.json'), JSON.stringify({ name: 'consent', elements: [] }));
    await fs.writeFile(join(dir, 'broken.json'), '{ "name": ');
    await fs.writeFile(join(dir, 'invalid.json'), JSON.stringify({ name: 'invalid' }));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseDefaultPageNames', () => {
    it('splits and trims a comma-separated list', () => {
      expect(parseDefaultPageNames(' introduction, consent ,')).toEqual(['introduction', 'consent']);
    });

    it('selects nothing for none in any case', () => {
      expect(parseDefaultPageNames('None')).toEqual([]);
      expect(parseDefaultPageNames('')).toEqual([]);
    });
  });

  it('loads pages in the requested order and skips unusable ones', async () => {
    const pages = await loadDefaultPages(['consent', 'missing', 'broken', 'invalid', 'introduction'], dir);

    expect(pages.map(page => page.name)).toEqual(['consent', 'introduction']);
    expect(pages[1]).toEqual({ name: 'introduction', title: 'Welcome', elements: [{ type: 'html', name: 'intro' }] });
  });

  it('renames pages by position for the prompt', async () => {
    const pages = await loadDefaultPages(['introduction', 'consent'], dir);

    const formatted = formatDefaultPagesForPrompt(pages);

    expect(JSON.parse(formatted)).toEqual([
      { name: 'page0', title: 'Welcome', elements: [{ type: 'html', name: 'intro' }] },
      { name: 'page1', elements: [] },
    ]);
    expect(formatted.startsWith('[\n  {\n    "name": "page0"')).toBe(true);
  });

  it('formats no pages as an empty string', () => {
    expect(formatDefaultPagesForPrompt([])).toBe('');
  });

  it('ships the bundled pages in a loadable form', async () => {
    const pages = await loadDefaultPages(['introduction', 'consent', 'instructions'], 'default_pages');
    expect(pages).toHaveLength(3);
  });
});
