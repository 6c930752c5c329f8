import { ensureUniqueSlug, slugify } from '../../src/utils/slugify.js';

describe('slugify', () => {
  it('should lowercase and dash-join words', () => {
    expect(slugify('  Intro to TypeScript: Part 1! ')).toBe('intro-to-typescript-part-1');
  });

  it('should strip accents', () => {
    expect(slugify('Café Crème')).toBe('cafe-creme');
  });

  it('should fall back when nothing is left', () => {
    expect(slugify('!!!')).toBe('course');
  });

  it('should append a counter until the slug is free', async () => {
    const taken = new Set(['web', 'web-2']);
    await expect(ensureUniqueSlug('web', async (slug) => taken.has(slug))).resolves.toBe('web-3');
    await expect(ensureUniqueSlug('api', async (slug) => taken.has(slug))).resolves.toBe('api');
  });
});
