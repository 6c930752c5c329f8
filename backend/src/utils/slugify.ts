/** URL slug from a title: lowercase ASCII words joined by dashes. */
export const slugify = (title: string): string => {
  const slug = title
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
  return slug || 'course';
};

/** First free slug among `base`, `base-2`, `base-3`, ... */
export const ensureUniqueSlug = async (base: string, exists: (slug: string) => Promise<boolean>): Promise<string> => {
  let candidate = base;
  for (let suffix = 2; await exists(candidate); suffix += 1) {
    candidate = `${base}-${suffix}`;
  }
  return candidate;
};
