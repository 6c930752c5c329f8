import { z } from 'zod';

export const objectIdSchema = (label: string) => z.string().regex(/^[0-9a-fA-F]{24}$/, `Invalid ${label} ID format`);

export const idParamSchema = z.object({
  id: objectIdSchema('resource'),
});
