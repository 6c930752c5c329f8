import { z } from 'zod';
import type { CreateLessonInput, UpdateLessonInput } from '../types/lessonTypes.js';
import { objectIdSchema } from './commonSchemas.js';

const httpUrl = z
  .string()
  .trim()
  .url('Must be a valid URL')
  .refine((v) => /^https?:\/\//i.test(v), 'URL must use http or https');

export const courseIdParamSchema = z.object({
  courseId: objectIdSchema('course'),
});

export const createLessonSchema = z.object({
  title: z.string().trim().min(3).max(200),
  summary: z.string().trim().max(5000).optional(),
  videoUrl: httpUrl.optional(),
  durationSeconds: z.number().int().min(0, 'Duration cannot be negative').optional(),
  isPreview: z.boolean().optional(),
}) satisfies z.ZodType<CreateLessonInput>;

export const updateLessonSchema = z
  .object({
    title: z.string().trim().min(3).max(200).optional(),
    summary: z.string().trim().max(5000).optional(),
    videoUrl: httpUrl.nullable().optional(),
    durationSeconds: z.number().int().min(0, 'Duration cannot be negative').optional(),
    isPreview: z.boolean().optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  }) satisfies z.ZodType<UpdateLessonInput>;

/** `order` may arrive as a number or as an integer string from form posts. */
export const reorderLessonSchema = z.object({
  order: z.union([
    z.number().int('Order must be an integer'),
    z
      .string()
      .trim()
      .regex(/^-?\d+$/, 'Order must be an integer')
      .transform((v) => Number.parseInt(v, 10)),
  ]),
});

export const createMaterialSchema = z.object({
  url: httpUrl,
  title: z.string().trim().min(1).max(200).optional(),
});

export const materialParamSchema = z.object({
  materialId: objectIdSchema('material'),
});
