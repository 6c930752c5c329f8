import { z } from 'zod';
import { COURSE_STATUSES } from '../types/courseTypes.js';

export const createCourseSchema = z.object({
  title: z.string().trim().min(5).max(150),
  description: z.string().trim().min(1).max(2000),
});

export const updateCourseSchema = z
  .object({
    title: z.string().trim().min(5).max(150).optional(),
    description: z.string().trim().min(1).max(2000).optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export const updateCourseStatusSchema = z.object({
  status: z.enum(COURSE_STATUSES),
});

export const slugParamSchema = z.object({
  slug: z
    .string()
    .trim()
    .min(1)
    .max(200)
    .regex(/^[a-z0-9-]+$/, 'Invalid course slug'),
});
