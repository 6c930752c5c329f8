// schemas/enrollmentValidator.ts
import { z } from 'zod';
import { ENROLLMENT_STATES, type CreateEnrollmentInput, type UpdateProgressInput } from '../types/enrollmentTypes.js';
import { objectIdSchema } from './commonSchemas.js';

/**
 * Create Enrollment Schema (admin)
 */
export const createEnrollmentSchema = z.object({
  studentId: objectIdSchema('student'),
  courseId: objectIdSchema('course'),
  notes: z.string().trim().max(500).optional(),
}) satisfies z.ZodType<CreateEnrollmentInput>;

/**
 * Update Progress Schema
 * - lessonId: valid ObjectId string
 * - positionSeconds: playback position, never negative
 */
export const updateProgressSchema = z.object({
  lessonId: objectIdSchema('lesson'),
  positionSeconds: z.number().finite().min(0, 'Video position cannot be negative'),
}) satisfies z.ZodType<UpdateProgressInput>;

export const extendEnrollmentSchema = z.object({
  additionalDays: z.number().int().min(1).max(3650),
});

/**
 * Query Schema for the admin listing
 */
export const enrollmentQuerySchema = z.object({
  studentId: objectIdSchema('student').optional(),
  courseId: objectIdSchema('course').optional(),
  state: z.enum(ENROLLMENT_STATES).optional(),
});
