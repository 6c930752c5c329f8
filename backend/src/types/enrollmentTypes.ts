import type { Types } from 'mongoose';
import type { CourseSummary } from './courseTypes.js';

export const ENROLLMENT_STATES = ['ACTIVE', 'EXPIRED', 'COMPLETED'] as const;
export type EnrollmentState = (typeof ENROLLMENT_STATES)[number];

/**
 * Main Enrollment Document shape.
 * `activeKey` is only set while the enrollment may still be ACTIVE; a unique
 * index on it keeps one open enrollment per student/course pair.
 */
export interface IEnrollment {
  _id: Types.ObjectId;
  student: Types.ObjectId;
  course: Types.ObjectId;
  enrolledAt: Date;
  expiresAt: Date;
  completedAt?: Date | null;
  lastAccessedLesson?: Types.ObjectId | null;
  lastVideoPositionSeconds: number;
  lastAccessedAt?: Date | null;
  notes?: string | null;
  createdBy?: Types.ObjectId | null;
  activeKey?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Enrollment {
  id: string;
  studentId: string;
  courseId: string;
  enrolledAt: Date;
  expiresAt: Date;
  completedAt: Date | null;
  lastAccessedLessonId: string | null;
  lastVideoPositionSeconds: number;
  lastAccessedAt: Date | null;
  notes: string | null;
  createdBy: string | null;
}

/** Enrollment annotated with its state at the time of the read and its course. */
export interface EnrollmentView extends Enrollment {
  state: EnrollmentState;
  course: CourseSummary | null;
}

export interface NewEnrollment {
  studentId: string;
  courseId: string;
  enrolledAt: Date;
  expiresAt: Date;
  notes: string | null;
  createdBy: string | null;
}

export interface EnrollmentFilter {
  studentId?: string;
  courseId?: string;
}

export interface ProgressUpdate {
  lessonId: string;
  positionSeconds: number;
  accessedAt: Date;
}

/** Acknowledgment returned after a progress write. */
export interface ProgressAck {
  enrollmentId: string;
  lastAccessedLessonId: string;
  lastVideoPositionSeconds: number;
  lastAccessedAt: Date;
}

/** DTOs for API validation (Zod) */
export interface CreateEnrollmentInput {
  studentId: string;
  courseId: string;
  notes?: string;
}

export interface UpdateProgressInput {
  lessonId: string;
  positionSeconds: number;
}
