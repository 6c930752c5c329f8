import type { Types } from 'mongoose';
import type { LessonView } from './lessonTypes.js';

export const COURSE_STATUSES = ['DRAFT', 'PUBLISHED'] as const;
export type CourseStatus = (typeof COURSE_STATUSES)[number];

// === Persistence shape ===

export interface ICourse {
  _id: Types.ObjectId;
  title: string;
  slug: string;
  description: string;
  status: CourseStatus;
  publishedAt?: Date | null;
  lessonsCount: number;
  totalDurationHours: number;
  /** Bumped by every committed lesson batch; guards concurrent reorders. */
  lessonsRevision: number;
  createdAt: Date;
  updatedAt: Date;
}

// === Domain ===

export interface CourseStats {
  lessonsCount: number;
  totalDurationHours: number;
}

export interface Course extends CourseStats {
  id: string;
  title: string;
  slug: string;
  description: string;
  status: CourseStatus;
  publishedAt: Date | null;
  lessonsRevision: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Reference to a course embedded in other resources. */
export type CourseSummary = Pick<Course, 'id' | 'title' | 'slug'>;

/** Catalog entry flagged with whether the viewer can open the course content. */
export interface CourseListItem extends Course {
  isEnrolled: boolean;
}

export interface NewCourse {
  title: string;
  slug: string;
  description: string;
}

export interface CourseChanges {
  title?: string;
  description?: string;
  status?: CourseStatus;
  publishedAt?: Date;
}

export interface CourseFilter {
  status?: CourseStatus;
}

/** Course page payload: the course, its ordered lessons and the viewer's enrollment flag. */
export interface CourseDetail {
  course: Course;
  lessons: LessonView[];
  isEnrolled: boolean;
}
