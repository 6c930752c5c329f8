import type { Course, CourseChanges, CourseFilter, CourseStats, NewCourse } from '../types/courseTypes.js';
import type { Enrollment, EnrollmentFilter, NewEnrollment, ProgressUpdate } from '../types/enrollmentTypes.js';
import type { Lesson, NewLesson, UpdateLessonInput } from '../types/lessonTypes.js';
import type { Material, NewMaterial } from '../types/materialTypes.js';
import type { OrderedItem } from '../types/commonTypes.js';
import { ConflictError } from '../utils/AppError.js';

/**
 * Raised when a lesson batch was computed against a course revision that
 * another batch has since replaced. Callers re-read and retry.
 */
export class StaleRevisionError extends ConflictError {
  constructor(courseId: string) {
    super(`Lessons of course ${courseId} were modified concurrently, please retry`);
  }
}

/**
 * One all-or-nothing change to a course's lessons. The repository applies
 * every part together with the stats and bumps the course revision, or
 * applies nothing.
 */
export interface LessonBatch {
  courseId: string;
  expectedRevision: number;
  stats: CourseStats;
  insert?: NewLesson;
  update?: { id: string; changes: UpdateLessonInput };
  /** Deletes the lesson and its materials. */
  removeId?: string;
  /** New positions of existing lessons whose order changes. */
  reorder?: OrderedItem[];
}

export interface LessonBatchResult {
  course: Course;
  /** Lessons of the course after the batch, ascending by order. */
  lessons: Lesson[];
  inserted: Lesson | null;
}

export interface CourseRepository {
  findById(id: string): Promise<Course | null>;
  findByIds(ids: string[]): Promise<Course[]>;
  findBySlug(slug: string): Promise<Course | null>;
  slugExists(slug: string): Promise<boolean>;
  list(filter: CourseFilter): Promise<Course[]>;
  create(data: NewCourse): Promise<Course>;
  update(id: string, changes: CourseChanges): Promise<Course | null>;
  /** Deletes the course with its lessons and materials. */
  deleteCascade(id: string): Promise<boolean>;
}

export interface LessonRepository {
  findById(id: string): Promise<Lesson | null>;
  /** Ascending by order. */
  listByCourse(courseId: string): Promise<Lesson[]>;
  /** Throws StaleRevisionError when `expectedRevision` is no longer current. */
  commit(batch: LessonBatch): Promise<LessonBatchResult>;
}

export interface MaterialRepository {
  listByLessons(lessonIds: string[]): Promise<Material[]>;
  create(data: NewMaterial): Promise<Material>;
  delete(id: string): Promise<boolean>;
}

export interface EnrollmentRepository {
  findById(id: string): Promise<Enrollment | null>;
  /** Newest first. */
  list(filter: EnrollmentFilter): Promise<Enrollment[]>;
  /**
   * Inserts an enrollment holding the pair's active slot. Expired or completed
   * holders (as of `now`) release the slot first; if a live enrollment still
   * holds it the insert fails with ConflictError, atomically with the write.
   */
  createExclusive(data: NewEnrollment, now: Date): Promise<Enrollment>;
  /** Sets `completedAt` only if still unset; null when it already was. */
  markCompleted(id: string, completedAt: Date): Promise<Enrollment | null>;
  /** Moves `expiresAt` and re-claims the active slot (ConflictError if taken). */
  extend(id: string, expiresAt: Date, now: Date): Promise<Enrollment | null>;
  updateProgress(id: string, progress: ProgressUpdate): Promise<Enrollment | null>;
}

export interface Repositories {
  courses: CourseRepository;
  lessons: LessonRepository;
  materials: MaterialRepository;
  enrollments: EnrollmentRepository;
}
