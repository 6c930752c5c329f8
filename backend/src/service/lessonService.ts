import {
  StaleRevisionError,
  type CourseRepository,
  type LessonBatch,
  type LessonBatchResult,
  type LessonRepository,
  type MaterialRepository,
} from '../repositories/types.js';
import type { AuthUser } from '../types/authTypes.js';
import type { OrderedItem } from '../types/commonTypes.js';
import type { Course } from '../types/courseTypes.js';
import type { CreateLessonInput, Lesson, LessonView, UpdateLessonInput } from '../types/lessonTypes.js';
import type { Material } from '../types/materialTypes.js';
import { AppError, NotFoundError } from '../utils/AppError.js';
import { computeCourseStats } from '../utils/courseStats.js';
import { changedOrders, insertAtEnd, moveTo, remove, renumber } from '../utils/lessonOrdering.js';
import type { AccessService } from './accessService.js';
import { buildLessonViews } from './lessonViews.js';

export interface LessonServiceDeps {
  courses: CourseRepository;
  lessons: LessonRepository;
  materials: MaterialRepository;
  access: AccessService;
  options: { lessonBatchMaxRetries: number };
}

export interface LessonMutation {
  lesson: Lesson;
  course: Course;
}

type BatchPlan = Omit<LessonBatch, 'courseId' | 'expectedRevision'>;

// Placeholder id of the lesson being inserted while its position is computed
const PENDING_LESSON_ID = '__pending__';

export const createLessonService = ({ courses, lessons, materials, access, options }: LessonServiceDeps) => {
  /**
   * Reads the course's lessons, plans the batch and commits it against the
   * revision that was read. A concurrent batch on the same course makes the
   * commit stale; the plan is then recomputed from fresh data.
   */
  const runBatch = async (courseId: string, plan: (current: Lesson[]) => BatchPlan): Promise<LessonBatchResult> => {
    for (let attempt = 0; ; attempt += 1) {
      const course = await courses.findById(courseId);
      if (!course) throw new NotFoundError('Course not found');

      const current = await lessons.listByCourse(courseId);
      const batch: LessonBatch = { courseId, expectedRevision: course.lessonsRevision, ...plan(current) };

      try {
        return await lessons.commit(batch);
      } catch (err) {
        if (err instanceof StaleRevisionError && attempt < options.lessonBatchMaxRetries) continue;
        throw err;
      }
    }
  };

  const findLesson = async (lessonId: string): Promise<Lesson> => {
    const lesson = await lessons.findById(lessonId);
    if (!lesson) throw new NotFoundError('Lesson not found');
    return lesson;
  };

  const pickLesson = (result: LessonBatchResult, lessonId: string): LessonMutation => {
    const lesson = result.lessons.find((candidate) => candidate.id === lessonId);
    if (!lesson) throw new NotFoundError('Lesson not found');
    return { lesson, course: result.course };
  };

  const assertCourseVisible = async (courseId: string, viewer?: AuthUser): Promise<Course> => {
    const course = await courses.findById(courseId);
    if (!course || (course.status !== 'PUBLISHED' && viewer?.role !== 'admin')) {
      throw new NotFoundError('Course not found');
    }
    return course;
  };

  /** Appends a lesson at the end of the course. */
  const createLesson = async (courseId: string, input: CreateLessonInput): Promise<LessonMutation> => {
    const durationSeconds = input.durationSeconds ?? 0;

    const result = await runBatch(courseId, (current) => {
      const draft = { id: PENDING_LESSON_ID, order: 0, durationSeconds };
      const sequence = insertAtEnd<OrderedItem & { durationSeconds: number }>(current, draft);
      const placed = sequence[sequence.length - 1];

      return {
        stats: computeCourseStats(sequence),
        reorder: changedOrders(current, sequence),
        insert: {
          courseId,
          title: input.title,
          summary: input.summary ?? '',
          videoUrl: input.videoUrl ?? null,
          durationSeconds,
          isPreview: input.isPreview ?? false,
          order: placed.order,
        },
      };
    });

    if (!result.inserted) throw AppError.internal('Lesson was not created');
    return { lesson: result.inserted, course: result.course };
  };

  const updateLesson = async (lessonId: string, input: UpdateLessonInput): Promise<LessonMutation> => {
    const lesson = await findLesson(lessonId);

    const result = await runBatch(lesson.courseId, (current) => {
      if (!current.some((candidate) => candidate.id === lessonId)) throw new NotFoundError('Lesson not found');
      const next = current.map((candidate) =>
        candidate.id === lessonId
          ? { ...candidate, durationSeconds: input.durationSeconds ?? candidate.durationSeconds }
          : candidate
      );
      return { stats: computeCourseStats(next), update: { id: lessonId, changes: input } };
    });

    return pickLesson(result, lessonId);
  };

  /** Moves a lesson and returns the course's full renumbered sequence. */
  const reorderLesson = async (lessonId: string, newOrder: unknown): Promise<Lesson[]> => {
    const lesson = await findLesson(lessonId);

    const result = await runBatch(lesson.courseId, (current) => {
      const sequence = moveTo(current, lessonId, newOrder);
      return { stats: computeCourseStats(sequence), reorder: changedOrders(current, sequence) };
    });

    return result.lessons;
  };

  /** Deletes a lesson (with its materials) and closes the gap it leaves. */
  const deleteLesson = async (lessonId: string): Promise<Lesson[]> => {
    const lesson = await findLesson(lessonId);

    const result = await runBatch(lesson.courseId, (current) => {
      const sequence = remove(current, lessonId);
      return { stats: computeCourseStats(sequence), removeId: lessonId, reorder: changedOrders(current, sequence) };
    });

    return result.lessons;
  };

  /** Re-derives the stored stats (and repairs any ordering gap) from the lessons on record. */
  const recomputeCourseStats = async (courseId: string): Promise<Course> => {
    const result = await runBatch(courseId, (current) => ({
      stats: computeCourseStats(current),
      reorder: changedOrders(current, renumber(current)),
    }));
    return result.course;
  };

  const getLessonsByCourse = async (courseId: string, viewer?: AuthUser): Promise<LessonView[]> => {
    await assertCourseVisible(courseId, viewer);

    const [list, courseAccess] = await Promise.all([
      lessons.listByCourse(courseId),
      access.resolveCourseAccess(viewer, courseId),
    ]);
    return buildLessonViews(materials, list, access.canViewContent(courseAccess));
  };

  const getLesson = async (lessonId: string, viewer?: AuthUser): Promise<LessonView> => {
    const lesson = await findLesson(lessonId);
    await assertCourseVisible(lesson.courseId, viewer);

    const courseAccess = await access.resolveCourseAccess(viewer, lesson.courseId);
    access.assertLessonAccess(lesson, courseAccess);

    const [view] = await buildLessonViews(materials, [lesson], access.canViewContent(courseAccess));
    if (!view) throw new NotFoundError('Lesson not found');
    return view;
  };

  const addMaterial = async (lessonId: string, input: { url: string; title?: string }): Promise<Material> => {
    const lesson = await findLesson(lessonId);
    return materials.create({
      lessonId: lesson.id,
      courseId: lesson.courseId,
      title: input.title ?? null,
      url: input.url,
    });
  };

  const deleteMaterial = async (materialId: string): Promise<void> => {
    const deleted = await materials.delete(materialId);
    if (!deleted) throw new NotFoundError('Material not found');
  };

  return {
    createLesson,
    updateLesson,
    reorderLesson,
    deleteLesson,
    recomputeCourseStats,
    getLessonsByCourse,
    getLesson,
    addMaterial,
    deleteMaterial,
  };
};

export type LessonService = ReturnType<typeof createLessonService>;
