import type {
  CourseRepository,
  EnrollmentRepository,
  LessonRepository,
  MaterialRepository,
} from '../repositories/types.js';
import type { AuthUser } from '../types/authTypes.js';
import type { Clock } from '../types/commonTypes.js';
import type { Course, CourseChanges, CourseDetail, CourseListItem, CourseStatus } from '../types/courseTypes.js';
import { NotFoundError } from '../utils/AppError.js';
import { getEnrollmentState, grantsContentAccess } from '../utils/enrollmentState.js';
import { ensureUniqueSlug, slugify } from '../utils/slugify.js';
import type { AccessService } from './accessService.js';
import { buildLessonViews } from './lessonViews.js';

export interface CourseServiceDeps {
  courses: CourseRepository;
  lessons: LessonRepository;
  materials: MaterialRepository;
  enrollments: EnrollmentRepository;
  access: AccessService;
  clock: Clock;
}

const isAdmin = (viewer?: AuthUser) => viewer?.role === 'admin';

export const createCourseService = ({ courses, lessons, materials, enrollments, access, clock }: CourseServiceDeps) => {
  const findCourse = async (id: string): Promise<Course> => {
    const course = await courses.findById(id);
    if (!course) throw new NotFoundError('Course not found');
    return course;
  };

  /** Course ids whose content the viewer can open, from a single enrollment read. */
  const accessibleCourseIds = async (viewer: AuthUser): Promise<Set<string>> => {
    const now = clock();
    const owned = await enrollments.list({ studentId: viewer.id });
    return new Set(
      owned
        .filter((enrollment) => grantsContentAccess(getEnrollmentState(enrollment, now)))
        .map((enrollment) => enrollment.courseId)
    );
  };

  /** Published courses, each flagged with `isEnrolled`; admins also see drafts. */
  const listCourses = async (viewer?: AuthUser): Promise<CourseListItem[]> => {
    const list = await courses.list(isAdmin(viewer) ? {} : { status: 'PUBLISHED' });
    if (!viewer) return list.map((course) => ({ ...course, isEnrolled: false }));
    if (isAdmin(viewer)) return list.map((course) => ({ ...course, isEnrolled: true }));

    const enrolledIds = await accessibleCourseIds(viewer);
    return list.map((course) => ({ ...course, isEnrolled: enrolledIds.has(course.id) }));
  };

  /**
   * Course page: the course with its ordered lessons. Lesson content is only
   * included when the viewer's enrollment grants access.
   */
  const getCourseBySlug = async (slug: string, viewer?: AuthUser): Promise<CourseDetail> => {
    const course = await courses.findBySlug(slug);
    if (!course || (course.status !== 'PUBLISHED' && !isAdmin(viewer))) {
      throw new NotFoundError('Course not found');
    }

    const [list, courseAccess] = await Promise.all([
      lessons.listByCourse(course.id),
      access.resolveCourseAccess(viewer, course.id),
    ]);
    const canView = access.canViewContent(courseAccess);

    return {
      course,
      lessons: await buildLessonViews(materials, list, canView),
      isEnrolled: canView,
    };
  };

  /** New courses start as DRAFT with a unique slug derived from the title. */
  const createCourse = async (input: { title: string; description: string }): Promise<Course> => {
    const slug = await ensureUniqueSlug(slugify(input.title), (candidate) => courses.slugExists(candidate));
    return courses.create({ title: input.title, description: input.description, slug });
  };

  const applyChanges = async (id: string, changes: CourseChanges): Promise<Course> => {
    const updated = await courses.update(id, changes);
    if (!updated) throw new NotFoundError('Course not found');
    return updated;
  };

  const updateCourse = (id: string, input: { title?: string; description?: string }): Promise<Course> =>
    applyChanges(id, input);

  const updateStatus = async (id: string, status: CourseStatus): Promise<Course> => {
    const course = await findCourse(id);
    if (course.status === status) return course;

    const firstPublish = status === 'PUBLISHED' && !course.publishedAt;
    return applyChanges(id, firstPublish ? { status, publishedAt: clock() } : { status });
  };

  const deleteCourse = async (id: string): Promise<void> => {
    const deleted = await courses.deleteCascade(id);
    if (!deleted) throw new NotFoundError('Course not found');
  };

  return { listCourses, getCourseBySlug, createCourse, updateCourse, updateStatus, deleteCourse };
};

export type CourseService = ReturnType<typeof createCourseService>;
