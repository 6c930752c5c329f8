import type { CourseRepository, EnrollmentRepository } from '../repositories/types.js';
import type { AuthUser } from '../types/authTypes.js';
import type { Clock } from '../types/commonTypes.js';
import type {
  CreateEnrollmentInput,
  Enrollment,
  EnrollmentFilter,
  EnrollmentState,
  EnrollmentView,
} from '../types/enrollmentTypes.js';
import type { Course, CourseSummary } from '../types/courseTypes.js';
import { ForbiddenError, InvalidStateError, NotFoundError } from '../utils/AppError.js';
import { addDays, assertCanComplete, computeExpiry, getEnrollmentState } from '../utils/enrollmentState.js';

export interface EnrollmentServiceDeps {
  courses: CourseRepository;
  enrollments: EnrollmentRepository;
  clock: Clock;
  options: { allowCompletionAfterExpiry: boolean };
}

export const createEnrollmentService = ({ courses, enrollments, clock, options }: EnrollmentServiceDeps) => {
  const summarize = ({ id, title, slug }: Course): CourseSummary => ({ id, title, slug });

  const annotate = (enrollment: Enrollment, now: Date, course: Course | null): EnrollmentView => ({
    ...enrollment,
    state: getEnrollmentState(enrollment, now),
    course: course ? summarize(course) : null,
  });

  const annotateOne = async (enrollment: Enrollment, now: Date): Promise<EnrollmentView> =>
    annotate(enrollment, now, await courses.findById(enrollment.courseId));

  /** Attaches course summaries with one course lookup for the whole page. */
  const annotateAll = async (list: Enrollment[], now: Date): Promise<EnrollmentView[]> => {
    const courseIds = [...new Set(list.map((enrollment) => enrollment.courseId))];
    const byId = new Map((await courses.findByIds(courseIds)).map((course) => [course.id, course]));
    return list.map((enrollment) => annotate(enrollment, now, byId.get(enrollment.courseId) ?? null));
  };

  const findEnrollment = async (id: string): Promise<Enrollment> => {
    const enrollment = await enrollments.findById(id);
    if (!enrollment) throw new NotFoundError('Enrollment not found');
    return enrollment;
  };

  const assertOwnerOrAdmin = (enrollment: Enrollment, viewer: AuthUser) => {
    if (viewer.role !== 'admin' && enrollment.studentId !== viewer.id) {
      throw new ForbiddenError('You do not have access to this enrollment');
    }
  };

  /**
   * Enrolls a student for one year. Only administrators call this; a second
   * enrollment while one is ACTIVE is rejected by the repository's unique claim.
   */
  const createEnrollment = async (input: CreateEnrollmentInput, admin: AuthUser): Promise<EnrollmentView> => {
    const course = await courses.findById(input.courseId);
    if (!course) throw new NotFoundError('Course not found');

    const now = clock();
    const enrollment = await enrollments.createExclusive(
      {
        studentId: input.studentId,
        courseId: course.id,
        enrolledAt: now,
        expiresAt: computeExpiry(now),
        notes: input.notes ?? null,
        createdBy: admin.id,
      },
      now
    );
    return annotate(enrollment, now, course);
  };

  const getMyEnrollments = async (studentId: string): Promise<EnrollmentView[]> => {
    const now = clock();
    return annotateAll(await enrollments.list({ studentId }), now);
  };

  const listEnrollments = async (filter: EnrollmentFilter & { state?: EnrollmentState }): Promise<EnrollmentView[]> => {
    const now = clock();
    const { state, ...query } = filter;
    const all = await annotateAll(await enrollments.list(query), now);
    return state ? all.filter((enrollment) => enrollment.state === state) : all;
  };

  const getEnrollment = async (id: string, viewer: AuthUser): Promise<EnrollmentView> => {
    const enrollment = await findEnrollment(id);
    assertOwnerOrAdmin(enrollment, viewer);
    return annotateOne(enrollment, clock());
  };

  /** ACTIVE (or, by policy, EXPIRED) → COMPLETED. */
  const completeEnrollment = async (id: string, viewer: AuthUser): Promise<EnrollmentView> => {
    const enrollment = await findEnrollment(id);
    assertOwnerOrAdmin(enrollment, viewer);

    const now = clock();
    assertCanComplete(getEnrollmentState(enrollment, now), options);

    const completed = await enrollments.markCompleted(id, now);
    if (!completed) throw new InvalidStateError('Enrollment is already completed');
    return annotateOne(completed, now);
  };

  /** Pushes `expiresAt` back by whole days; an expired enrollment becomes ACTIVE again if it passes `now`. */
  const extendEnrollment = async (id: string, additionalDays: number): Promise<EnrollmentView> => {
    const enrollment = await findEnrollment(id);
    if (enrollment.completedAt) throw new InvalidStateError('Completed enrollments cannot be extended');

    const now = clock();
    const extended = await enrollments.extend(id, addDays(enrollment.expiresAt, additionalDays), now);
    if (!extended) throw new InvalidStateError('Completed enrollments cannot be extended');
    return annotateOne(extended, now);
  };

  return {
    createEnrollment,
    getMyEnrollments,
    listEnrollments,
    getEnrollment,
    completeEnrollment,
    extendEnrollment,
  };
};

export type EnrollmentService = ReturnType<typeof createEnrollmentService>;
