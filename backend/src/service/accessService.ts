import type { EnrollmentRepository } from '../repositories/types.js';
import type { AuthUser } from '../types/authTypes.js';
import type { Clock } from '../types/commonTypes.js';
import type { Lesson } from '../types/lessonTypes.js';
import { ForbiddenError } from '../utils/AppError.js';
import { getEnrollmentState, grantsContentAccess } from '../utils/enrollmentState.js';

export type CourseAccess = 'ADMIN' | 'ENROLLED' | 'EXPIRED' | 'NONE';

interface AccessServiceDeps {
  enrollments: EnrollmentRepository;
  clock: Clock;
}

/**
 * Access gate for lesson content. Evaluated at every read from the viewer's
 * enrollments and the current time.
 */
export const createAccessService = ({ enrollments, clock }: AccessServiceDeps) => {
  const resolveCourseAccess = async (viewer: AuthUser | undefined, courseId: string): Promise<CourseAccess> => {
    if (!viewer) return 'NONE';
    if (viewer.role === 'admin') return 'ADMIN';

    const now = clock();
    const owned = await enrollments.list({ studentId: viewer.id, courseId });
    if (owned.length === 0) return 'NONE';

    const granted = owned.some((enrollment) => grantsContentAccess(getEnrollmentState(enrollment, now)));
    return granted ? 'ENROLLED' : 'EXPIRED';
  };

  const canViewContent = (access: CourseAccess) => access === 'ADMIN' || access === 'ENROLLED';

  /** Preview lessons are public; everything else needs an ACTIVE or COMPLETED enrollment. */
  const assertLessonAccess = (lesson: Lesson, access: CourseAccess): void => {
    if (lesson.isPreview) return;

    if (access === 'EXPIRED') {
      throw new ForbiddenError('Your enrollment in this course has expired');
    }
    if (!canViewContent(access)) {
      throw new ForbiddenError('You must be enrolled in this course to access this lesson');
    }
  };

  return { resolveCourseAccess, canViewContent, assertLessonAccess };
};

export type AccessService = ReturnType<typeof createAccessService>;
