import type { EnrollmentRepository, LessonRepository } from '../repositories/types.js';
import type { AuthUser } from '../types/authTypes.js';
import type { Clock } from '../types/commonTypes.js';
import type { ProgressAck, UpdateProgressInput } from '../types/enrollmentTypes.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../utils/AppError.js';
import { getEnrollmentState } from '../utils/enrollmentState.js';

interface ProgressServiceDeps {
  enrollments: EnrollmentRepository;
  lessons: LessonRepository;
  clock: Clock;
}

export const createProgressService = ({ enrollments, lessons, clock }: ProgressServiceDeps) => {
  /**
   * Records where the student stopped watching. Players call this every
   * 10-30 seconds; each call overwrites the previous position (last write wins).
   */
  const updateProgress = async (
    enrollmentId: string,
    input: UpdateProgressInput,
    viewer: AuthUser
  ): Promise<ProgressAck> => {
    if (!Number.isFinite(input.positionSeconds) || input.positionSeconds < 0) {
      throw ValidationError.forField('positionSeconds', 'Video position must be a non-negative number');
    }

    const enrollment = await enrollments.findById(enrollmentId);
    if (!enrollment) throw new NotFoundError('Enrollment not found');
    if (enrollment.studentId !== viewer.id) {
      throw new ForbiddenError('You can only update your own progress');
    }

    const now = clock();
    if (getEnrollmentState(enrollment, now) === 'EXPIRED') {
      throw new ForbiddenError('Your enrollment in this course has expired');
    }

    const lesson = await lessons.findById(input.lessonId);
    if (!lesson || lesson.courseId !== enrollment.courseId) {
      throw new NotFoundError('Lesson not found in this course');
    }

    const updated = await enrollments.updateProgress(enrollmentId, {
      lessonId: lesson.id,
      positionSeconds: input.positionSeconds,
      accessedAt: now,
    });
    if (!updated) throw new NotFoundError('Enrollment not found');

    return {
      enrollmentId: updated.id,
      lastAccessedLessonId: lesson.id,
      lastVideoPositionSeconds: updated.lastVideoPositionSeconds,
      lastAccessedAt: now,
    };
  };

  return { updateProgress };
};

export type ProgressService = ReturnType<typeof createProgressService>;
