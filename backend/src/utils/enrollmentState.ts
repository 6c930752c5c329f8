import type { Enrollment, EnrollmentState } from '../types/enrollmentTypes.js';
import { InvalidStateError } from './AppError.js';

export const ENROLLMENT_TERM_YEARS = 1;

/**
 * Expiry of an enrollment starting at `enrolledAt`: the same UTC instant one
 * calendar year later. Feb 29 rolls over to Mar 1.
 */
export const computeExpiry = (enrolledAt: Date, years = ENROLLMENT_TERM_YEARS): Date => {
  const expiresAt = new Date(enrolledAt.getTime());
  expiresAt.setUTCFullYear(expiresAt.getUTCFullYear() + years);
  return expiresAt;
};

export const addDays = (date: Date, days: number): Date => new Date(date.getTime() + days * 24 * 60 * 60 * 1000);

/**
 * State as of `now`. Expiry is never stored: an enrollment becomes EXPIRED
 * purely by the clock passing `expiresAt`. Completion is terminal.
 */
export const getEnrollmentState = (
  enrollment: Pick<Enrollment, 'expiresAt' | 'completedAt'>,
  now: Date
): EnrollmentState => {
  if (enrollment.completedAt) return 'COMPLETED';
  return now.getTime() >= enrollment.expiresAt.getTime() ? 'EXPIRED' : 'ACTIVE';
};

/** ACTIVE and COMPLETED enrollments unlock full lesson content. */
export const grantsContentAccess = (state: EnrollmentState): boolean => state !== 'EXPIRED';

export interface CompletionPolicy {
  allowCompletionAfterExpiry: boolean;
}

export const assertCanComplete = (state: EnrollmentState, policy: CompletionPolicy): void => {
  if (state === 'COMPLETED') {
    throw new InvalidStateError('Enrollment is already completed');
  }
  if (state === 'EXPIRED' && !policy.allowCompletionAfterExpiry) {
    throw new InvalidStateError('Enrollment has expired and can no longer be completed');
  }
};

/** Uniqueness claim held by an enrollment that can still be ACTIVE. */
export const activeKeyFor = (studentId: string, courseId: string) => `${studentId}:${courseId}`;
