import type { CourseStats } from '../types/courseTypes.js';

/** Decimal places kept on `totalDurationHours`. */
export const DURATION_HOURS_PRECISION = 2;

const roundTo = (value: number, places: number) => {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
};

/**
 * Derives course stats from the full lesson set. Always a recompute over the
 * lessons currently owned by the course, never an adjustment of stored values.
 */
export const computeCourseStats = (lessons: ReadonlyArray<{ durationSeconds: number }>): CourseStats => {
  const totalSeconds = lessons.reduce((sum, lesson) => sum + (lesson.durationSeconds || 0), 0);

  return {
    lessonsCount: lessons.length,
    totalDurationHours: roundTo(totalSeconds / 3600, DURATION_HOURS_PRECISION),
  };
};
