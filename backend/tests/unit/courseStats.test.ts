import { computeCourseStats } from '../../src/utils/courseStats.js';

describe('computeCourseStats', () => {
  it('should return zero stats for a course without lessons', () => {
    expect(computeCourseStats([])).toEqual({ lessonsCount: 0, totalDurationHours: 0 });
  });

  it('should count lessons and sum durations in hours', () => {
    const stats = computeCourseStats([{ durationSeconds: 1800 }, { durationSeconds: 3600 }, { durationSeconds: 0 }]);
    expect(stats).toEqual({ lessonsCount: 3, totalDurationHours: 1.5 });
  });

  it('should round hours to two decimals', () => {
    // 1000 s = 0.2777... h
    expect(computeCourseStats([{ durationSeconds: 1000 }]).totalDurationHours).toBe(0.28);
    // 100 s = 0.02777... h
    expect(computeCourseStats([{ durationSeconds: 100 }]).totalDurationHours).toBe(0.03);
  });
});
