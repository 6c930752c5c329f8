import { createEnrollmentService } from '../../src/service/enrollmentService.js';
import { ConflictError, ForbiddenError, InvalidStateError, NotFoundError } from '../../src/utils/AppError.js';
import { createInMemoryRepositories } from '../support/inMemoryRepositories.js';
import { ADMIN, OTHER_STUDENT, STUDENT, createTestClock } from '../support/testHelpers.js';

const setup = async (allowCompletionAfterExpiry = true) => {
  const repos = createInMemoryRepositories();
  const time = createTestClock('2025-01-01T00:00:00Z');
  const service = createEnrollmentService({
    courses: repos.courses,
    enrollments: repos.enrollments,
    clock: time.clock,
    options: { allowCompletionAfterExpiry },
  });
  const course = await repos.courses.create({ title: 'Databases', slug: 'databases', description: '' });
  return { repos, service, time, courseId: course.id };
};

describe('EnrollmentService', () => {
  describe('createEnrollment', () => {
    it('should enroll for one calendar year', async () => {
      const { service, courseId } = await setup();

      const enrollment = await service.createEnrollment({ studentId: STUDENT.id, courseId, notes: 'Paid in cash' }, ADMIN);

      expect(enrollment).toMatchObject({
        studentId: STUDENT.id,
        courseId,
        state: 'ACTIVE',
        notes: 'Paid in cash',
        createdBy: ADMIN.id,
        completedAt: null,
        lastVideoPositionSeconds: 0,
      });
      expect(enrollment.enrolledAt.toISOString()).toBe('2025-01-01T00:00:00.000Z');
      expect(enrollment.expiresAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    });

    it('should report the enrollment as expired the day after expiry', async () => {
      const { service, courseId, time } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      time.set('2026-01-02T00:00:00Z');

      await expect(service.getEnrollment(id, STUDENT)).resolves.toMatchObject({ state: 'EXPIRED' });
    });

    it('should reject a second enrollment while the first is active', async () => {
      const { service, courseId } = await setup();
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      await expect(service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN)).rejects.toBeInstanceOf(
        ConflictError
      );
    });

    it('should allow re-enrolling once the previous enrollment expired', async () => {
      const { service, courseId, time } = await setup();
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2026-03-01T00:00:00Z');

      const renewed = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      expect(renewed.state).toBe('ACTIVE');
      expect(renewed.expiresAt.toISOString()).toBe('2027-03-01T00:00:00.000Z');
    });

    it('should allow re-enrolling after completion', async () => {
      const { service, courseId } = await setup();
      const first = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      await service.completeEnrollment(first.id, STUDENT);

      await expect(service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN)).resolves.toMatchObject({
        state: 'ACTIVE',
      });
    });

    it('should reject unknown courses', async () => {
      const { service } = await setup();
      await expect(
        service.createEnrollment({ studentId: STUDENT.id, courseId: 'a00000000000000000000099' }, ADMIN)
      ).rejects.toThrow('Course not found');
    });
  });

  describe('completeEnrollment', () => {
    it('should complete an active enrollment', async () => {
      const { service, courseId, time } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2025-06-01T12:00:00Z');

      const completed = await service.completeEnrollment(id, STUDENT);

      expect(completed.state).toBe('COMPLETED');
      expect(completed.completedAt?.toISOString()).toBe('2025-06-01T12:00:00.000Z');
    });

    it('should reject completing twice', async () => {
      const { service, courseId } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      await service.completeEnrollment(id, STUDENT);

      await expect(service.completeEnrollment(id, STUDENT)).rejects.toThrow('Enrollment is already completed');
    });

    it('should complete an expired enrollment when the policy allows it', async () => {
      const { service, courseId, time } = await setup(true);
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2026-02-01T00:00:00Z');

      await expect(service.completeEnrollment(id, STUDENT)).resolves.toMatchObject({ state: 'COMPLETED' });
    });

    it('should refuse completing an expired enrollment when the policy forbids it', async () => {
      const { service, courseId, time } = await setup(false);
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2026-02-01T00:00:00Z');

      await expect(service.completeEnrollment(id, STUDENT)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('should refuse other students', async () => {
      const { service, courseId } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      await expect(service.completeEnrollment(id, OTHER_STUDENT)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('extendEnrollment', () => {
    it('should reactivate an expired enrollment', async () => {
      const { service, courseId, time } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2026-01-10T00:00:00Z');

      const extended = await service.extendEnrollment(id, 30);

      expect(extended.expiresAt.toISOString()).toBe('2026-01-31T00:00:00.000Z');
      expect(extended.state).toBe('ACTIVE');
    });

    it('should refuse extending a completed enrollment', async () => {
      const { service, courseId } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      await service.completeEnrollment(id, ADMIN);

      await expect(service.extendEnrollment(id, 10)).rejects.toThrow('Completed enrollments cannot be extended');
    });

    it('should refuse reviving an enrollment when a newer one is active', async () => {
      const { service, courseId, time } = await setup();
      const old = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2026-02-01T00:00:00Z');
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      await expect(service.extendEnrollment(old.id, 60)).rejects.toBeInstanceOf(ConflictError);
    });

    it('should report missing enrollments', async () => {
      const { service } = await setup();
      await expect(service.extendEnrollment('a00000000000000000000099', 10)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('course summaries', () => {
    it('should embed the course in a created enrollment', async () => {
      const { service, courseId } = await setup();

      const enrollment = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      expect(enrollment.course).toEqual({ id: courseId, title: 'Databases', slug: 'databases' });
    });

    it('should embed courses in listings with one course read', async () => {
      const { service, courseId, repos, time } = await setup();
      const other = await repos.courses.create({ title: 'Networks', slug: 'networks', description: '' });
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2025-02-01T00:00:00Z');
      await service.createEnrollment({ studentId: STUDENT.id, courseId: other.id }, ADMIN);
      const findByIds = jest.spyOn(repos.courses, 'findByIds');

      const mine = await service.getMyEnrollments(STUDENT.id);

      expect(mine.map((e) => e.course)).toEqual([
        { id: other.id, title: 'Networks', slug: 'networks' },
        { id: courseId, title: 'Databases', slug: 'databases' },
      ]);
      expect(findByIds).toHaveBeenCalledTimes(1);
    });

    it('should leave the summary empty when the course is gone', async () => {
      const { service, courseId, repos } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      await repos.courses.deleteCascade(courseId);

      await expect(service.getEnrollment(id, STUDENT)).resolves.toMatchObject({ id, course: null });
    });
  });

  describe('listing', () => {
    it('should filter by computed state', async () => {
      const { service, courseId, repos, time } = await setup();
      const other = await repos.courses.create({ title: 'Networks', slug: 'networks', description: '' });
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2025-08-01T00:00:00Z');
      await service.createEnrollment({ studentId: STUDENT.id, courseId: other.id }, ADMIN);
      time.set('2026-02-01T00:00:00Z');

      const expired = await service.listEnrollments({ state: 'EXPIRED' });
      const active = await service.listEnrollments({ state: 'ACTIVE' });

      expect(expired.map((e) => e.courseId)).toEqual([courseId]);
      expect(active.map((e) => e.courseId)).toEqual([other.id]);
    });

    it('should list a student own enrollments newest first', async () => {
      const { service, courseId, repos, time } = await setup();
      const other = await repos.courses.create({ title: 'Networks', slug: 'networks', description: '' });
      await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
      time.set('2025-02-01T00:00:00Z');
      await service.createEnrollment({ studentId: STUDENT.id, courseId: other.id }, ADMIN);
      await service.createEnrollment({ studentId: OTHER_STUDENT.id, courseId }, ADMIN);

      const mine = await service.getMyEnrollments(STUDENT.id);

      expect(mine.map((e) => e.courseId)).toEqual([other.id, courseId]);
    });

    it('should hide enrollments from other students', async () => {
      const { service, courseId } = await setup();
      const { id } = await service.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);

      await expect(service.getEnrollment(id, OTHER_STUDENT)).rejects.toThrow('You do not have access to this enrollment');
      await expect(service.getEnrollment(id, ADMIN)).resolves.toMatchObject({ id });
    });
  });
});
