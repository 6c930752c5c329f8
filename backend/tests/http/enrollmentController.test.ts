import { createEnrollmentController } from '../../src/controllers/enrollmentController.js';
import { createEnrollmentService } from '../../src/service/enrollmentService.js';
import { createProgressService } from '../../src/service/progressService.js';
import { ConflictError } from '../../src/utils/AppError.js';
import { createInMemoryRepositories } from '../support/inMemoryRepositories.js';
import { ADMIN, STUDENT, createTestClock, mockNext, mockRequest, mockResponse } from '../support/testHelpers.js';

const setup = async () => {
  const repos = createInMemoryRepositories();
  const time = createTestClock('2025-01-01T00:00:00Z');
  const enrollmentService = createEnrollmentService({
    courses: repos.courses,
    enrollments: repos.enrollments,
    clock: time.clock,
    options: { allowCompletionAfterExpiry: true },
  });
  const progressService = createProgressService({ enrollments: repos.enrollments, lessons: repos.lessons, clock: time.clock });
  const course = await repos.courses.create({ title: 'SQL', slug: 'sql', description: '' });
  return { repos, time, enrollmentService, controller: createEnrollmentController(enrollmentService, progressService), courseId: course.id };
};

describe('EnrollmentController', () => {
  it('should enroll a student', async () => {
    const { controller, courseId } = await setup();
    const { res, asResponse } = mockResponse();

    await controller.createEnrollment(
      mockRequest({ body: { studentId: STUDENT.id, courseId }, user: ADMIN }),
      asResponse,
      mockNext()
    );

    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith({
      status: 'success',
      data: {
        enrollment: expect.objectContaining({
          studentId: STUDENT.id,
          state: 'ACTIVE',
          expiresAt: new Date('2026-01-01T00:00:00Z'),
        }),
      },
    });
  });

  it('should pass duplicate enrollments to the error handler', async () => {
    const { controller, courseId } = await setup();
    const body = { studentId: STUDENT.id, courseId };
    await controller.createEnrollment(mockRequest({ body, user: ADMIN }), mockResponse().asResponse, mockNext());
    const next = mockNext();

    await controller.createEnrollment(mockRequest({ body, user: ADMIN }), mockResponse().asResponse, next);

    expect(next.mock.calls[0]?.[0]).toBeInstanceOf(ConflictError);
  });

  it('should respond with the completion summary', async () => {
    const { controller, enrollmentService, courseId, time } = await setup();
    const { id } = await enrollmentService.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
    time.set('2025-09-09T09:00:00Z');
    const { res, asResponse } = mockResponse();

    await controller.completeEnrollment(mockRequest({ params: { id }, user: STUDENT }), asResponse, mockNext());

    expect(res.json).toHaveBeenCalledWith({
      status: 'success',
      message: 'Enrollment completed',
      data: { enrollmentId: id, completedAt: new Date('2025-09-09T09:00:00Z'), state: 'COMPLETED' },
    });
  });

  it('should reject negative progress positions at the boundary', async () => {
    const { controller, enrollmentService, courseId } = await setup();
    const { id } = await enrollmentService.createEnrollment({ studentId: STUDENT.id, courseId }, ADMIN);
    const next = mockNext();

    await controller.updateProgress(
      mockRequest({ params: { id }, body: { lessonId: 'a00000000000000000000099', positionSeconds: -5 }, user: STUDENT }),
      mockResponse().asResponse,
      next
    );

    expect(next.mock.calls[0]?.[0]).toMatchObject({
      issues: [expect.objectContaining({ path: ['positionSeconds'], message: 'Video position cannot be negative' })],
    });
  });
});
