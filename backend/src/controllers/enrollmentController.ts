import type { Request, Response } from 'express';
import { requireUser } from '../middlewares/authMiddlewares.js';
import { idParamSchema } from '../schemas/commonSchemas.js';
import {
  createEnrollmentSchema,
  enrollmentQuerySchema,
  extendEnrollmentSchema,
  updateProgressSchema,
} from '../schemas/enrollmentValidator.js';
import type { EnrollmentService } from '../service/enrollmentService.js';
import type { ProgressService } from '../service/progressService.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export const createEnrollmentController = (enrollmentService: EnrollmentService, progressService: ProgressService) => ({
  /**
   * @desc Enroll a student in a course
   * @route POST /api/enrollments
   * @access Private (admin)
   */
  createEnrollment: asyncHandler(async (req: Request, res: Response) => {
    const admin = requireUser(req);
    const input = createEnrollmentSchema.parse(req.body);

    const enrollment = await enrollmentService.createEnrollment(input, admin);

    res.status(201).json({
      status: 'success',
      data: { enrollment },
    });
  }),

  /**
   * @desc Enrollments of the current user, each with its computed state
   * @route GET /api/enrollments/my
   * @access Private
   */
  getMyEnrollments: asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const enrollments = await enrollmentService.getMyEnrollments(user.id);

    res.status(200).json({
      status: 'success',
      results: enrollments.length,
      data: { enrollments },
    });
  }),

  /**
   * @desc All enrollments (admin only)
   * @route GET /api/enrollments
   * @access Private (admin)
   */
  getAllEnrollments: asyncHandler(async (req: Request, res: Response) => {
    const filter = enrollmentQuerySchema.parse(req.query);
    const enrollments = await enrollmentService.listEnrollments(filter);

    res.status(200).json({
      status: 'success',
      results: enrollments.length,
      data: { enrollments },
    });
  }),

  /**
   * @desc Single enrollment with its computed state
   * @route GET /api/enrollments/:id
   * @access Private (owner/admin)
   */
  getEnrollment: asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const { id } = idParamSchema.parse(req.params);
    const enrollment = await enrollmentService.getEnrollment(id, user);

    res.status(200).json({
      status: 'success',
      data: { enrollment },
    });
  }),

  /**
   * @desc Save the last watched lesson and playback position
   * @route PATCH /api/enrollments/:id/progress
   * @access Private (enrolled student)
   */
  updateProgress: asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const { id } = idParamSchema.parse(req.params);
    const input = updateProgressSchema.parse(req.body);

    const progress = await progressService.updateProgress(id, input, user);

    res.status(200).json({
      status: 'success',
      message: 'Progress saved',
      data: { progress },
    });
  }),

  /**
   * @desc Mark an enrollment as completed
   * @route POST /api/enrollments/:id/complete
   * @access Private (enrolled student/admin)
   */
  completeEnrollment: asyncHandler(async (req: Request, res: Response) => {
    const user = requireUser(req);
    const { id } = idParamSchema.parse(req.params);

    const enrollment = await enrollmentService.completeEnrollment(id, user);

    res.status(200).json({
      status: 'success',
      message: 'Enrollment completed',
      data: { enrollmentId: enrollment.id, completedAt: enrollment.completedAt, state: enrollment.state },
    });
  }),

  /**
   * @desc Extend the expiry date
   * @route PATCH /api/enrollments/:id/extend
   * @access Private (admin)
   */
  extendEnrollment: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const { additionalDays } = extendEnrollmentSchema.parse(req.body);

    const enrollment = await enrollmentService.extendEnrollment(id, additionalDays);

    res.status(200).json({
      status: 'success',
      data: { enrollment },
    });
  }),
});

export type EnrollmentController = ReturnType<typeof createEnrollmentController>;
