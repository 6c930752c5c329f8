import type { Request, Response } from 'express';
import { optionalUser } from '../middlewares/authMiddlewares.js';
import { idParamSchema } from '../schemas/commonSchemas.js';
import { createCourseSchema, slugParamSchema, updateCourseSchema, updateCourseStatusSchema } from '../schemas/courseSchemas.js';
import type { CourseService } from '../service/courseService.js';
import type { LessonService } from '../service/lessonService.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export const createCourseController = (courseService: CourseService, lessonService: LessonService) => ({
  /**
   * @desc Published courses (admins see drafts too)
   * @route GET /api/courses
   * @access Public
   */
  getAllCourses: asyncHandler(async (req: Request, res: Response) => {
    const courses = await courseService.listCourses(optionalUser(req));

    res.status(200).json({
      status: 'success',
      results: courses.length,
      data: { courses },
    });
  }),

  /**
   * @desc Course page with ordered lessons
   * @route GET /api/courses/:slug
   * @access Public
   */
  getCourseBySlug: asyncHandler(async (req: Request, res: Response) => {
    const { slug } = slugParamSchema.parse(req.params);
    const { course, lessons, isEnrolled } = await courseService.getCourseBySlug(slug, optionalUser(req));

    res.status(200).json({
      status: 'success',
      data: { course, lessons, isEnrolled },
    });
  }),

  /**
   * @desc Create new course (starts as DRAFT)
   * @route POST /api/courses
   * @access Private (Admin)
   */
  createCourse: asyncHandler(async (req: Request, res: Response) => {
    const input = createCourseSchema.parse(req.body);
    const course = await courseService.createCourse(input);

    res.status(201).json({
      status: 'success',
      data: { course },
    });
  }),

  /**
   * @desc Update title or description
   * @route PATCH /api/courses/:id
   * @access Private (Admin)
   */
  updateCourse: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const input = updateCourseSchema.parse(req.body);
    const course = await courseService.updateCourse(id, input);

    res.status(200).json({
      status: 'success',
      data: { course },
    });
  }),

  /**
   * @desc Publish or unpublish a course
   * @route PATCH /api/courses/:id/status
   * @access Private (Admin)
   */
  updateCourseStatus: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const { status } = updateCourseStatusSchema.parse(req.body);
    const course = await courseService.updateStatus(id, status);

    res.status(200).json({
      status: 'success',
      data: { course },
    });
  }),

  /**
   * @desc Re-derive lessonsCount / totalDurationHours from the stored lessons
   * @route POST /api/courses/:id/stats
   * @access Private (Admin)
   */
  recomputeStats: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const course = await lessonService.recomputeCourseStats(id);

    res.status(200).json({
      status: 'success',
      data: { course },
    });
  }),

  /**
   * @desc Delete a course with its lessons and materials
   * @route DELETE /api/courses/:id
   * @access Private (Admin)
   */
  deleteCourse: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await courseService.deleteCourse(id);

    res.status(204).send();
  }),
});

export type CourseController = ReturnType<typeof createCourseController>;
