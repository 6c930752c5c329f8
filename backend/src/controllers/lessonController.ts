import type { Request, Response } from 'express';
import { optionalUser } from '../middlewares/authMiddlewares.js';
import { idParamSchema } from '../schemas/commonSchemas.js';
import {
  courseIdParamSchema,
  createLessonSchema,
  createMaterialSchema,
  materialParamSchema,
  reorderLessonSchema,
  updateLessonSchema,
} from '../schemas/lessonSchemas.js';
import type { LessonService } from '../service/lessonService.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export const createLessonController = (lessonService: LessonService) => ({
  /**
   * Append a lesson to a course
   * @route POST /api/lessons/course/:courseId
   * @access Private (Admin)
   */
  createLesson: asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamSchema.parse(req.params);
    const input = createLessonSchema.parse(req.body);

    const { lesson, course } = await lessonService.createLesson(courseId, input);

    res.status(201).json({
      status: 'success',
      data: { lesson, course },
    });
  }),

  /**
   * Ordered lessons of a course; content is stripped when the viewer has no access
   * @route GET /api/lessons/course/:courseId
   * @access Public (optional auth)
   */
  getLessonsByCourse: asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamSchema.parse(req.params);
    const lessons = await lessonService.getLessonsByCourse(courseId, optionalUser(req));

    res.status(200).json({
      status: 'success',
      results: lessons.length,
      data: { lessons },
    });
  }),

  /**
   * @route GET /api/lessons/:id
   * @access Public for preview lessons, enrolled students otherwise
   */
  getLesson: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const lesson = await lessonService.getLesson(id, optionalUser(req));

    res.status(200).json({
      status: 'success',
      data: { lesson },
    });
  }),

  /**
   * @route PATCH /api/lessons/:id
   * @access Private (Admin)
   */
  updateLesson: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const input = updateLessonSchema.parse(req.body);

    const { lesson, course } = await lessonService.updateLesson(id, input);

    res.status(200).json({
      status: 'success',
      data: { lesson, course },
    });
  }),

  /**
   * Move a lesson; responds with the full renumbered list
   * @route PATCH /api/lessons/:id/order
   * @access Private (Admin)
   */
  reorderLesson: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const { order } = reorderLessonSchema.parse(req.body);

    const lessons = await lessonService.reorderLesson(id, order);

    res.status(200).json({
      status: 'success',
      results: lessons.length,
      data: { lessons },
    });
  }),

  /**
   * @route DELETE /api/lessons/:id
   * @access Private (Admin)
   */
  deleteLesson: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const lessons = await lessonService.deleteLesson(id);

    res.status(200).json({
      status: 'success',
      results: lessons.length,
      data: { lessons },
    });
  }),

  /**
   * @desc Attach a material to a lesson
   * @route POST /api/lessons/:id/materials
   * @access Private (Admin)
   */
  addMaterial: asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const input = createMaterialSchema.parse(req.body);

    const material = await lessonService.addMaterial(id, input);

    res.status(201).json({
      status: 'success',
      data: { material },
    });
  }),

  /**
   * @desc Remove a material
   * @route DELETE /api/lessons/materials/:materialId
   * @access Private (Admin)
   */
  deleteMaterial: asyncHandler(async (req: Request, res: Response) => {
    const { materialId } = materialParamSchema.parse(req.params);
    await lessonService.deleteMaterial(materialId);

    res.status(204).send();
  }),
});

export type LessonController = ReturnType<typeof createLessonController>;
