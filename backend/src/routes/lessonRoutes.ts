import express from 'express';
import type { LessonController } from '../controllers/lessonController.js';
import type { AuthMiddlewares } from '../middlewares/authMiddlewares.js';

/**
 * @route   /api/lessons
 * @desc    Lesson management routes
 */
export const createLessonRoutes = (controller: LessonController, { protect, optionalAuth, restrictTo }: AuthMiddlewares) => {
  const router = express.Router();

  router
    .route('/course/:courseId')
    .get(optionalAuth, controller.getLessonsByCourse)
    .post(protect, restrictTo('admin'), controller.createLesson);

  router.delete('/materials/:materialId', protect, restrictTo('admin'), controller.deleteMaterial);

  router
    .route('/:id')
    .get(optionalAuth, controller.getLesson)
    .patch(protect, restrictTo('admin'), controller.updateLesson)
    .delete(protect, restrictTo('admin'), controller.deleteLesson);

  router.patch('/:id/order', protect, restrictTo('admin'), controller.reorderLesson);
  router.post('/:id/materials', protect, restrictTo('admin'), controller.addMaterial);

  return router;
};
