import express from 'express';
import type { CourseController } from '../controllers/courseController.js';
import type { AuthMiddlewares } from '../middlewares/authMiddlewares.js';

export const createCourseRoutes = (controller: CourseController, { protect, optionalAuth, restrictTo }: AuthMiddlewares) => {
  const router = express.Router();

  // 🟢 Public Routes
  router.get('/', optionalAuth, controller.getAllCourses);
  router.get('/:slug', optionalAuth, controller.getCourseBySlug);

  // 🔒 Admin Routes
  router.use(protect, restrictTo('admin'));

  router.post('/', controller.createCourse);
  router.route('/:id').patch(controller.updateCourse).delete(controller.deleteCourse);
  router.patch('/:id/status', controller.updateCourseStatus);
  router.post('/:id/stats', controller.recomputeStats);

  return router;
};
