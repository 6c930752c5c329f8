import express from 'express';
import type { EnrollmentController } from '../controllers/enrollmentController.js';
import type { AuthMiddlewares } from '../middlewares/authMiddlewares.js';

export const createEnrollmentRoutes = (controller: EnrollmentController, { protect, restrictTo }: AuthMiddlewares) => {
  const router = express.Router();

  router.use(protect);

  router
    .route('/')
    .get(restrictTo('admin'), controller.getAllEnrollments)
    .post(restrictTo('admin'), controller.createEnrollment);

  router.get('/my', controller.getMyEnrollments);

  router.get('/:id', controller.getEnrollment);
  router.patch('/:id/progress', restrictTo('student'), controller.updateProgress);
  router.post('/:id/complete', controller.completeEnrollment);
  router.patch('/:id/extend', restrictTo('admin'), controller.extendEnrollment);

  return router;
};
