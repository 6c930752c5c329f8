import { MongoCourseRepository } from './mongoCourseRepository.js';
import { MongoEnrollmentRepository } from './mongoEnrollmentRepository.js';
import { MongoLessonRepository } from './mongoLessonRepository.js';
import { MongoMaterialRepository } from './mongoMaterialRepository.js';
import type { Repositories } from './types.js';

export const createMongoRepositories = (): Repositories => ({
  courses: new MongoCourseRepository(),
  lessons: new MongoLessonRepository(),
  materials: new MongoMaterialRepository(),
  enrollments: new MongoEnrollmentRepository(),
});

export * from './types.js';
