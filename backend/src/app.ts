import express, { type Application } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import compression from 'compression';
import cookieParser from 'cookie-parser';
import type { AppConfig } from './config/env.js';
import type { Repositories } from './repositories/types.js';
import { systemClock, type Clock } from './types/commonTypes.js';
import { AppError } from './utils/AppError.js';
import { globalError } from './middlewares/globalError.js';
import { createLimiter } from './middlewares/rateLimit.js';
import { createAuthMiddlewares } from './middlewares/authMiddlewares.js';

// Services
import { createAccessService } from './service/accessService.js';
import { createCourseService } from './service/courseService.js';
import { createLessonService } from './service/lessonService.js';
import { createEnrollmentService } from './service/enrollmentService.js';
import { createProgressService } from './service/progressService.js';

// Controllers & Routes
import { createCourseController } from './controllers/courseController.js';
import { createLessonController } from './controllers/lessonController.js';
import { createEnrollmentController } from './controllers/enrollmentController.js';
import { createCourseRoutes } from './routes/courseRoutes.js';
import { createLessonRoutes } from './routes/lessonRoutes.js';
import { createEnrollmentRoutes } from './routes/enrollmentRoutes.js';

export interface AppDependencies {
  config: AppConfig;
  repositories: Repositories;
  clock?: Clock;
}

export const createServices = ({ config, repositories, clock = systemClock }: AppDependencies) => {
  const { courses, lessons, materials, enrollments } = repositories;
  const access = createAccessService({ enrollments, clock });

  return {
    courseService: createCourseService({ courses, lessons, materials, enrollments, access, clock }),
    lessonService: createLessonService({
      courses,
      lessons,
      materials,
      access,
      options: { lessonBatchMaxRetries: config.lessonBatchMaxRetries },
    }),
    enrollmentService: createEnrollmentService({
      courses,
      enrollments,
      clock,
      options: { allowCompletionAfterExpiry: config.allowCompletionAfterExpiry },
    }),
    progressService: createProgressService({ enrollments, lessons, clock }),
  };
};

export const createApp = (deps: AppDependencies): Application => {
  const { config } = deps;
  const app: Application = express();

  // 1. CORS allow-list
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || config.corsOrigins.includes(origin)) return callback(null, true);
        callback(AppError.forbidden('Not allowed by CORS'));
      },
      credentials: true,
    })
  );

  // 2. Security & Performance
  app.use(cookieParser());
  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // 3. Rate Limiting
  app.use('/api', createLimiter(config.rateLimit));

  // 4. Logging (dev/production)
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev'));
  }

  // 5. Routes
  const { courseService, lessonService, enrollmentService, progressService } = createServices(deps);
  const auth = createAuthMiddlewares(config.jwtSecret);

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  app.use('/api/courses', createCourseRoutes(createCourseController(courseService, lessonService), auth));
  app.use('/api/lessons', createLessonRoutes(createLessonController(lessonService), auth));
  app.use(
    '/api/enrollments',
    createEnrollmentRoutes(createEnrollmentController(enrollmentService, progressService), auth)
  );

  // 6. 404 Handler
  app.use((req, _res, next) => {
    next(AppError.notFound(`Route ${req.originalUrl} not found`));
  });

  // 7. Global Error Handler
  app.use(globalError);

  return app;
};
