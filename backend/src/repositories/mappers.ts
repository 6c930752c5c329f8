import type { Course, ICourse } from '../types/courseTypes.js';
import type { Enrollment, IEnrollment } from '../types/enrollmentTypes.js';
import type { ILesson, Lesson } from '../types/lessonTypes.js';
import type { IMaterial, Material } from '../types/materialTypes.js';

export const toCourse = (doc: ICourse): Course => ({
  id: doc._id.toString(),
  title: doc.title,
  slug: doc.slug,
  description: doc.description,
  status: doc.status,
  publishedAt: doc.publishedAt ?? null,
  lessonsCount: doc.lessonsCount,
  totalDurationHours: doc.totalDurationHours,
  lessonsRevision: doc.lessonsRevision,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const toLesson = (doc: ILesson): Lesson => ({
  id: doc._id.toString(),
  courseId: doc.course.toString(),
  title: doc.title,
  summary: doc.summary,
  videoUrl: doc.videoUrl ?? null,
  durationSeconds: doc.durationSeconds,
  order: doc.order,
  isPreview: doc.isPreview,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const toMaterial = (doc: IMaterial): Material => ({
  id: doc._id.toString(),
  lessonId: doc.lesson.toString(),
  courseId: doc.course.toString(),
  title: doc.title ?? null,
  url: doc.url,
  createdAt: doc.createdAt,
});

export const toEnrollment = (doc: IEnrollment): Enrollment => ({
  id: doc._id.toString(),
  studentId: doc.student.toString(),
  courseId: doc.course.toString(),
  enrolledAt: doc.enrolledAt,
  expiresAt: doc.expiresAt,
  completedAt: doc.completedAt ?? null,
  lastAccessedLessonId: doc.lastAccessedLesson ? doc.lastAccessedLesson.toString() : null,
  lastVideoPositionSeconds: doc.lastVideoPositionSeconds,
  lastAccessedAt: doc.lastAccessedAt ?? null,
  notes: doc.notes ?? null,
  createdBy: doc.createdBy ? doc.createdBy.toString() : null,
});
