import type { Types } from 'mongoose';
import type { Material } from './materialTypes.js';

export interface ILesson {
  _id: Types.ObjectId;
  course: Types.ObjectId;
  title: string;
  summary: string;
  videoUrl?: string | null;
  durationSeconds: number;
  order: number;
  isPreview: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Lesson {
  id: string;
  courseId: string;
  title: string;
  summary: string;
  videoUrl: string | null;
  durationSeconds: number;
  order: number;
  isPreview: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Lesson as served to a viewer. Locked lessons keep their metadata but lose
 * the video link and materials.
 */
export interface LessonView extends Lesson {
  materials: Material[];
  isLocked: boolean;
}

export interface CreateLessonInput {
  title: string;
  summary?: string;
  videoUrl?: string;
  durationSeconds?: number;
  isPreview?: boolean;
}

export interface UpdateLessonInput {
  title?: string;
  summary?: string;
  videoUrl?: string | null;
  durationSeconds?: number;
  isPreview?: boolean;
}

export interface NewLesson {
  courseId: string;
  title: string;
  summary: string;
  videoUrl: string | null;
  durationSeconds: number;
  isPreview: boolean;
  order: number;
}
