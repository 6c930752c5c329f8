import type { Types } from 'mongoose';

export interface IMaterial {
  _id: Types.ObjectId;
  lesson: Types.ObjectId;
  course: Types.ObjectId;
  title?: string | null;
  url: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Material {
  id: string;
  lessonId: string;
  courseId: string;
  title: string | null;
  url: string;
  createdAt: Date;
}

export interface NewMaterial {
  lessonId: string;
  courseId: string;
  title: string | null;
  url: string;
}
