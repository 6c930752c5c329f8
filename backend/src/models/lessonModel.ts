import mongoose, { Schema } from 'mongoose';
import type { ILesson } from '../types/lessonTypes.js';
import { HTTP_URL, transformFn } from './modelTransforms.js';

const lessonSchema = new Schema<ILesson>(
  {
    title: {
      type: String,
      required: [true, 'Lesson title is required'],
      trim: true,
      minlength: [3, 'Title must be at least 3 characters'],
      maxlength: [200, 'Title cannot exceed 200 characters'],
    },
    summary: {
      type: String,
      trim: true,
      default: '',
      maxlength: [5000, 'Summary cannot exceed 5000 characters'],
    },
    videoUrl: {
      type: String,
      default: null,
      validate: {
        validator: (v: string | null) => !v || HTTP_URL.test(v),
        message: 'Video URL must be a valid HTTPS/HTTP link',
      },
    },
    durationSeconds: {
      type: Number,
      default: 0,
      min: [0, 'Duration cannot be negative'],
    },
    // Contiguous 1..N per course. Batches stage moves through negative values
    // inside a transaction, which is why there is no `min` here.
    order: {
      type: Number,
      required: true,
    },
    isPreview: {
      type: Boolean,
      default: false,
    },
    course: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      required: [true, 'Lesson must belong to a course'],
      index: true,
    },
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      transform: transformFn,
    },
    toObject: { virtuals: true },
  }
);

// === Indexes ===
lessonSchema.index({ course: 1, order: 1 }, { unique: true });

export const LessonModel = mongoose.model<ILesson>('Lesson', lessonSchema);
