import mongoose, { Schema } from 'mongoose';
import { COURSE_STATUSES, type ICourse } from '../types/courseTypes.js';
import { transformFn } from './modelTransforms.js';

const courseSchema = new Schema<ICourse>(
  {
    title: {
      type: String,
      required: [true, 'Course title is required'],
      trim: true,
      minlength: [5, 'Title must be at least 5 characters'],
      maxlength: [150, 'Title cannot exceed 150 characters'],
    },
    slug: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    description: {
      type: String,
      required: [true, 'Course description is required'],
      maxlength: [2000, 'Description cannot exceed 2000 characters'],
    },
    status: {
      type: String,
      enum: COURSE_STATUSES,
      default: 'DRAFT',
      index: true,
    },
    publishedAt: {
      type: Date,
      default: null,
    },
    lessonsCount: {
      type: Number,
      default: 0,
      min: 0,
    },
    totalDurationHours: {
      type: Number,
      default: 0,
      min: 0,
    },
    lessonsRevision: {
      type: Number,
      default: 0,
      min: 0,
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
courseSchema.index({ status: 1, createdAt: -1 });

export const CourseModel = mongoose.model<ICourse>('Course', courseSchema);
