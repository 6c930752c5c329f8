/**
 * Enrollment Schema
 * - expiry is computed on read from `expiresAt`; nothing sweeps expired rows
 * - `activeKey` + unique sparse index: one open enrollment per student/course
 * - progress is a fixed-size overwrite (last lesson + playback position)
 */
import mongoose, { Schema } from 'mongoose';
import type { IEnrollment } from '../types/enrollmentTypes.js';
import { transformFn } from './modelTransforms.js';

const enrollmentSchema = new Schema<IEnrollment>(
  {
    student: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      required: [true, 'Student is required'],
      index: true,
    },
    course: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      required: [true, 'Course is required'],
      index: true,
    },
    enrolledAt: {
      type: Date,
      required: true,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    completedAt: {
      type: Date,
      default: null,
    },
    lastAccessedLesson: {
      type: Schema.Types.ObjectId,
      ref: 'Lesson',
      default: null,
    },
    lastVideoPositionSeconds: {
      type: Number,
      min: [0, 'Video position cannot be negative'],
      default: 0,
    },
    lastAccessedAt: {
      type: Date,
      default: null,
    },
    notes: {
      type: String,
      trim: true,
      maxlength: [500, 'Notes cannot exceed 500 characters'],
      default: null,
    },
    createdBy: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      default: null,
    },
    activeKey: {
      type: String,
    },
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      transform: (doc: unknown, ret: Record<string, unknown>) => {
        // eslint-disable-next-line @typescript-eslint/no-unused-vars
        const { activeKey, ...rest } = ret;
        return transformFn(doc, rest);
      },
    },
    toObject: { virtuals: true },
  }
);

// === Indexes ===
enrollmentSchema.index({ activeKey: 1 }, { unique: true, sparse: true });
enrollmentSchema.index({ student: 1, course: 1 });
enrollmentSchema.index({ student: 1, enrolledAt: -1 });

export const EnrollmentModel = mongoose.model<IEnrollment>('Enrollment', enrollmentSchema);
