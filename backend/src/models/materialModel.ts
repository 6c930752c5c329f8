import mongoose, { Schema } from 'mongoose';
import type { IMaterial } from '../types/materialTypes.js';
import { HTTP_URL, transformFn } from './modelTransforms.js';

const materialSchema = new Schema<IMaterial>(
  {
    lesson: {
      type: Schema.Types.ObjectId,
      ref: 'Lesson',
      required: [true, 'Material must belong to a lesson'],
      index: true,
    },
    course: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      required: true,
      index: true,
    },
    title: {
      type: String,
      trim: true,
      default: null,
      maxlength: [200, 'Title cannot exceed 200 characters'],
    },
    url: {
      type: String,
      required: [true, 'Material URL is required'],
      validate: {
        validator: (v: string) => HTTP_URL.test(v),
        message: 'Material URL must be a valid HTTPS/HTTP link',
      },
    },
  },
  {
    timestamps: true,
    toJSON: { virtuals: true, transform: transformFn },
    toObject: { virtuals: true },
  }
);

export const MaterialModel = mongoose.model<IMaterial>('Material', materialSchema);
