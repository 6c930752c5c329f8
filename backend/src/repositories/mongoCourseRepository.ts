import mongoose from 'mongoose';
import { CourseModel } from '../models/courseModel.js';
import { LessonModel } from '../models/lessonModel.js';
import { MaterialModel } from '../models/materialModel.js';
import type { Course, CourseChanges, CourseFilter, ICourse, NewCourse } from '../types/courseTypes.js';
import { isObjectId, toObjectId } from '../utils/mongoErrors.js';
import { toCourse } from './mappers.js';
import type { CourseRepository } from './types.js';

export class MongoCourseRepository implements CourseRepository {
  async findById(id: string): Promise<Course | null> {
    if (!isObjectId(id)) return null;
    const doc = await CourseModel.findById(id).lean<ICourse>();
    return doc ? toCourse(doc) : null;
  }

  async findByIds(ids: string[]): Promise<Course[]> {
    const valid = ids.filter(isObjectId);
    if (valid.length === 0) return [];
    const docs = await CourseModel.find({ _id: { $in: valid.map(toObjectId) } }).lean<ICourse[]>();
    return docs.map(toCourse);
  }

  async findBySlug(slug: string): Promise<Course | null> {
    const doc = await CourseModel.findOne({ slug }).lean<ICourse>();
    return doc ? toCourse(doc) : null;
  }

  async slugExists(slug: string): Promise<boolean> {
    const found = await CourseModel.exists({ slug });
    return found !== null;
  }

  async list(filter: CourseFilter): Promise<Course[]> {
    const query = filter.status ? { status: filter.status } : {};
    const docs = await CourseModel.find(query).sort({ createdAt: -1 }).lean<ICourse[]>();
    return docs.map(toCourse);
  }

  async create(data: NewCourse): Promise<Course> {
    const doc = await CourseModel.create({ ...data, status: 'DRAFT' });
    return toCourse(doc);
  }

  async update(id: string, changes: CourseChanges): Promise<Course | null> {
    if (!isObjectId(id)) return null;
    const doc = await CourseModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean<ICourse>();
    return doc ? toCourse(doc) : null;
  }

  async deleteCascade(id: string): Promise<boolean> {
    if (!isObjectId(id)) return false;
    const courseId = toObjectId(id);
    const outcome = { deleted: false };

    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        const result = await CourseModel.deleteOne({ _id: courseId }, { session });
        outcome.deleted = result.deletedCount > 0;
        if (!outcome.deleted) return;
        await MaterialModel.deleteMany({ course: courseId }, { session });
        await LessonModel.deleteMany({ course: courseId }, { session });
      });
    } finally {
      await session.endSession();
    }

    return outcome.deleted;
  }
}
