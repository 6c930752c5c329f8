import mongoose, { type ClientSession } from 'mongoose';
import { CourseModel } from '../models/courseModel.js';
import { LessonModel } from '../models/lessonModel.js';
import { MaterialModel } from '../models/materialModel.js';
import type { ICourse } from '../types/courseTypes.js';
import type { ILesson, Lesson } from '../types/lessonTypes.js';
import type { OrderedItem } from '../types/commonTypes.js';
import { NotFoundError } from '../utils/AppError.js';
import { isObjectId, toObjectId } from '../utils/mongoErrors.js';
import { toCourse, toLesson } from './mappers.js';
import { StaleRevisionError, type LessonBatch, type LessonBatchResult, type LessonRepository } from './types.js';

const writeOrders = (courseId: string, items: OrderedItem[], sign: 1 | -1, session: ClientSession) =>
  LessonModel.bulkWrite(
    items.map(({ id, order }) => ({
      updateOne: {
        filter: { _id: toObjectId(id), course: toObjectId(courseId) },
        update: { $set: { order: sign * order } },
      },
    })),
    { session, ordered: true }
  );

/**
 * Rewrites positions in two passes: first to their negated targets, then to
 * the targets. The (course, order) unique index never sees two lessons on the
 * same slot in between.
 */
const applyReorder = async (courseId: string, items: OrderedItem[], session: ClientSession) => {
  if (items.length === 0) return;
  await writeOrders(courseId, items, -1, session);
  await writeOrders(courseId, items, 1, session);
};

export class MongoLessonRepository implements LessonRepository {
  async findById(id: string): Promise<Lesson | null> {
    if (!isObjectId(id)) return null;
    const doc = await LessonModel.findById(id).lean<ILesson>();
    return doc ? toLesson(doc) : null;
  }

  async listByCourse(courseId: string): Promise<Lesson[]> {
    if (!isObjectId(courseId)) return [];
    const docs = await LessonModel.find({ course: toObjectId(courseId) }).sort({ order: 1 }).lean<ILesson[]>();
    return docs.map(toLesson);
  }

  async commit(batch: LessonBatch): Promise<LessonBatchResult> {
    const courseId = toObjectId(batch.courseId);
    const outcome: { inserted: Lesson | null } = { inserted: null };

    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        outcome.inserted = null;

        // Claiming the revision serializes concurrent batches on this course
        const claimed = await CourseModel.updateOne(
          { _id: courseId, lessonsRevision: batch.expectedRevision },
          {
            $inc: { lessonsRevision: 1 },
            $set: { lessonsCount: batch.stats.lessonsCount, totalDurationHours: batch.stats.totalDurationHours },
          },
          { session }
        );
        if (claimed.matchedCount === 0) throw new StaleRevisionError(batch.courseId);

        if (batch.removeId) {
          const lessonId = toObjectId(batch.removeId);
          const removed = await LessonModel.deleteOne({ _id: lessonId, course: courseId }, { session });
          if (removed.deletedCount === 0) throw new NotFoundError('Lesson not found');
          await MaterialModel.deleteMany({ lesson: lessonId }, { session });
        }

        if (batch.update) {
          const updated = await LessonModel.updateOne(
            { _id: toObjectId(batch.update.id), course: courseId },
            { $set: batch.update.changes },
            { session, runValidators: true }
          );
          if (updated.matchedCount === 0) throw new NotFoundError('Lesson not found');
        }

        await applyReorder(batch.courseId, batch.reorder ?? [], session);

        if (batch.insert) {
          const { courseId: _owner, ...fields } = batch.insert;
          const [doc] = await LessonModel.create([{ ...fields, course: courseId }], { session });
          outcome.inserted = doc ? toLesson(doc) : null;
        }
      });
    } finally {
      await session.endSession();
    }

    const [course, lessons] = await Promise.all([
      CourseModel.findById(courseId).lean<ICourse>(),
      this.listByCourse(batch.courseId),
    ]);
    if (!course) throw new NotFoundError('Course not found');

    return { course: toCourse(course), lessons, inserted: outcome.inserted };
  }
}
