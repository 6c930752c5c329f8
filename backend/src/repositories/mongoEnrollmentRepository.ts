import { EnrollmentModel } from '../models/enrollmentModel.js';
import type {
  Enrollment,
  EnrollmentFilter,
  IEnrollment,
  NewEnrollment,
  ProgressUpdate,
} from '../types/enrollmentTypes.js';
import { ConflictError } from '../utils/AppError.js';
import { activeKeyFor } from '../utils/enrollmentState.js';
import { isDuplicateKeyError, isObjectId, toObjectId } from '../utils/mongoErrors.js';
import { toEnrollment } from './mappers.js';
import type { EnrollmentRepository } from './types.js';

const DUPLICATE_ACTIVE = 'Student already has an active enrollment in this course';

/** Frees the pair's active slot from holders that can no longer be ACTIVE. */
const releaseStaleClaims = async (activeKey: string, now: Date, exceptId?: string) => {
  await EnrollmentModel.updateMany(
    {
      activeKey,
      ...(exceptId ? { _id: { $ne: toObjectId(exceptId) } } : {}),
      $or: [{ expiresAt: { $lte: now } }, { completedAt: { $ne: null } }],
    },
    { $unset: { activeKey: 1 } }
  );
};

export class MongoEnrollmentRepository implements EnrollmentRepository {
  async findById(id: string): Promise<Enrollment | null> {
    if (!isObjectId(id)) return null;
    const doc = await EnrollmentModel.findById(id).lean<IEnrollment>();
    return doc ? toEnrollment(doc) : null;
  }

  async list(filter: EnrollmentFilter): Promise<Enrollment[]> {
    if ((filter.studentId && !isObjectId(filter.studentId)) || (filter.courseId && !isObjectId(filter.courseId))) {
      return [];
    }
    const query = {
      ...(filter.studentId ? { student: toObjectId(filter.studentId) } : {}),
      ...(filter.courseId ? { course: toObjectId(filter.courseId) } : {}),
    };
    const docs = await EnrollmentModel.find(query).sort({ enrolledAt: -1 }).lean<IEnrollment[]>();
    return docs.map(toEnrollment);
  }

  async createExclusive(data: NewEnrollment, now: Date): Promise<Enrollment> {
    const activeKey = activeKeyFor(data.studentId, data.courseId);
    await releaseStaleClaims(activeKey, now);

    try {
      const doc = await EnrollmentModel.create({
        student: toObjectId(data.studentId),
        course: toObjectId(data.courseId),
        enrolledAt: data.enrolledAt,
        expiresAt: data.expiresAt,
        notes: data.notes,
        createdBy: data.createdBy ? toObjectId(data.createdBy) : null,
        activeKey,
      });
      return toEnrollment(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ConflictError(DUPLICATE_ACTIVE);
      throw err;
    }
  }

  async markCompleted(id: string, completedAt: Date): Promise<Enrollment | null> {
    if (!isObjectId(id)) return null;
    const doc = await EnrollmentModel.findOneAndUpdate(
      { _id: toObjectId(id), completedAt: null },
      { $set: { completedAt }, $unset: { activeKey: 1 } },
      { new: true }
    ).lean<IEnrollment>();
    return doc ? toEnrollment(doc) : null;
  }

  async extend(id: string, expiresAt: Date, now: Date): Promise<Enrollment | null> {
    const current = await this.findById(id);
    if (!current) return null;

    const activeKey = activeKeyFor(current.studentId, current.courseId);
    await releaseStaleClaims(activeKey, now, id);

    try {
      const doc = await EnrollmentModel.findOneAndUpdate(
        { _id: toObjectId(id), completedAt: null },
        { $set: { expiresAt, activeKey } },
        { new: true, runValidators: true }
      ).lean<IEnrollment>();
      return doc ? toEnrollment(doc) : null;
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ConflictError(DUPLICATE_ACTIVE);
      throw err;
    }
  }

  async updateProgress(id: string, progress: ProgressUpdate): Promise<Enrollment | null> {
    if (!isObjectId(id)) return null;
    const doc = await EnrollmentModel.findByIdAndUpdate(
      id,
      {
        $set: {
          lastAccessedLesson: toObjectId(progress.lessonId),
          lastVideoPositionSeconds: progress.positionSeconds,
          lastAccessedAt: progress.accessedAt,
        },
      },
      { new: true, runValidators: true }
    ).lean<IEnrollment>();
    return doc ? toEnrollment(doc) : null;
  }
}
