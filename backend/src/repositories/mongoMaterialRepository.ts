import { MaterialModel } from '../models/materialModel.js';
import type { IMaterial, Material, NewMaterial } from '../types/materialTypes.js';
import { isObjectId, toObjectId } from '../utils/mongoErrors.js';
import { toMaterial } from './mappers.js';
import type { MaterialRepository } from './types.js';

export class MongoMaterialRepository implements MaterialRepository {
  async listByLessons(lessonIds: string[]): Promise<Material[]> {
    const ids = lessonIds.filter(isObjectId).map(toObjectId);
    if (ids.length === 0) return [];
    const docs = await MaterialModel.find({ lesson: { $in: ids } }).sort({ createdAt: 1 }).lean<IMaterial[]>();
    return docs.map(toMaterial);
  }

  async create(data: NewMaterial): Promise<Material> {
    const doc = await MaterialModel.create({
      lesson: toObjectId(data.lessonId),
      course: toObjectId(data.courseId),
      title: data.title,
      url: data.url,
    });
    return toMaterial(doc);
  }

  async delete(id: string): Promise<boolean> {
    if (!isObjectId(id)) return false;
    const result = await MaterialModel.deleteOne({ _id: toObjectId(id) });
    return result.deletedCount > 0;
  }
}
