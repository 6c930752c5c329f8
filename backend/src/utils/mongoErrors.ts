import mongoose, { Types } from 'mongoose';

export const isDuplicateKeyError = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

export const isObjectId = (id: string): boolean => Types.ObjectId.isValid(id) && /^[0-9a-fA-F]{24}$/.test(id);

export const toObjectId = (id: string) => new Types.ObjectId(id);
