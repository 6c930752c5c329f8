import mongoose from 'mongoose';

/**
 * Lesson batches run in multi-document transactions, so MONGO_URI must point
 * at a replica set (a single-node one is enough).
 */
export const connectDB = async (uri: string): Promise<void> => {
  mongoose.set('strictQuery', true);

  mongoose.connection.on('disconnected', () => {
    console.warn('⚠️ MongoDB disconnected');
  });
  mongoose.connection.on('error', (err) => {
    console.error('❌ MongoDB connection error:', err);
  });

  const conn = await mongoose.connect(uri);
  console.log(`✅ MongoDB connected: ${conn.connection.host}`);
};
