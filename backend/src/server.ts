import mongoose from 'mongoose';
import { createApp } from './app.js';
import { connectDB } from './config/db.js';
import { loadConfig } from './config/env.js';
import { createMongoRepositories } from './repositories/index.js';

const startServer = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectDB(config.mongoUri);

    const app = createApp({ config, repositories: createMongoRepositories() });
    const server = app.listen(config.port, () => {
      console.log(`✅ Server running on port ${config.port} (${config.nodeEnv})`);
    });

    let isShuttingDown = false;

    const shutdown = (signal: string) => {
      if (isShuttingDown) return;
      isShuttingDown = true;

      console.log(`⏳ ${signal} received. Shutting down gracefully...`);

      server.close((err) => {
        if (err) {
          console.error('❌ Server close error:', err);
          process.exit(1);
        }

        mongoose.connection
          .close()
          .then(() => {
            console.log('✅ MongoDB connection closed.');
            console.log('✅ Server closed successfully.');
            process.exit(0);
          })
          .catch((closeErr: unknown) => {
            console.error('❌ MongoDB close error:', closeErr);
            process.exit(1);
          });
      });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('🚨 Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
