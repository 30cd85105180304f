// backend/src/index.ts
import 'dotenv/config';
import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { loadCatalog } from './services/catalog-service';

const startServer = () => {
  try {
    const config = loadConfig();
    const catalog = loadCatalog();
    const app = createApp({ config, catalog });

    const httpServer = http.createServer(app);
    httpServer.listen(config.port, () => {
      console.log(`🚀 [Server] Listening on http://localhost:${config.port}`);
      console.log(`[Server] Storing assessments in ${config.dataDir}`);
    });
  } catch (error) {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  }
};

startServer();
