import type { Server } from 'node:http';
import type { AppConfig } from '../config/env.js';
import { initializeDb } from '../db/database.js';
import { createApp } from './app.js';

export async function startServer(config: AppConfig): Promise<Server> {
  const db = await initializeDb(config);
  const app = createApp(db);

  const server = app.listen(config.port, () => {
    console.log(`Server running at http://localhost:${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api (${db.kind})`);
  });

  server.on('close', () => {
    db.close().catch(error => console.error('Failed to close database:', error));
  });

  return server;
}
