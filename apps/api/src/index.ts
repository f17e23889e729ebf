import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp, createServices } from './app.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Repo-root .env first, then apps/api/.env overrides it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();

const services = createServices(env);
services.coordinator.start();

const app = createApp(services);

const server = app.listen(env.PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`Coordinator listening on http://localhost:${env.PORT}`);
});

function shutdown() {
  services.coordinator.stop();
  server.close();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
