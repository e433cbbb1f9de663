import { AppConfig, createApp, createServices, Services } from '../../src/app';
import { MemoryContentStore, MemoryUserStore } from './memory-stores';

export const testConfig: AppConfig = {
  JWT_SECRET: 'test-secret-test-secret',
  JWT_ALGORITHM: 'HS256',
  ACCESS_TOKEN_EXPIRE_MINUTES: 30,
  BCRYPT_ROUNDS: 4,
  ADMIN_API_KEY: 'test-admin-key',
  DEFAULT_CSV_PATH: 'data/catalog.csv',
  IMPORT_BATCH_SIZE: 2,
};

export function buildTestApp(config: AppConfig = testConfig) {
  const content = new MemoryContentStore();
  const users = new MemoryUserStore();
  const services: Services = createServices({ content, users }, config);
  const app = createApp(services, config);
  return { app, services, content, users };
}
