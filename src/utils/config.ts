import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { parseConfig, type AppConfig } from './env.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const result = parseConfig(process.env);

if (!result.ok) {
  console.error('❌ Invalid environment variables:');
  for (const issue of result.issues) {
    console.error(`   ${issue}`);
  }
  process.exit(1);
}

export const config: AppConfig = result.config;
export { PROJECT_ROOT };
export type { AppConfig };
