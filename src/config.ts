import 'dotenv/config';
import { join } from 'path';

export function parsePort(raw: string | undefined): number | null {
  if (raw === undefined || raw === '') return 8000;
  if (!/^\d+$/.test(raw)) return null;
  const port = parseInt(raw, 10);
  return port > 0 && port <= 65535 ? port : null;
}

export function validateEnv(): void {
  if (parsePort(process.env.PORT) === null) {
    console.error(`Invalid PORT: ${process.env.PORT}`);
    console.error('PORT must be an integer between 1 and 65535. See .env.example');
    process.exit(1);
  }
}

export const config = {
  get PORT() { return parsePort(process.env.PORT) ?? 8000; },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  get STATIC_DIR() { return process.env.STATIC_DIR || join(process.cwd(), 'static'); },
  get LOG_REQUESTS() { return process.env.LOG_REQUESTS !== 'false'; },
};
