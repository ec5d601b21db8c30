import { join } from 'path';

export const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 4000;

export const ACTIVITIES_SEED_FILE =
  process.env.ACTIVITIES_SEED_FILE || join(process.cwd(), 'data', 'activities.json');

export const STATIC_DIR = process.env.STATIC_DIR || join(process.cwd(), 'static');
