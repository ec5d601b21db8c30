import { readFileSync } from 'fs';
import { Activity, ActivityMap } from './activity.types';

/** DI token for the table the registry starts from */
export const ACTIVITY_SEED = Symbol('ACTIVITY_SEED');

export class InvalidSeedError extends Error {
  constructor(activityName: string, field: string, reason: string) {
    super(`Invalid seed for "${activityName}": ${field} ${reason}`);
    this.name = 'InvalidSeedError';
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function parseActivity(name: string, raw: unknown): Activity {
  if (!isRecord(raw)) throw new InvalidSeedError(name, 'entry', 'must be an object');

  const { description, schedule, max_participants, participants } = raw;

  if (typeof description !== 'string') throw new InvalidSeedError(name, 'description', 'must be a string');
  if (typeof schedule !== 'string') throw new InvalidSeedError(name, 'schedule', 'must be a string');
  if (typeof max_participants !== 'number' || !Number.isInteger(max_participants) || max_participants <= 0) {
    throw new InvalidSeedError(name, 'max_participants', 'must be a positive integer');
  }
  if (!Array.isArray(participants)) throw new InvalidSeedError(name, 'participants', 'must be an array');

  const emails: string[] = [];
  for (const p of participants) {
    if (typeof p !== 'string') throw new InvalidSeedError(name, 'participants', 'must contain only strings');
    if (emails.includes(p)) throw new InvalidSeedError(name, 'participants', `lists ${p} twice`);
    emails.push(p);
  }
  if (emails.length > max_participants) {
    throw new InvalidSeedError(name, 'participants', `exceeds max_participants (${max_participants})`);
  }

  return { description, schedule, max_participants, participants: emails };
}

export function parseActivitySeed(raw: unknown): ActivityMap {
  if (!isRecord(raw)) throw new Error('Activity seed must be an object keyed by activity name');

  const seed: ActivityMap = {};
  for (const [name, entry] of Object.entries(raw)) {
    seed[name] = parseActivity(name, entry);
  }
  return seed;
}

export function loadActivitySeed(file: string): ActivityMap {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parseActivitySeed(raw);
}
