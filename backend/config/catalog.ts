import fs from 'fs';
import { ActivityCatalog, ActivitySeedEntry } from '../models/Activity';
import { CatalogError } from '../utils/EnrollmentErrorHandler';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

/**
 * Check the shape of one catalog entry. Capacity and roster rules are enforced
 * by the store when it is seeded.
 */
const parseEntry = (name: string, value: unknown): ActivitySeedEntry => {
  if (!isRecord(value)) {
    throw new CatalogError(`Activity "${name}" must be an object`, name);
  }

  const { description, schedule, max_participants, participants } = value;

  if (typeof description !== 'string') {
    throw new CatalogError(`Activity "${name}" is missing a description`, name);
  }
  if (typeof schedule !== 'string') {
    throw new CatalogError(`Activity "${name}" is missing a schedule`, name);
  }
  if (typeof max_participants !== 'number') {
    throw new CatalogError(`Activity "${name}" is missing max_participants`, name);
  }
  if (!isStringArray(participants)) {
    throw new CatalogError(`Activity "${name}" must list participants as strings`, name);
  }

  return { description, schedule, max_participants, participants: [...participants] };
};

export const parseActivityCatalog = (raw: unknown): ActivityCatalog => {
  if (!isRecord(raw)) {
    throw new CatalogError('Activity catalog must be a JSON object keyed by activity name');
  }

  return Object.fromEntries(
    Object.entries(raw).map(([name, value]): [string, ActivitySeedEntry] => [name, parseEntry(name, value)])
  );
};

/**
 * Read the seed catalog from a JSON file
 */
export const loadActivityCatalog = (filePath: string): ActivityCatalog => {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CatalogError(`Unable to read activity catalog ${filePath}: ${describeError(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new CatalogError(`Activity catalog ${filePath} is not valid JSON: ${describeError(error)}`);
  }

  return parseActivityCatalog(raw);
};
