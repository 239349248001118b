/**
 * Catalog entry for one extracurricular activity, as seeded at startup.
 * Field names follow the public JSON shape of GET /activities.
 */
export interface ActivitySeedEntry {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityCatalog = Record<string, ActivitySeedEntry>;

/**
 * In-memory record held by the store. Capacity is fixed once the store is seeded.
 */
export interface ActivityRecord {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly capacity: number;
  roster: string[];
}

/**
 * Snapshot of a single activity handed to callers. Mutating it never touches the store.
 */
export interface ActivitySnapshot {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivitySnapshotMap = Record<string, ActivitySnapshot>;

export const toSnapshot = (record: ActivityRecord): ActivitySnapshot => ({
  description: record.description,
  schedule: record.schedule,
  max_participants: record.capacity,
  participants: [...record.roster]
});

export const availableSpots = (activity: ActivitySnapshot): number =>
  activity.max_participants - activity.participants.length;
