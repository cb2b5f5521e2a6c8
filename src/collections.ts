import type { Db, Filter } from "mongodb";
import type { PlatformSettings, RoadmapTask, TeamMember } from "./types.js";

export type SortSpec = Record<string, 1 | -1>;

// The slice of the driver's Collection API the migration touches.
export type SeedCollection<T> = {
  countDocuments(filter?: Filter<T>): Promise<number>;
  insertMany(docs: ReadonlyArray<T>): Promise<{ insertedCount: number }>;
  findOne(filter: Filter<T>): Promise<T | null>;
  find(filter: Filter<T>, options?: { sort?: SortSpec }): { toArray(): Promise<T[]> };
};

export type MigrationCollections = {
  roadmapTasks: SeedCollection<RoadmapTask>;
  teamMembers: SeedCollection<TeamMember>;
  platformSettings: SeedCollection<PlatformSettings>;
};

export const COLLECTION_NAMES = {
  roadmapTasks: "roadmap_tasks",
  teamMembers: "team_members",
  platformSettings: "platform_settings",
} as const;

export const collectionsFor = (db: Db): MigrationCollections => ({
  roadmapTasks: db.collection<RoadmapTask>(COLLECTION_NAMES.roadmapTasks),
  teamMembers: db.collection<TeamMember>(COLLECTION_NAMES.teamMembers),
  platformSettings: db.collection<PlatformSettings>(COLLECTION_NAMES.platformSettings),
});
