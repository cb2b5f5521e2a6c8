import { randomUUID } from "node:crypto";
import { COLLECTION_NAMES, type MigrationCollections } from "./collections.js";
import { DEFAULT_ROADMAP_TASKS, DEFAULT_TEAM_MEMBERS } from "./data/defaults.js";
import { describeError, MigrationStepError, type MigrationStep } from "./errors.js";
import { PLATFORM_SETTINGS_ID, type RoadmapTask, type TeamMember } from "./types.js";

export type MigrationLogger = Pick<Console, "log" | "warn" | "error">;

export type MigrationContext = {
  collections: MigrationCollections;
  logger?: MigrationLogger;
  now?: () => Date;
  generateId?: () => string;
};

export type SeedResult = {
  collection: string;
  existing: number;
  inserted: number;
};

export type SettingsResult = {
  found: boolean;
  moduleCount: number;
};

export type MigrationReport = {
  roadmapTasks: SeedResult;
  teamMembers: SeedResult;
  platformSettings: SettingsResult;
};

type Stamp = { id: string; created_at: string; updated_at: string };

const stamper = (ctx: MigrationContext) => {
  const now = ctx.now ?? (() => new Date());
  const generateId = ctx.generateId ?? randomUUID;
  return (): Stamp => {
    const timestamp = now().toISOString();
    return { id: generateId(), created_at: timestamp, updated_at: timestamp };
  };
};

export const buildDefaultRoadmapTasks = (ctx: MigrationContext): RoadmapTask[] => {
  const stamp = stamper(ctx);
  return DEFAULT_ROADMAP_TASKS.map((task) => ({ ...stamp(), ...task }));
};

export const buildDefaultTeamMembers = (ctx: MigrationContext): TeamMember[] => {
  const stamp = stamper(ctx);
  return DEFAULT_TEAM_MEMBERS.map((member) => ({
    ...stamp(),
    ...member,
    social_links: { ...member.social_links },
  }));
};

/**
 * Inserts the default roadmap when `roadmap_tasks` is empty. Any existing
 * document, default or not, turns the step into a no-op.
 */
export async function migrateRoadmapTasks(ctx: MigrationContext): Promise<SeedResult> {
  const logger = ctx.logger ?? console;
  logger.log("📋 Migrating roadmap tasks...");

  const existing = await ctx.collections.roadmapTasks.countDocuments({});
  if (existing > 0) {
    logger.log(`  ℹ️  Found ${existing} existing tasks, skipping...`);
    return { collection: COLLECTION_NAMES.roadmapTasks, existing, inserted: 0 };
  }

  const { insertedCount } = await ctx.collections.roadmapTasks.insertMany(
    buildDefaultRoadmapTasks(ctx),
  );
  logger.log(`  ✅ Migrated ${insertedCount} roadmap tasks`);
  return { collection: COLLECTION_NAMES.roadmapTasks, existing: 0, inserted: insertedCount };
}

export async function migrateTeamMembers(ctx: MigrationContext): Promise<SeedResult> {
  const logger = ctx.logger ?? console;
  logger.log("👥 Migrating team members...");

  const existing = await ctx.collections.teamMembers.countDocuments({});
  if (existing > 0) {
    logger.log(`  ℹ️  Found ${existing} existing team members, skipping...`);
    return { collection: COLLECTION_NAMES.teamMembers, existing, inserted: 0 };
  }

  const { insertedCount } = await ctx.collections.teamMembers.insertMany(
    buildDefaultTeamMembers(ctx),
  );
  logger.log(`  ✅ Migrated ${insertedCount} team members`);
  return { collection: COLLECTION_NAMES.teamMembers, existing: 0, inserted: insertedCount };
}

// Read-only: reports on the settings singleton without creating it.
export async function checkPlatformSettings(ctx: MigrationContext): Promise<SettingsResult> {
  const logger = ctx.logger ?? console;
  logger.log("⚙️  Checking platform settings...");

  const settings = await ctx.collections.platformSettings.findOne({ id: PLATFORM_SETTINGS_ID });
  if (!settings) {
    logger.warn("  ⚠️  Platform settings not found");
    return { found: false, moduleCount: 0 };
  }

  const moduleCount = settings.service_modules?.length ?? 0;
  logger.log(`  ℹ️  Platform settings exist with ${moduleCount} modules`);
  return { found: true, moduleCount };
}

export const failureBanner = (err: unknown): string =>
  `\n❌ Migration failed: ${describeError(err)}\n`;

async function runStep<T>(step: MigrationStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new MigrationStepError(step, err);
  }
}

/**
 * Runs the seeding steps in order. The first failing step stops the run;
 * the failure is logged and re-thrown as a {@link MigrationStepError}.
 * Documents inserted by earlier steps stay in place.
 */
export async function runMigration(ctx: MigrationContext): Promise<MigrationReport> {
  const logger = ctx.logger ?? console;
  logger.log("\n🚀 Starting data migration...\n");

  try {
    const roadmapTasks = await runStep("roadmap_tasks", () => migrateRoadmapTasks(ctx));
    const teamMembers = await runStep("team_members", () => migrateTeamMembers(ctx));
    const platformSettings = await runStep("platform_settings", () =>
      checkPlatformSettings(ctx),
    );

    logger.log("\n✅ Migration completed successfully!\n");
    return { roadmapTasks, teamMembers, platformSettings };
  } catch (err) {
    logger.error(failureBanner(err));
    throw err;
  }
}
