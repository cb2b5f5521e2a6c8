import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Filter } from "mongodb";
import { z } from "zod";
import type { MigrationCollections } from "./collections.js";
import { describeError, MigrationStepError } from "./errors.js";
import {
  checkPlatformSettings,
  runMigration,
  type MigrationLogger,
  type MigrationReport,
  type SeedResult,
} from "./migrations.js";
import { ROADMAP_STATUSES, type RoadmapTask } from "./types.js";

export type MigrationToolOptions = {
  getCollections: () => MigrationCollections;
  logger: MigrationLogger;
};

const textResult = (text: string) => ({
  content: [{ type: "text" as const, text }],
});

const displayOrder = { sort: { order: 1 } } as const;

const describeSeed = (result: SeedResult) =>
  result.inserted > 0
    ? `${result.collection}: inserted ${result.inserted} documents`
    : `${result.collection}: skipped, ${result.existing} existing documents`;

export const formatReport = (report: MigrationReport): string =>
  [
    "Data migration completed.",
    describeSeed(report.roadmapTasks),
    describeSeed(report.teamMembers),
    report.platformSettings.found
      ? `platform_settings: found with ${report.platformSettings.moduleCount} modules`
      : "platform_settings: not found",
  ].join("\n");

/**
 * Registers the seeding and inspection tools. The server process owns the
 * Mongo client; tools resolve collections per call.
 */
export function registerMigrationTools(server: McpServer, options: MigrationToolOptions): void {
  const { getCollections, logger } = options;

  // Tool: run_data_migration
  // Seeds the default roadmap and team when their collections are empty,
  // then reports on the settings singleton. Safe to call repeatedly.
  server.registerTool(
    "run_data_migration",
    {
      description:
        "Seed default roadmap tasks and team members into empty collections and check platform settings.",
      inputSchema: {},
    },
    async () => {
      try {
        const report = await runMigration({ collections: getCollections(), logger });
        return textResult(formatReport(report));
      } catch (err) {
        if (err instanceof MigrationStepError) {
          return textResult(`Migration failed at ${err.step}: ${describeError(err.cause)}`);
        }
        return textResult(`Migration failed: ${describeError(err)}`);
      }
    },
  );

  server.registerTool(
    "check_platform_settings",
    {
      description: "Report whether the platform settings document exists and how many service modules it has.",
      inputSchema: {},
    },
    async () => {
      const settings = await checkPlatformSettings({ collections: getCollections(), logger });
      return textResult(
        settings.found
          ? `Platform settings exist with ${settings.moduleCount} modules.`
          : "Platform settings not found.",
      );
    },
  );

  server.registerTool(
    "list_roadmap_tasks",
    {
      description: "List roadmap tasks in display order, optionally filtered by status.",
      inputSchema: {
        status: z.enum(ROADMAP_STATUSES).optional(),
      },
    },
    async ({ status }) => {
      const filter: Filter<RoadmapTask> = status ? { status } : {};
      const tasks = await getCollections().roadmapTasks.find(filter, displayOrder).toArray();
      if (tasks.length === 0) {
        return textResult(
          status ? `No roadmap tasks with status '${status}'.` : "No roadmap tasks found.",
        );
      }
      const lines = tasks.map(
        (task) => `• ${task.order}. ${task.name} [${task.status}] (${task.category})`,
      );
      return textResult(`Roadmap tasks:\n${lines.join("\n")}`);
    },
  );

  server.registerTool(
    "list_team_members",
    {
      description: "List team members in display order with their position, in English or Russian.",
      inputSchema: {
        locale: z.enum(["en", "ru"]).optional(),
      },
    },
    async ({ locale }) => {
      const members = await getCollections().teamMembers.find({}, displayOrder).toArray();
      if (members.length === 0) {
        return textResult("No team members found.");
      }
      const lines = members.map((member) =>
        locale === "ru"
          ? `• ${member.name_ru}: ${member.position_ru}`
          : `• ${member.name}: ${member.position}`,
      );
      return textResult(`Team members:\n${lines.join("\n")}`);
    },
  );
}
