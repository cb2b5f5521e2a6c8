import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it } from "vitest";
import { buildDefaultRoadmapTasks, buildDefaultTeamMembers } from "./migrations.js";
import {
  memoryCollections,
  recordingLogger,
  sequentialIds,
  type MemoryCollections,
} from "./testing/memory-collection.js";
import { registerMigrationTools } from "./tools.js";

const NOW = new Date("2026-01-15T10:00:00.000Z");

const connected: Client[] = [];

afterEach(async () => {
  await Promise.all(connected.splice(0).map((client) => client.close()));
});

const connect = async (collections: MemoryCollections) => {
  const server = new McpServer({ name: "platform-data-migration-test", version: "0.0.0" });
  registerMigrationTools(server, {
    getCollections: () => collections,
    logger: recordingLogger().logger,
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  connected.push(client);
  return client;
};

const callText = async (
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
): Promise<string> => {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  return result.content.map((item) => (item.type === "text" ? item.text : "")).join("\n");
};

const seededCollections = () => {
  const ctx = { collections: memoryCollections(), now: () => NOW, generateId: sequentialIds() };
  return memoryCollections({
    // Stored out of display order to exercise sorting.
    roadmapTasks: buildDefaultRoadmapTasks(ctx).reverse(),
    teamMembers: buildDefaultTeamMembers(ctx).reverse(),
  });
};

describe("migration tools", () => {
  it("lists the registered tools", async () => {
    const client = await connect(memoryCollections());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "check_platform_settings",
      "list_roadmap_tasks",
      "list_team_members",
      "run_data_migration",
    ]);
  });

  it("runs the migration against empty collections", async () => {
    const collections = memoryCollections();
    const client = await connect(collections);

    const text = await callText(client, "run_data_migration");

    expect(text).toBe(
      [
        "Data migration completed.",
        "roadmap_tasks: inserted 12 documents",
        "team_members: inserted 3 documents",
        "platform_settings: not found",
      ].join("\n"),
    );
    expect(collections.roadmapTasks.documents).toHaveLength(12);
    expect(collections.teamMembers.documents).toHaveLength(3);
  });

  it("reports skipped steps on a repeated run", async () => {
    const collections = seededCollections();
    collections.platformSettings.documents.push({
      id: "platform_settings",
      service_modules: [{ key: "otc" }, { key: "analytics" }],
    });
    const client = await connect(collections);

    const text = await callText(client, "run_data_migration");

    expect(text).toBe(
      [
        "Data migration completed.",
        "roadmap_tasks: skipped, 12 existing documents",
        "team_members: skipped, 3 existing documents",
        "platform_settings: found with 2 modules",
      ].join("\n"),
    );
  });

  it("returns the failed step as text", async () => {
    const collections = memoryCollections();
    collections.roadmapTasks.failWith(new Error("server selection timed out"));
    const client = await connect(collections);

    const text = await callText(client, "run_data_migration");

    expect(text).toBe("Migration failed at roadmap_tasks: server selection timed out");
    expect(collections.teamMembers.documents).toHaveLength(0);
  });

  it("checks platform settings", async () => {
    const collections = memoryCollections({
      platformSettings: [{ id: "platform_settings", service_modules: [{ key: "otc" }] }],
    });
    const client = await connect(collections);

    expect(await callText(client, "check_platform_settings")).toBe(
      "Platform settings exist with 1 modules.",
    );
  });

  it("reports missing platform settings", async () => {
    const client = await connect(memoryCollections());

    expect(await callText(client, "check_platform_settings")).toBe("Platform settings not found.");
  });

  it("lists roadmap tasks by status in display order", async () => {
    const client = await connect(seededCollections());

    const text = await callText(client, "list_roadmap_tasks", { status: "progress" });

    expect(text).toBe(
      [
        "Roadmap tasks:",
        "• 9. Beta Version v1.1 [progress] (Development)",
        "• 10. OTC Marketplace [progress] (Development)",
        "• 11. Mobile App Development [progress] (Development)",
        "• 12. Partnership Programs [progress] (Business)",
      ].join("\n"),
    );
  });

  it("explains an empty status filter", async () => {
    const client = await connect(seededCollections());

    expect(await callText(client, "list_roadmap_tasks", { status: "planned" })).toBe(
      "No roadmap tasks with status 'planned'.",
    );
  });

  it("reports an empty roadmap", async () => {
    const client = await connect(memoryCollections());

    expect(await callText(client, "list_roadmap_tasks")).toBe("No roadmap tasks found.");
  });

  it("lists team members in English by default", async () => {
    const client = await connect(seededCollections());

    expect(await callText(client, "list_team_members")).toBe(
      [
        "Team members:",
        "• Alex Morgan: CEO & Founder",
        "• Sarah Chen: CTO",
        "• Michael Ross: Head of Product",
      ].join("\n"),
    );
  });

  it("lists team members in Russian", async () => {
    const client = await connect(seededCollections());

    expect(await callText(client, "list_team_members", { locale: "ru" })).toBe(
      [
        "Team members:",
        "• Алекс Морган: CEO и Основатель",
        "• Сара Чен: Технический директор",
        "• Майкл Росс: Руководитель продукта",
      ].join("\n"),
    );
  });
});
