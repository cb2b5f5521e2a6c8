export const ROADMAP_STATUSES = ["done", "progress", "planned"] as const;

export type RoadmapStatus = (typeof ROADMAP_STATUSES)[number];

export type RoadmapTask = {
  id: string;
  name: string;
  status: RoadmapStatus;
  category: string;
  order: number;
  created_at: string;
  updated_at: string;
};

export type TeamMember = {
  id: string;
  name: string;
  name_ru: string;
  position: string;
  position_ru: string;
  bio: string;
  bio_ru: string;
  avatar: string | null;
  social_links: Record<string, string>;
  order: number;
  created_at: string;
  updated_at: string;
};

export const PLATFORM_SETTINGS_ID = "platform_settings";

// Module documents are owned by the admin panel; only their count matters here.
export type PlatformSettings = {
  id: string;
  service_modules?: Record<string, unknown>[];
};
