import type { RoadmapTask, TeamMember } from "../types.js";

type Seeded<T> = Omit<T, "id" | "created_at" | "updated_at">;

export type RoadmapTaskTemplate = Seeded<RoadmapTask>;
export type TeamMemberTemplate = Seeded<TeamMember>;

export const DEFAULT_ROADMAP_TASKS: readonly RoadmapTaskTemplate[] = [
  { name: "Platform Architecture", status: "done", category: "Development", order: 1 },
  { name: "Core Team Formation", status: "done", category: "Team", order: 2 },
  { name: "Alpha Version Launch", status: "done", category: "Development", order: 3 },
  { name: "Community Building", status: "done", category: "Marketing", order: 4 },
  { name: "Beta Version v1.0", status: "done", category: "Development", order: 5 },
  { name: "NFT Box 666 Mint", status: "done", category: "NFT", order: 6 },
  { name: "Wallet Integration", status: "done", category: "Development", order: 7 },
  { name: "Analytics Dashboard", status: "done", category: "Development", order: 8 },
  { name: "Beta Version v1.1", status: "progress", category: "Development", order: 9 },
  { name: "OTC Marketplace", status: "progress", category: "Development", order: 10 },
  { name: "Mobile App Development", status: "progress", category: "Development", order: 11 },
  { name: "Partnership Programs", status: "progress", category: "Business", order: 12 },
];

export const DEFAULT_TEAM_MEMBERS: readonly TeamMemberTemplate[] = [
  {
    name: "Alex Morgan",
    name_ru: "Алекс Морган",
    position: "CEO & Founder",
    position_ru: "CEO и Основатель",
    bio: "10+ years in blockchain and crypto trading",
    bio_ru: "10+ лет опыта в блокчейне и крипто-трейдинге",
    avatar: null,
    social_links: {
      twitter: "https://twitter.com/alexmorgan",
      linkedin: "https://linkedin.com/in/alexmorgan",
    },
    order: 1,
  },
  {
    name: "Sarah Chen",
    name_ru: "Сара Чен",
    position: "CTO",
    position_ru: "Технический директор",
    bio: "Former Google engineer, blockchain expert",
    bio_ru: "Бывший инженер Google, эксперт по блокчейну",
    avatar: null,
    social_links: {
      twitter: "https://twitter.com/sarahchen",
      linkedin: "https://linkedin.com/in/sarahchen",
    },
    order: 2,
  },
  {
    name: "Michael Ross",
    name_ru: "Майкл Росс",
    position: "Head of Product",
    position_ru: "Руководитель продукта",
    bio: "Ex-Binance, product strategy specialist",
    bio_ru: "Экс-Binance, специалист по продуктовой стратегии",
    avatar: null,
    social_links: {
      twitter: "https://twitter.com/michaelross",
      linkedin: "https://linkedin.com/in/michaelross",
    },
    order: 3,
  },
];
