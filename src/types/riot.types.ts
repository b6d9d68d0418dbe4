// Riot API 응답 스키마와 도메인 타입 정의
import { z } from 'zod';
import type { RiotApiError } from '../utils/errors.js';

export type FetchResult<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; error: RiotApiError };

// account-v1
export const riotAccountSchema = z.object({
  puuid: z.string(),
  gameName: z.string(),
  tagLine: z.string(),
});

export type RiotAccount = z.infer<typeof riotAccountSchema>;

// champion-mastery-v4
export const championMasterySchema = z.object({
  championId: z.number(),
  championLevel: z.number(),
  championPoints: z.number(),
});

export type ChampionMastery = z.infer<typeof championMasterySchema>;

// match-v5 ids
export const matchIdsSchema = z.array(z.string());

// match-v5 match
export const participantSchema = z.object({
  riotIdGameName: z.string(),
  championName: z.string(),
  kills: z.number(),
  deaths: z.number(),
  assists: z.number(),
  totalTimeSpentDead: z.number(),
  win: z.boolean(),
  timePlayed: z.number(),
});

export const matchSchema = z.object({
  info: z.object({
    gameMode: z.string(),
    gameDuration: z.number(), // seconds
    participants: z.array(participantSchema),
  }),
});

export type ParticipantDto = z.infer<typeof participantSchema>;
export type MatchDto = z.infer<typeof matchSchema>;

// match-v5 timeline
export const timelineParticipantSchema = z.object({
  participantId: z.number(),
  riotIdGameName: z.string().optional(),
  summonerName: z.string().optional(),
  championName: z.string().optional(),
});

const rawEventSchema = z.object({ type: z.string() }).passthrough();

export const timelineFrameSchema = z.object({
  timestamp: z.number().default(0),
  events: z.array(rawEventSchema).default([]),
});

export const timelineSchema = z.object({
  info: z
    .object({
      frameInterval: z.number().default(0),
      participants: z.array(timelineParticipantSchema).default([]),
      frames: z.array(timelineFrameSchema).default([]),
    })
    .default({}),
});

export type TimelineParticipantDto = z.infer<typeof timelineParticipantSchema>;
export type RawTimelineEvent = z.infer<typeof rawEventSchema>;
export type TimelineDto = z.infer<typeof timelineSchema>;

// 타임라인 이벤트: 요약에 쓰는 타입만 필드를 검사하고 나머지는 OTHER 로 묶는다
const championKillSchema = z.object({
  type: z.literal('CHAMPION_KILL'),
  killerId: z.number().default(0),
  victimId: z.number().default(0),
  assistingParticipantIds: z.array(z.number()).default([]),
});

const buildingKillSchema = z.object({
  type: z.literal('BUILDING_KILL'),
  teamId: z.number().default(0),
  buildingType: z.string().default(''),
  laneType: z.string().default(''),
});

const eliteMonsterKillSchema = z.object({
  type: z.literal('ELITE_MONSTER_KILL'),
  killerId: z.number().default(0),
  monsterType: z.string().default(''),
  monsterSubType: z.string().default(''),
});

const itemPurchasedSchema = z.object({
  type: z.literal('ITEM_PURCHASED'),
  participantId: z.number().default(0),
  itemId: z.number().default(0),
});

const skillLevelUpSchema = z.object({
  type: z.literal('SKILL_LEVEL_UP'),
  participantId: z.number().default(0),
  skillSlot: z.number().default(0),
});

export const knownEventSchema = z.discriminatedUnion('type', [
  championKillSchema,
  buildingKillSchema,
  eliteMonsterKillSchema,
  itemPurchasedSchema,
  skillLevelUpSchema,
]);

export type KnownTimelineEvent = z.infer<typeof knownEventSchema>;
export type KnownEventType = KnownTimelineEvent['type'];

export const KNOWN_EVENT_TYPES: ReadonlySet<string> = new Set<KnownEventType>([
  'CHAMPION_KILL',
  'BUILDING_KILL',
  'ELITE_MONSTER_KILL',
  'ITEM_PURCHASED',
  'SKILL_LEVEL_UP',
]);

export type TimelineEvent = KnownTimelineEvent | { type: 'OTHER'; originalType: string };

export interface MatchParticipant {
  participantId: number;
  displayName: string;
  championName: string;
}
