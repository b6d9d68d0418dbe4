import { z } from 'zod';
import {
  championMasterySchema,
  matchIdsSchema,
  matchSchema,
  riotAccountSchema,
  type ParticipantDto,
} from '../types/riot.types.js';
import { malformedResponse } from '../utils/errors.js';

// 응답이 너무 길어지지 않도록 상위 10개만
export const MAX_MASTERIES = 10;

/**
 * 스키마 검증 후 값을 반환한다. 필드가 없거나 타입이 다르면
 * MALFORMED_RESPONSE 에러를 던진다.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  resource: string,
  pathPrefix: ReadonlyArray<string | number> = [],
): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw malformedResponse(resource, parsed.error, pathPrefix);
  }
  return parsed.data;
}

// 빈 본문, 빈 배열, 빈 객체는 "결과 없음"으로 취급
export function isEmptyPayload(data: unknown): boolean {
  if (data === undefined || data === null || data === '') return true;
  if (Array.isArray(data)) return data.length === 0;
  if (typeof data === 'object') return Object.keys(data).length === 0;
  return false;
}

export function formatAccount(data: unknown): string {
  const account = parseResponse(riotAccountSchema, data, 'account');
  return `Name:${account.gameName}#${account.tagLine} PUUID: ${account.puuid}`;
}

export function formatMasteries(data: unknown): string {
  const entries = parseResponse(z.array(z.unknown()), data, 'champion mastery');
  const top = parseResponse(z.array(championMasterySchema), entries.slice(0, MAX_MASTERIES), 'champion mastery');
  return top
    .map((mastery) => `Champion ${mastery.championId}: Level ${mastery.championLevel} - ${mastery.championPoints} pts`)
    .join('\n');
}

export function formatMatchIds(data: unknown, count: number): string {
  const matchIds = parseResponse(matchIdsSchema, data, 'match list');
  return matchIds.slice(0, count).join('\n');
}

function formatParticipant(p: ParticipantDto): string {
  return (
    `${p.riotIdGameName} - ${p.championName} - ` +
    `${p.kills}/${p.deaths}/${p.assists} time spent dead${p.totalTimeSpentDead} - ` +
    `${p.win ? 'Win' : 'Loss'} -${p.timePlayed}`
  );
}

export function formatMatch(data: unknown): string {
  const { info } = parseResponse(matchSchema, data, 'match');
  const lines = [`Mode: ${info.gameMode} - Duration: ${Math.floor(info.gameDuration / 60)}min`];
  for (const participant of info.participants) {
    lines.push(formatParticipant(participant));
  }
  return lines.join('\n');
}
