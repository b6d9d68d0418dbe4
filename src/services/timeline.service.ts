import {
  KNOWN_EVENT_TYPES,
  knownEventSchema,
  timelineSchema,
  type MatchParticipant,
  type RawTimelineEvent,
  type TimelineEvent,
  type TimelineParticipantDto,
} from '../types/riot.types.js';
import { parseResponse } from './formatter.service.js';

const TEAM_NAMES: Partial<Record<number, string>> = {
  100: 'Blue Team',
  200: 'Red Team',
};

const SKILL_KEYS: Partial<Record<number, string>> = {
  1: 'Q',
  2: 'W',
  3: 'E',
  4: 'R',
};

export type ParticipantLabeler = (participantId: number) => string;

export function buildParticipantTable(participants: TimelineParticipantDto[]): Map<number, MatchParticipant> {
  const table = new Map<number, MatchParticipant>();
  for (const p of participants) {
    table.set(p.participantId, {
      participantId: p.participantId,
      displayName: p.riotIdGameName || p.summonerName || `Player ${p.participantId}`,
      championName: p.championName || 'Unknown',
    });
  }
  return table;
}

export function createLabeler(table: Map<number, MatchParticipant>): ParticipantLabeler {
  return (participantId) => {
    const participant = table.get(participantId);
    return participant ? `${participant.displayName}(${participant.championName})` : '?(?)';
  };
}

// 125000ms -> "[02:05]"
export function formatFrameTime(timestampMillis: number): string {
  const totalSeconds = Math.floor(timestampMillis / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `[${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}]`;
}

/**
 * 원본 이벤트를 요약 대상 타입으로 분류한다.
 * 알 수 없는 타입은 OTHER, 알려진 타입인데 필드 타입이 다르면 MALFORMED_RESPONSE.
 */
export function classifyEvent(raw: RawTimelineEvent, path: ReadonlyArray<string | number> = []): TimelineEvent {
  if (!KNOWN_EVENT_TYPES.has(raw.type)) {
    return { type: 'OTHER', originalType: raw.type };
  }
  return parseResponse(knownEventSchema, raw, 'timeline', path);
}

export function formatEvent(event: TimelineEvent, label: ParticipantLabeler): string | null {
  switch (event.type) {
    case 'CHAMPION_KILL':
      return (
        `KILL - Player ${label(event.killerId)} killed Player ${label(event.victimId)} ` +
        `(assists: [${event.assistingParticipantIds.join(', ')}])`
      );
    case 'BUILDING_KILL': {
      const team = TEAM_NAMES[event.teamId] ?? String(event.teamId);
      return `BUILDING - Team ${team} lost ${event.buildingType} (${event.laneType})`;
    }
    case 'ELITE_MONSTER_KILL': {
      const monster = [event.monsterType, event.monsterSubType].filter((part) => part.length > 0).join(' ');
      return `MONSTER - Player ${label(event.killerId)} killed ${monster}`;
    }
    case 'ITEM_PURCHASED':
      return `ITEM - Player ${label(event.participantId)} purchased item ${event.itemId}`;
    case 'SKILL_LEVEL_UP': {
      const skill = SKILL_KEYS[event.skillSlot] ?? String(event.skillSlot);
      return `SKILL - Player ${label(event.participantId)} leveled up ${skill}`;
    }
    case 'OTHER':
      return null;
    default: {
      const unhandled: never = event;
      return unhandled;
    }
  }
}

// 타임라인 전체를 시간순 로그로 요약 (프레임/이벤트 순서는 그대로 유지)
export function summarizeTimeline(matchId: string, data: unknown): string {
  const { info } = parseResponse(timelineSchema, data, 'timeline');
  const label = createLabeler(buildParticipantTable(info.participants));

  const lines = [`Match: ${matchId} - Frame interval: ${Math.floor(info.frameInterval / 1000)}s`];

  info.frames.forEach((frame, frameIndex) => {
    const prefix = formatFrameTime(frame.timestamp);
    frame.events.forEach((raw, eventIndex) => {
      const event = classifyEvent(raw, ['info', 'frames', frameIndex, 'events', eventIndex]);
      const line = formatEvent(event, label);
      if (line !== null) {
        lines.push(`${prefix} ${line}`);
      }
    });
  });

  return lines.join('\n');
}
