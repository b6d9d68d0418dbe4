import { describe, expect, it } from 'vitest';
import { RiotApiError } from '../utils/errors.js';
import {
  MAX_MASTERIES,
  formatAccount,
  formatMasteries,
  formatMatch,
  formatMatchIds,
  isEmptyPayload,
} from './formatter.service.js';

const participants = [
  {
    riotIdGameName: 'Alpha',
    championName: 'Ahri',
    kills: 5,
    deaths: 2,
    assists: 7,
    totalTimeSpentDead: 45,
    win: true,
    timePlayed: 1500,
  },
  {
    riotIdGameName: 'Beta',
    championName: 'Garen',
    kills: 1,
    deaths: 6,
    assists: 3,
    totalTimeSpentDead: 120,
    win: false,
    timePlayed: 1500,
  },
];

describe('formatAccount', () => {
  it('renders name, tag and puuid', () => {
    expect(formatAccount({ puuid: 'puuid-1', gameName: 'Faker', tagLine: 'KR1' })).toBe(
      'Name:Faker#KR1 PUUID: puuid-1',
    );
  });

  it('reports a missing field as a malformed response', () => {
    expect(() => formatAccount({ puuid: 'puuid-1', tagLine: 'KR1' })).toThrow(
      new RiotApiError('MALFORMED_RESPONSE', 'Malformed account response: missing or invalid field "gameName"'),
    );
  });
});

describe('formatMasteries', () => {
  const mastery = (championId: number, championPoints: number) => ({
    championId,
    championLevel: 7,
    championPoints,
    lastPlayTime: 1700000000000,
  });

  it('keeps the upstream order', () => {
    const output = formatMasteries([mastery(103, 5), mastery(86, 900), mastery(1, 30)]);
    expect(output.split('\n')).toEqual([
      'Champion 103: Level 7 - 5 pts',
      'Champion 86: Level 7 - 900 pts',
      'Champion 1: Level 7 - 30 pts',
    ]);
  });

  it('renders at most ten entries', () => {
    const entries = Array.from({ length: 12 }, (_, i) => mastery(i + 1, 1000 - i));
    const lines = formatMasteries(entries).split('\n');
    expect(MAX_MASTERIES).toBe(10);
    expect(lines).toHaveLength(10);
    expect(lines[0]).toBe('Champion 1: Level 7 - 1000 pts');
    expect(lines[9]).toBe('Champion 10: Level 7 - 991 pts');
  });

  it('does not validate entries past the first ten', () => {
    const entries: unknown[] = Array.from({ length: 10 }, (_, i) => mastery(i + 1, 50));
    entries.push({ unexpected: true });
    expect(formatMasteries(entries).split('\n')).toHaveLength(10);
  });

  it('reports a broken entry with its index', () => {
    expect(() => formatMasteries([{ championId: 1 }])).toThrow(
      'Malformed champion mastery response: missing or invalid field "0.championLevel"',
    );
  });

  it('reports a non-list body', () => {
    expect(() => formatMasteries({ status: 'weird' })).toThrow(
      'Malformed champion mastery response: missing or invalid field "(root)"',
    );
  });
});

describe('formatMatchIds', () => {
  it('returns every id when fewer than requested', () => {
    expect(formatMatchIds(['EUW1_1', 'EUW1_2', 'EUW1_3'], 5)).toBe('EUW1_1\nEUW1_2\nEUW1_3');
  });

  it('never exceeds the requested count', () => {
    expect(formatMatchIds(['A', 'B', 'C', 'D', 'E'], 2)).toBe('A\nB');
  });
});

describe('formatMatch', () => {
  it('renders the header and one line per participant in order', () => {
    const output = formatMatch({ info: { gameMode: 'CLASSIC', gameDuration: 1500, participants } });
    expect(output.split('\n')).toEqual([
      'Mode: CLASSIC - Duration: 25min',
      'Alpha - Ahri - 5/2/7 time spent dead45 - Win -1500',
      'Beta - Garen - 1/6/3 time spent dead120 - Loss -1500',
    ]);
  });

  it('floors the duration to whole minutes', () => {
    const output = formatMatch({ info: { gameMode: 'ARAM', gameDuration: 1559, participants: [] } });
    expect(output).toBe('Mode: ARAM - Duration: 25min');
  });

  it('reports a participant missing its stats', () => {
    const [first] = participants;
    const broken = { ...first, kills: undefined };
    expect(() => formatMatch({ info: { gameMode: 'CLASSIC', gameDuration: 60, participants: [broken] } })).toThrow(
      'Malformed match response: missing or invalid field "info.participants.0.kills"',
    );
  });
});

describe('isEmptyPayload', () => {
  it.each([[undefined], [null], [''], [[]], [{}]])('treats %j as empty', (value) => {
    expect(isEmptyPayload(value)).toBe(true);
  });

  it.each([[['x']], [{ a: 1 }], [0], ['body']])('treats %j as present', (value) => {
    expect(isEmptyPayload(value)).toBe(false);
  });
});
