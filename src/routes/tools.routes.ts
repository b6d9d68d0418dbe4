import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { REGION_CODES } from '../services/region.service.js';
import type RiotToolsService from '../services/riotTools.service.js';

const region = z.string().describe(`Region code, one of: ${REGION_CODES.join(', ')}`);
const puuid = z.string().min(1).describe('Player PUUID (use get_player_id to find it)');
const matchId = z.string().min(1).describe('Match id, e.g. EUW1_1234567890');

function textResult(text: string) {
  return {
    content: [{ type: 'text' as const, text }]
  };
}

// 툴 등록 (이름/파라미터는 에이전트에게 노출되는 공개 인터페이스)
export function registerRiotTools(server: McpServer, tools: RiotToolsService): void {
  server.tool(
    'get_player_id',
    'Finds the PUUID of a player by Riot ID (game name and tag line).',
    {
      region,
      name: z.string().min(1).describe('Riot ID game name, passed through as typed'),
      tagLine: z.string().min(1).describe('Riot ID tag line without the leading #'),
    },
    async (args) => textResult(await tools.getPlayerId(args.region, args.name, args.tagLine)),
  );

  server.tool(
    'get_champion_masteries',
    'Lists the top 10 champion masteries of an account on a region.',
    { puuid, region },
    async (args) => textResult(await tools.getChampionMasteries(args.puuid, args.region)),
  );

  server.tool(
    'get_newest_matches',
    'Lists the newest match ids of a player, newest first.',
    {
      region,
      puuid,
      count: z.number().int().positive().max(100).describe('How many match ids to return (1-100)'),
    },
    async (args) => textResult(await tools.getNewestMatches(args.region, args.puuid, args.count)),
  );

  server.tool(
    'get_match_by_id',
    'Shows game mode, duration and per-player stats of a match. Refer to players by name and champion.',
    { region, matchId },
    async (args) => textResult(await tools.getMatchById(args.region, args.matchId)),
  );

  server.tool(
    'get_match_timeline_by_id',
    'Returns the key events of a match timeline: kills, buildings destroyed, elite monsters, item purchases and skill level ups.',
    { region, matchId },
    async (args) => textResult(await tools.getMatchTimelineById(args.region, args.matchId)),
  );
}
