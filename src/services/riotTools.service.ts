import type { FetchResult } from '../types/riot.types.js';
import { RiotApiError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  formatAccount,
  formatMasteries,
  formatMatch,
  formatMatchIds,
  isEmptyPayload,
} from './formatter.service.js';
import type RiotApiService from './riotApi.service.js';
import { summarizeTimeline } from './timeline.service.js';

export const NO_ACCOUNT_MESSAGE = 'Found no account with that name in the server';
export const NO_MASTERIES_MESSAGE = 'Account does not exist on region';
export const NO_MATCHES_MESSAGE = 'Account has no matches or does not exist';
export const NO_MATCH_MESSAGE = 'Match does not exist';

/**
 * MCP 툴 5종의 실제 동작.
 * 모든 메서드는 문자열을 반환하며 어떤 실패도 throw 하지 않는다.
 */
class RiotToolsService {
  constructor(private readonly riotApi: RiotApiService) {}

  async getPlayerId(region: string, name: string, tagLine: string): Promise<string> {
    return this.run('get_player_id', async () =>
      this.render(await this.riotApi.getAccountByRiotId(region, name, tagLine), NO_ACCOUNT_MESSAGE, formatAccount),
    );
  }

  async getChampionMasteries(puuid: string, region: string): Promise<string> {
    return this.run('get_champion_masteries', async () =>
      this.render(await this.riotApi.getChampionMasteries(region, puuid), NO_MASTERIES_MESSAGE, formatMasteries),
    );
  }

  async getNewestMatches(region: string, puuid: string, count: number): Promise<string> {
    return this.run('get_newest_matches', async () =>
      this.render(await this.riotApi.getMatchIds(region, puuid, count), NO_MATCHES_MESSAGE, (data) =>
        formatMatchIds(data, count),
      ),
    );
  }

  async getMatchById(region: string, matchId: string): Promise<string> {
    return this.run('get_match_by_id', async () =>
      this.render(await this.riotApi.getMatch(region, matchId), NO_MATCH_MESSAGE, formatMatch),
    );
  }

  async getMatchTimelineById(region: string, matchId: string): Promise<string> {
    return this.run('get_match_timeline_by_id', async () =>
      this.render(await this.riotApi.getMatchTimeline(region, matchId), NO_MATCH_MESSAGE, (data) =>
        summarizeTimeline(matchId, data),
      ),
    );
  }

  // 에러는 메시지 그대로, 빈 응답은 툴별 안내 문구로
  private render(result: FetchResult, emptyMessage: string, format: (data: unknown) => string): string {
    if (!result.ok) return result.error.message;
    if (isEmptyPayload(result.data)) return emptyMessage;
    return format(result.data);
  }

  private async run(tool: string, action: () => Promise<string>): Promise<string> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof RiotApiError) {
        logger.warn('TOOL_FAIL', `${tool}: ${error.message}`, { kind: error.kind });
        return error.message;
      }
      logger.error('TOOL_ERROR', `${tool}: ${errorMessage(error)}`);
      return `Unexpected error: ${errorMessage(error)}`;
    }
  }
}

export default RiotToolsService;
