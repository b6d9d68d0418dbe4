import axios, { AxiosError, type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import type { FetchResult } from '../types/riot.types.js';
import { RiotApiError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { platformBaseUrl, regionalBaseUrl } from './region.service.js';

export const REQUEST_TIMEOUT_MS = 30_000;

export interface RiotApiServiceOptions {
  apiKey: string;
  /** 테스트에서 네트워크 대신 사용할 axios adapter */
  adapter?: CreateAxiosDefaults['adapter'];
}

// axios 에러를 툴 응답용 RiotApiError 로 변환 (429 > 404 > 403 > 401 > 기타 순)
export function toRiotApiError(error: unknown): RiotApiError {
  if (!axios.isAxiosError(error)) {
    return new RiotApiError('NETWORK_ERROR', `Network error ${errorMessage(error)}`);
  }

  const response = error.response;
  if (response) {
    const status = response.status;
    if (status === 429) {
      const header = response.headers['retry-after'];
      const retryAfter = header !== undefined && header !== null ? String(header) : undefined;
      return new RiotApiError(
        'RATE_LIMITED',
        `Rate limit hit. Retry after ${retryAfter ?? 'unknown'} seconds.`,
        { status, retryAfter },
      );
    }
    if (status === 404) {
      return new RiotApiError('NOT_FOUND', 'Resource not found', { status });
    }
    if (status === 403) {
      return new RiotApiError('FORBIDDEN', 'Invalid or expired API key.', { status });
    }
    if (status === 401) {
      return new RiotApiError('UNAUTHORIZED', 'Unauthorized. Check your API key.', { status });
    }
    return new RiotApiError('HTTP_ERROR', `Riot API request failed with status ${status}`, { status });
  }

  if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
    return new RiotApiError('TIMEOUT', 'Request timeout');
  }
  return new RiotApiError('NETWORK_ERROR', `Network error ${error.message}`);
}

class RiotApiService {
  private client: AxiosInstance;

  constructor({ apiKey, adapter }: RiotApiServiceOptions) {
    this.client = axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      headers: {
        'X-Riot-Token': apiKey
      },
      ...(adapter ? { adapter } : {})
    });
  }

  // 단일 GET 요청. 재시도 없이 결과 또는 분류된 에러를 반환 (throw 안 함)
  async get(url: string): Promise<FetchResult> {
    try {
      const response = await this.client.get<unknown>(url);
      return { ok: true, data: response.data };
    } catch (error) {
      const riotError = toRiotApiError(error);
      if (riotError.kind === 'RATE_LIMITED') {
        logger.warn('RIOT_429', 'rate limit Riot API', { url, retryAfter: riotError.retryAfter });
      } else {
        logger.warn('RIOT_REQ_FAIL', riotError.message, { kind: riotError.kind, status: riotError.status, url });
      }
      return { ok: false, error: riotError };
    }
  }

  // 계정 정보 가져오기 (gameName#tagLine), 대소문자는 그대로 전달
  async getAccountByRiotId(region: string, gameName: string, tagLine: string): Promise<FetchResult> {
    const url = `${regionalBaseUrl(region)}/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`;
    return this.get(url);
  }

  // 챔피언 숙련도 (플랫폼 서버)
  async getChampionMasteries(region: string, puuid: string): Promise<FetchResult> {
    const url = `${platformBaseUrl(region)}/lol/champion-mastery/v4/champion-masteries/by-puuid/${encodeURIComponent(puuid)}`;
    return this.get(url);
  }

  // 최근 매치 ID 목록
  async getMatchIds(region: string, puuid: string, count: number): Promise<FetchResult> {
    const url = new URL(`${regionalBaseUrl(region)}/lol/match/v5/matches/by-puuid/${encodeURIComponent(puuid)}/ids`);
    url.searchParams.set('count', String(count));
    return this.get(url.toString());
  }

  async getMatch(region: string, matchId: string): Promise<FetchResult> {
    const url = `${regionalBaseUrl(region)}/lol/match/v5/matches/${encodeURIComponent(matchId)}`;
    return this.get(url);
  }

  async getMatchTimeline(region: string, matchId: string): Promise<FetchResult> {
    const url = `${regionalBaseUrl(region)}/lol/match/v5/matches/${encodeURIComponent(matchId)}/timeline`;
    return this.get(url);
  }
}

export default RiotApiService;
