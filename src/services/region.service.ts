import { RiotApiError } from '../utils/errors.js';

export const REGION_CODES = ['na', 'br', 'lan', 'las', 'euw', 'eune', 'tr', 'me', 'kr', 'jp'] as const;

export type RegionCode = (typeof REGION_CODES)[number];

interface RegionRouting {
  /** account-v1, match-v5 */
  regional: string;
  /** champion-mastery-v4 등 샤드별 API */
  platform: string;
}

const REGION_ROUTING: Record<RegionCode, RegionRouting> = {
  na: { regional: 'https://americas.api.riotgames.com', platform: 'https://na1.api.riotgames.com' },
  br: { regional: 'https://americas.api.riotgames.com', platform: 'https://br1.api.riotgames.com' },
  lan: { regional: 'https://americas.api.riotgames.com', platform: 'https://la1.api.riotgames.com' },
  las: { regional: 'https://americas.api.riotgames.com', platform: 'https://la2.api.riotgames.com' },
  euw: { regional: 'https://europe.api.riotgames.com', platform: 'https://euw1.api.riotgames.com' },
  eune: { regional: 'https://europe.api.riotgames.com', platform: 'https://eun1.api.riotgames.com' },
  tr: { regional: 'https://europe.api.riotgames.com', platform: 'https://tr1.api.riotgames.com' },
  me: { regional: 'https://europe.api.riotgames.com', platform: 'https://me1.api.riotgames.com' },
  kr: { regional: 'https://asia.api.riotgames.com', platform: 'https://kr.api.riotgames.com' },
  jp: { regional: 'https://asia.api.riotgames.com', platform: 'https://jp1.api.riotgames.com' },
};

export function isRegionCode(code: string): code is RegionCode {
  return REGION_CODES.some((region) => region === code);
}

function resolveRegion(code: string): RegionRouting {
  const normalized = code.trim().toLowerCase();
  if (!isRegionCode(normalized)) {
    throw new RiotApiError(
      'UNKNOWN_REGION',
      `Unknown region "${code}". Supported regions: ${REGION_CODES.join(', ')}`,
    );
  }
  return REGION_ROUTING[normalized];
}

export function regionalBaseUrl(code: string): string {
  return resolveRegion(code).regional;
}

export function platformBaseUrl(code: string): string {
  return resolveRegion(code).platform;
}
