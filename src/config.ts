import { z } from 'zod';
import { ConfigError } from './utils/errors.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export interface AppConfig {
  riotApiKey: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  RIOT_API_KEY: z
    .string({ required_error: 'RIOT_API_KEY is not set' })
    .trim()
    .min(1, 'RIOT_API_KEY is empty'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

// 환경 변수에서 서버 설정 읽기 (.env 는 호출 측에서 dotenv 로 먼저 로드)
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return {
    riotApiKey: parsed.data.RIOT_API_KEY,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
