// backend/src/config.ts
import path from 'path';

export interface AppConfig {
  port: number;
  dataDir: string;
  /** Shared reviewer secret. Undefined disables the coach routes. */
  coachAccessToken: string | undefined;
  allowPartialCompletion: boolean;
  /** Respondent sessions idle this long are discarded. */
  sessionIdleMinutes: number;
  reportTimeZone: string;
  corsOrigin: string;
}

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const port = Number(env.PORT) || 3001;

  const reportTimeZone = env.REPORT_TIME_ZONE || 'UTC';
  if (!isValidTimeZone(reportTimeZone)) {
    throw new Error(`REPORT_TIME_ZONE "${reportTimeZone}" is not a valid IANA time zone.`);
  }

  const sessionIdleMinutes = env.SESSION_IDLE_MINUTES ? Number(env.SESSION_IDLE_MINUTES) : 120;
  if (!Number.isFinite(sessionIdleMinutes) || sessionIdleMinutes <= 0) {
    throw new Error(`SESSION_IDLE_MINUTES "${env.SESSION_IDLE_MINUTES}" must be a positive number.`);
  }

  const coachAccessToken = env.COACH_ACCESS_TOKEN?.trim() || undefined;
  if (!coachAccessToken) {
    console.warn('⚠️ COACH_ACCESS_TOKEN missing. Coach view is disabled.');
  }

  return {
    port,
    dataDir: path.resolve(env.DATA_DIR || 'data'),
    coachAccessToken,
    allowPartialCompletion: env.ALLOW_PARTIAL_COMPLETION === 'true',
    sessionIdleMinutes,
    reportTimeZone,
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:5173',
  };
};
