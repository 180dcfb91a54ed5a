import appRootPath from 'app-root-path';
import dotenv from 'dotenv';
import path from 'path';
import type { HarvesterConfig } from '../types';
import { ConfigurationError } from './errors';
import { MAX_SPAN_DAYS } from './interval-partitioner';
import { assertTimezone, resolveLocalTimezone } from './time-normalizer';

export const ENV_FILE_PATH = path.join(appRootPath.path, 'env', '.env')
export const DEFAULT_OUTPUT_FILE = path.join(appRootPath.path, 'youtube_comments.tsv')
export const DEFAULT_RELEVANCE_LANGUAGE = 'id'

type Env = Record<string, string | undefined>

export const loadEnvFile = (envPath: string = ENV_FILE_PATH): void => {
    dotenv.config({ path: envPath })
}

const positiveInteger = (env: Env, key: string, fallback: number): number => {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
    return value;
}

export const loadConfig = (env: Env = process.env): HarvesterConfig => {
    const youtubeDataKey = env.YOUTUBE_DATA_API_KEY || env.YOUTUBE_API_KEY;
    if (!youtubeDataKey) throw new ConfigurationError(`YOUTUBE_DATA_API_KEY is not set (looked in the environment and ${ENV_FILE_PATH})`);

    const timezone = env.LOCAL_TIMEZONE?.trim() || resolveLocalTimezone();
    assertTimezone(timezone);

    return {
        youtubeDataKey,
        timezone,
        outputFile: env.OUTPUT_FILE ? path.resolve(env.OUTPUT_FILE) : DEFAULT_OUTPUT_FILE,
        maxSpanDays: positiveInteger(env, 'MAX_SPAN_DAYS', MAX_SPAN_DAYS),
        relevanceLanguage: env.RELEVANCE_LANGUAGE?.trim() || DEFAULT_RELEVANCE_LANGUAGE,
        concurrency: positiveInteger(env, 'COMMENT_FETCH_CONCURRENCY', 1),
        failFast: ['true', '1'].includes((env.FAIL_FAST ?? '').trim().toLowerCase()),
    }
}
