import { isAxiosError } from 'axios';
import type { Interval, VideoId, YoutubeErrorResponse } from '../types';

export class HarvesterError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidDateError extends HarvesterError {}

export class InvalidDateRangeError extends HarvesterError {}

export class InvalidTimezoneError extends HarvesterError {}

export class ConfigurationError extends HarvesterError {}

export class MalformedResponseError extends HarvesterError {}

interface RequestFailure {
    status?: number;
    reason?: string;
    detail: string;
}

export class DiscoveryRequestError extends HarvesterError {
    readonly status?: number;
    readonly reason?: string;

    constructor(readonly interval: Interval, failure: RequestFailure, options?: { cause?: unknown }) {
        super(`search request failed for ${interval.start} to ${interval.end}: ${failure.detail}`, options);
        this.status = failure.status;
        this.reason = failure.reason;
    }
}

export class CommentRequestError extends HarvesterError {
    readonly status?: number;
    readonly reason?: string;

    constructor(readonly videoId: VideoId, failure: RequestFailure, options?: { cause?: unknown }) {
        super(`commentThreads request failed for videoId ${videoId}: ${failure.detail}`, options);
        this.status = failure.status;
        this.reason = failure.reason;
    }
}

// Pulls the status and the first YouTube error reason out of whatever axios threw
export const describeRequestFailure = (err: unknown): RequestFailure => {
    if (!isAxiosError<YoutubeErrorResponse>(err)) {
        return { detail: err instanceof Error ? err.message : String(err) };
    }
    const status = err.response?.status;
    const body = err.response?.data?.error;
    const reason = body?.errors?.[0]?.reason;
    const detail = body
        ? `${body.code} ${reason ?? ''} ${body.message}`.replace(/\s+/g, ' ').trim()
        : status ? `HTTP ${status}` : err.message;
    return { status, reason, detail };
}
