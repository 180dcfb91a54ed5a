interface YoutubeCommonField {
    kind: string;
    etag: string
}

interface YoutubeCommonPagenation {
    nextPageToken?: string;
    prevPageToken?: string;
    pageInfo: {
        totalResults: number;
        resultsPerPage: number;
    }
}

export interface YoutubeSearchList extends YoutubeCommonField, YoutubeCommonPagenation {
    regionCode?: string;
    items?: YoutubeSearchResult[];
}

export interface YoutubeSearchResult extends YoutubeCommonField {
    // channel/playlist results carry channelId or playlistId instead of videoId
    id?: {
        kind: string;
        videoId?: string;
        channelId?: string;
        playlistId?: string;
    };
    snippet?: {
        publishedAt: string;
        channelId: string;
        title: string;
        description: string;
        channelTitle: string;
        liveBroadcastContent: string;
    };
}

export interface YoutubeCommentThreadList extends YoutubeCommonField, YoutubeCommonPagenation {
    items?: YoutubeCommentThread[]
}

export interface YoutubeCommentThread extends YoutubeCommonField {
    id: string;
    snippet?: {
        channelId: string;
        videoId: string;
        topLevelComment?: YoutubeComment;
        canReply: boolean;
        totalReplyCount: number;
        isPublic: boolean;
    };
}

export interface YoutubeComment extends YoutubeCommonField {
    id: string;
    snippet?: {
        authorDisplayName: string;
        authorProfileImageUrl: string;
        authorChannelUrl?: string;
        authorChannelId?: {
            value?: string;
        };
        channelId: string;
        videoId?: string;
        textDisplay: string;
        textOriginal: string;
        canRate: boolean;
        likeCount: number;
        publishedAt: string; // ISO 8601, UTC
        updatedAt: string;
    }
}

export interface YoutubeErrorResponse {
    error?: {
        code: number;
        message: string;
        errors?: {
            message: string;
            domain: string;
            reason: string;
        }[];
    }
}

// YYYY-MM-DD, no time of day, no zone
export type CalendarDate = string;
// IANA zone name, e.g. Asia/Jakarta
export type TimezoneId = string;
// YYYY-MM-DDTHH:MM:SSZ
export type UtcInstantString = string;
export type LocalInstantString = string;
export type VideoId = string;
// passed to YouTube verbatim, '-term' and 'a|b' operators included
export type Query = string;

export interface DateRange {
    readonly start: CalendarDate;
    readonly end: CalendarDate;
}

export type Interval = DateRange;

export interface SearchWindow {
    publishedAfter: UtcInstantString;
    publishedBefore: UtcInstantString;
}

export const COMMENT_PLATFORM = 'YouTube';

export interface CommentRecord {
    platform: typeof COMMENT_PLATFORM;
    postedAt: string;
    comment: string;
}

export interface CollectResult {
    recordCount: number;
    intervalCount: number;
    videoCount: number;
    failedIntervals: Interval[];
    failedVideoIds: VideoId[];
}

export interface HarvesterConfig {
    youtubeDataKey: string;
    timezone: TimezoneId;
    outputFile: string;
    maxSpanDays: number;
    relevanceLanguage: string;
    concurrency: number;
    failFast: boolean;
}

export type StatusLogger = Pick<Console, 'log' | 'warn' | 'error'>;
