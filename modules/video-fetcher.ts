import axios, { type AxiosInstance } from 'axios'
import type { Interval, Query, SearchWindow, TimezoneId, VideoId, YoutubeSearchList } from '../types';
import { DiscoveryRequestError, MalformedResponseError, describeRequestFailure } from './errors';
import { addDays } from './interval-partitioner';
import { localToUtc } from './time-normalizer';

export const YOUTUBE_SEARCH_URL = 'https://youtube.googleapis.com/youtube/v3/search'
export const MAX_SEARCH_RESULTS = 50

// publishedBefore is exclusive, so the window ends at the midnight after interval.end
export const toSearchWindow = (interval: Interval, timezone: TimezoneId): SearchWindow => ({
    publishedAfter: localToUtc(interval.start, timezone),
    publishedBefore: localToUtc(addDays(interval.end, 1), timezone),
})

export interface VideoFetcherOptions {
    relevanceLanguage?: string;
    client?: AxiosInstance;
}

export default class VideoFetcher {
    private youtubeDataKey: string;
    private relevanceLanguage: string;
    private client: AxiosInstance;

    constructor(youtubeDataKey: string, { relevanceLanguage = 'id', client = axios }: VideoFetcherOptions = {}) {
        this.youtubeDataKey = youtubeDataKey;
        this.relevanceLanguage = relevanceLanguage;
        this.client = client;
    }

    searchWindow = (interval: Interval, timezone: TimezoneId): SearchWindow => toSearchWindow(interval, timezone)

    /**
     * Ids of the (at most 50) most viewed videos matching `query` published
     * inside `interval`, in the order YouTube returned them. Only the first
     * result page is read.
     */
    fetchVideoIdsInInterval = async (interval: Interval, query: Query, timezone: TimezoneId): Promise<VideoId[]> => {
        const { publishedAfter, publishedBefore } = this.searchWindow(interval, timezone);

        let data: YoutubeSearchList;
        try {
            const response = await this.client.get<YoutubeSearchList>(YOUTUBE_SEARCH_URL, {
                params: {
                    key: this.youtubeDataKey,
                    part: 'snippet',
                    type: 'video',
                    maxResults: MAX_SEARCH_RESULTS,
                    order: 'viewCount',
                    publishedAfter,
                    publishedBefore,
                    q: query,
                    relevanceLanguage: this.relevanceLanguage,
                },
                headers: { Accept: 'application/json' },
            })
            data = response.data;
        } catch (err) {
            throw new DiscoveryRequestError(interval, describeRequestFailure(err), { cause: err });
        }

        if (!Array.isArray(data?.items)) {
            throw new MalformedResponseError(`search response for ${interval.start} to ${interval.end} has no items list`);
        }
        return data.items.flatMap(item => item.id?.videoId ? [item.id.videoId] : []);
    }
}
