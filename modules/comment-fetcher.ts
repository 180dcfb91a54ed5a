import axios, { type AxiosInstance } from 'axios'
import { COMMENT_PLATFORM } from '../types';
import type { CommentRecord, StatusLogger, VideoId, YoutubeCommentThread, YoutubeCommentThreadList } from '../types';
import { CommentRequestError, MalformedResponseError, describeRequestFailure } from './errors';

export const YOUTUBE_COMMENT_THREADS_URL = 'https://youtube.googleapis.com/youtube/v3/commentThreads'
export const MAX_COMMENT_THREADS = 100

export interface CommentFetcherOptions {
    client?: AxiosInstance;
    logger?: StatusLogger;
}

export default class CommentFetcher {
    private youtubeDataKey: string;
    private client: AxiosInstance;
    private logger: StatusLogger;

    constructor(youtubeDataKey: string, { client = axios, logger = console }: CommentFetcherOptions = {}) {
        this.youtubeDataKey = youtubeDataKey;
        this.client = client;
        this.logger = logger;
    }

    // first page only: the 100 most relevant top-level comments
    fetchCommentsByVideoId = async (videoId: VideoId): Promise<CommentRecord[]> => {
        let data: YoutubeCommentThreadList;
        try {
            const response = await this.client.get<YoutubeCommentThreadList>(YOUTUBE_COMMENT_THREADS_URL, {
                params: {
                    key: this.youtubeDataKey,
                    part: 'snippet',
                    maxResults: MAX_COMMENT_THREADS,
                    order: 'relevance',
                    videoId,
                },
                headers: { Accept: 'application/json' },
            });
            data = response.data;
        } catch (err) {
            const failure = describeRequestFailure(err);
            if (failure.reason === 'commentsDisabled') {
                this.logger.warn(`comments are disabled for videoId: ${videoId}`);
                return [];
            }
            throw new CommentRequestError(videoId, failure, { cause: err });
        }

        if (!Array.isArray(data?.items)) {
            throw new MalformedResponseError(`commentThreads response for videoId ${videoId} has no items list`);
        }
        return data.items.flatMap(thread => this.extractComment(thread));
    }

    private extractComment = (thread: YoutubeCommentThread): CommentRecord[] => {
        const snippet = thread.snippet?.topLevelComment?.snippet;
        if (!snippet) return [];
        return [{
            platform: COMMENT_PLATFORM,
            postedAt: snippet.publishedAt,
            comment: snippet.textOriginal,
        }];
    }
}
