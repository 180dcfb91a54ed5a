import pLimit from 'p-limit';
import type { CollectResult, CommentRecord, DateRange, Interval, Query, StatusLogger, TimezoneId, VideoId } from '../types';
import CommentFetcher from './comment-fetcher';
import CommentTsvWriter from './comment-writer';
import { MAX_SPAN_DAYS, partition } from './interval-partitioner';
import { assertTimezone } from './time-normalizer';
import type VideoFetcher from './video-fetcher';

export interface CollectorOptions {
    timezone: TimezoneId;
    outputFile: string;
    maxSpanDays?: number;
    concurrency?: number;
    failFast?: boolean;
}

export interface CollectorServices {
    videoFetcher: Pick<VideoFetcher, 'searchWindow' | 'fetchVideoIdsInInterval'>;
    commentFetcher: Pick<CommentFetcher, 'fetchCommentsByVideoId'>;
    logger?: StatusLogger;
}

type VideoComments =
    | { videoId: VideoId, records: CommentRecord[] }
    | { videoId: VideoId, error: unknown }

export default class CommentCollector {
    private timezone: TimezoneId;
    private outputFile: string;
    private maxSpanDays: number;
    private concurrency: number;
    private failFast: boolean;
    private videoFetcher: CollectorServices['videoFetcher'];
    private commentFetcher: CollectorServices['commentFetcher'];
    private logger: StatusLogger;

    constructor(options: CollectorOptions, services: CollectorServices) {
        this.timezone = options.timezone;
        this.outputFile = options.outputFile;
        this.maxSpanDays = options.maxSpanDays ?? MAX_SPAN_DAYS;
        this.concurrency = options.concurrency ?? 1;
        this.failFast = options.failFast ?? false;
        this.videoFetcher = services.videoFetcher;
        this.commentFetcher = services.commentFetcher;
        this.logger = services.logger ?? console;
    }

    run = async (range: DateRange, query: Query): Promise<CollectResult> => {
        // everything that can be rejected locally is rejected before the output file is touched
        assertTimezone(this.timezone);
        const intervals = partition(range, this.maxSpanDays);

        const result: CollectResult = {
            recordCount: 0,
            intervalCount: 0,
            videoCount: 0,
            failedIntervals: [],
            failedVideoIds: [],
        }

        this.logger.log(`Fetching YouTube comments from ${range.start} to ${range.end} in ${this.maxSpanDays}-day intervals (${this.timezone})...\n`);

        const writer = await CommentTsvWriter.open(this.outputFile);
        try {
            for (const interval of intervals) {
                result.intervalCount++;
                await this.collectInterval(interval, query, writer, result);
            }
        } finally {
            await writer.close();
        }
        result.recordCount = writer.recordCount;

        this.logger.log(`YouTube comments saved to ${this.outputFile} (${result.recordCount} comments from ${result.videoCount} videos)`);
        if (result.failedIntervals.length || result.failedVideoIds.length) {
            this.logger.warn(`failed: ${result.failedIntervals.length} intervals, ${result.failedVideoIds.length} videos`);
        }
        return result;
    }

    private collectInterval = async (interval: Interval, query: Query, writer: CommentTsvWriter, result: CollectResult): Promise<void> => {
        let videoIds: VideoId[];
        try {
            const { publishedAfter, publishedBefore } = this.videoFetcher.searchWindow(interval, this.timezone);
            this.logger.log(`Processing interval: ${interval.start} to ${interval.end} (${publishedAfter} ~ ${publishedBefore})`);
            videoIds = await this.videoFetcher.fetchVideoIdsInInterval(interval, query, this.timezone);
        } catch (err) {
            if (this.failFast) throw err;
            this.logger.error(err instanceof Error ? err.message : err);
            result.failedIntervals.push(interval);
            return;
        }

        this.logger.log(`Found ${videoIds.length} videos for this interval`);
        this.logger.log(`Fetching comments for each video \n`);
        result.videoCount += videoIds.length;

        const limit = pLimit(this.concurrency);
        const pending = videoIds.map(videoId => limit(() => this.fetchVideoComments(videoId)));

        // awaited in discovery order so rows keep that order whatever finishes first
        for (const task of pending) {
            const fetched = await task;
            if ('error' in fetched) {
                if (this.failFast) {
                    limit.clearQueue();
                    throw fetched.error;
                }
                this.logger.error(fetched.error instanceof Error ? fetched.error.message : fetched.error);
                result.failedVideoIds.push(fetched.videoId);
                continue;
            }
            for (const record of fetched.records) await writer.write(record);
        }
    }

    private fetchVideoComments = async (videoId: VideoId): Promise<VideoComments> => {
        try {
            return { videoId, records: await this.commentFetcher.fetchCommentsByVideoId(videoId) };
        } catch (error) {
            return { videoId, error };
        }
    }
}
