import CommentCollector from "./comment-collector";
import CommentFetcher from "./comment-fetcher";
import CommentTsvWriter from "./comment-writer";
import VideoFetcher from "./video-fetcher";

export { seperator, escapeTsvField, toTsvRow } from "./utils";
export { localToUtc, utcToLocal, resolveLocalTimezone } from "./time-normalizer";
export { addDays, daysBetween, partition, MAX_SPAN_DAYS } from "./interval-partitioner";
export { loadConfig, loadEnvFile } from "./config";
export * from "./errors";

export const Services = {
    CommentCollector, CommentFetcher, CommentTsvWriter, VideoFetcher
}
