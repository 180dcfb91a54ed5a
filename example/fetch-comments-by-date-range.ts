// Usage: fetch-comments-by-date-range.ts <start YYYY-MM-DD> <end YYYY-MM-DD> <query>
//   fetch-comments-by-date-range.ts '2024-06-01' '2024-06-07' 'foo bar'
//   fetch-comments-by-date-range.ts '2024-06-01' '2024-06-07' 'foo|bar -baz'
import { Services, loadConfig, loadEnvFile } from '../modules';

const argv = process.argv.slice(2)

if (argv.length !== 3) {
    console.error('3 arguments are required: <start YYYY-MM-DD> <end YYYY-MM-DD> <query>')
    process.exit(1)
}

const [start, end, query] = argv

try {
    loadEnvFile()
    const config = loadConfig()

    const videoFetcher = new Services.VideoFetcher(config.youtubeDataKey, { relevanceLanguage: config.relevanceLanguage })
    const commentFetcher = new Services.CommentFetcher(config.youtubeDataKey)
    const collector = new Services.CommentCollector(config, { videoFetcher, commentFetcher })

    const result = await collector.run({ start, end }, query)
    console.log(`total result: ${result.recordCount} comments, ${result.videoCount} videos, ${result.intervalCount} intervals`)

    if (result.failedIntervals.length || result.failedVideoIds.length) process.exitCode = 1
} catch (err) {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err)
    process.exitCode = 1
}
