import { Services, loadConfig, loadEnvFile, utcToLocal } from '../modules';

const argv = process.argv.slice(2)

if (argv.length !== 1) {
    console.error('1 argument is required: <videoId>')
    process.exit(1)
}

const videoId = argv[0]

loadEnvFile()
const config = loadConfig()

const commentFetcher = new Services.CommentFetcher(config.youtubeDataKey)
const comments = await commentFetcher.fetchCommentsByVideoId(videoId)

for (let comment of comments) {
    console.log(`${utcToLocal(comment.postedAt, config.timezone)}  ${comment.comment.replace(/\r/g, '').replace(/\n/g, ' ')}`)
}
console.log(comments.length)
