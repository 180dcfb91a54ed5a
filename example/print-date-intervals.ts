// Dry run: shows how a date range is split and which UTC window each search would use
import { loadEnvFile, partition, resolveLocalTimezone } from '../modules';
import { toSearchWindow } from '../modules/video-fetcher';

const argv = process.argv.slice(2)

if (argv.length !== 2) {
    console.error('2 arguments are required: <start YYYY-MM-DD> <end YYYY-MM-DD>')
    process.exit(1)
}

loadEnvFile()
const timezone = process.env.LOCAL_TIMEZONE || resolveLocalTimezone()
const maxSpanDays = Number(process.env.MAX_SPAN_DAYS || 3)

const [start, end] = argv
let count = 0
for (let interval of partition({ start, end }, maxSpanDays)) {
    const { publishedAfter, publishedBefore } = toSearchWindow(interval, timezone)
    console.log(`${interval.start} ~ ${interval.end}\t${publishedAfter} ~ ${publishedBefore}`)
    count++
}
console.log(`total intervals: ${count} (${timezone})`)
