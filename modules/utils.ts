import type { CommentRecord } from '../types';

export const seperator = '\t'

// backslash-escape \\ \t \n \r so a multi-line comment stays on one row
export const escapeTsvField = (str: string): string => {
    if (!str) return '';
    return str
        .replace(/\\/g, '\\\\')
        .replace(/\t/g, '\\t')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r')
}

export const toTsvRow = (record: CommentRecord): string =>
    [record.platform, record.postedAt, record.comment].map(escapeTsvField).join(seperator) + '\n'
