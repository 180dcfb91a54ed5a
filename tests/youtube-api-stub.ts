import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
    url: string;
    params: Record<string, unknown>;
}

export interface StubReply {
    status?: number;
    data: unknown;
}

type Route = (request: RecordedRequest) => StubReply;

/**
 * axios instance answering from `routes` (keyed by the last path segment,
 * e.g. 'search' or 'commentThreads') without touching the network.
 */
export const createYoutubeApiStub = (routes: Record<string, Route>) => {
    const requests: RecordedRequest[] = [];

    const client: AxiosInstance = axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            const url = config.url ?? '';
            const request: RecordedRequest = { url, params: { ...config.params } };
            requests.push(request);

            const route = routes[url.split('/').pop() ?? ''];
            const reply: StubReply = route ? route(request) : { status: 404, data: { error: { code: 404, message: 'Not Found' } } };
            const response: AxiosResponse = {
                data: reply.data,
                status: reply.status ?? 200,
                statusText: String(reply.status ?? 200),
                headers: {},
                config,
            };
            if (response.status >= 400) {
                throw new AxiosError(`Request failed with status code ${response.status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
            }
            return response;
        },
    });

    return { client, requests };
}

export const searchReply = (videoIds: string[]): StubReply => ({
    data: {
        kind: 'youtube#searchListResponse',
        etag: 'etag',
        pageInfo: { totalResults: videoIds.length, resultsPerPage: 50 },
        items: videoIds.map(videoId => ({
            kind: 'youtube#searchResult',
            etag: 'etag',
            id: { kind: 'youtube#video', videoId },
        })),
    },
});

export const commentThreadsReply = (comments: { publishedAt: string, textOriginal: string }[]): StubReply => ({
    data: {
        kind: 'youtube#commentThreadListResponse',
        etag: 'etag',
        pageInfo: { totalResults: comments.length, resultsPerPage: 100 },
        items: comments.map((comment, idx) => ({
            kind: 'youtube#commentThread',
            etag: 'etag',
            id: `thread-${idx}`,
            snippet: {
                channelId: 'channel',
                videoId: 'video',
                canReply: true,
                totalReplyCount: 0,
                isPublic: true,
                topLevelComment: {
                    kind: 'youtube#comment',
                    etag: 'etag',
                    id: `thread-${idx}`,
                    snippet: {
                        authorDisplayName: 'someone',
                        authorProfileImageUrl: '',
                        channelId: 'channel',
                        textDisplay: comment.textOriginal,
                        textOriginal: comment.textOriginal,
                        canRate: true,
                        likeCount: 0,
                        publishedAt: comment.publishedAt,
                        updatedAt: comment.publishedAt,
                    },
                },
            },
        })),
    },
});

export const errorReply = (status: number, reason: string, message: string = reason): StubReply => ({
    status,
    data: { error: { code: status, message, errors: [{ message, domain: 'youtube.commentThread', reason }] } },
});

export const silentLogger = () => {
    const lines: string[] = [];
    const capture = (...data: unknown[]) => { lines.push(data.map(String).join(' ')) };
    return { lines, logger: { log: capture, warn: capture, error: capture } };
}

export const rejectionOf = async <E extends Error>(promise: Promise<unknown>, errorClass: new (...args: never[]) => E): Promise<E> => {
    try {
        await promise;
    } catch (err) {
        if (err instanceof errorClass) return err;
        throw err;
    }
    throw new Error(`expected a rejection with ${errorClass.name}`);
}
