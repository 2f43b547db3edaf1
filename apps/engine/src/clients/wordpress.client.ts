import path from 'path';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DownstreamError } from '../errors';
import { classifyHttpError } from './http-errors';
import { PhotoStorage } from './photo-storage';

export interface MediaUpload {
    path: string;
    filename: string;
}

export interface PublishedMedia {
    media_id: number;
    media_url: string;
}

export interface PublishingClient {
    uploadMedia(upload: MediaUpload, signal?: AbortSignal): Promise<PublishedMedia>;
}

export interface WordPressConfig {
    url: string;
    user: string;
    appPassword: string;
    timeoutMs: number;
}

const MEDIA_ENDPOINT = '/wp-json/wp/v2/media';

const CONTENT_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
};

const MediaResponse = z.object({
    id: z.number().int(),
    source_url: z.string().min(1),
});

export function contentTypeFor(filename: string): string {
    return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/** Uploads files to the WordPress media library over the REST API. */
export class WordPressMediaClient implements PublishingClient {
    constructor(
        private readonly http: AxiosInstance,
        private readonly storage: PhotoStorage,
    ) { }

    static create(config: WordPressConfig, storage: PhotoStorage): WordPressMediaClient {
        return new WordPressMediaClient(axios.create({
            baseURL: config.url.replace(/\/+$/, ''),
            timeout: config.timeoutMs,
            auth: { username: config.user, password: config.appPassword },
            headers: { Accept: 'application/json' },
        }), storage);
    }

    async uploadMedia(upload: MediaUpload, signal?: AbortSignal): Promise<PublishedMedia> {
        const bytes = await this.storage.read(upload.path);

        let data: unknown;
        try {
            const res = await this.http.post<unknown>(MEDIA_ENDPOINT, bytes, {
                headers: {
                    'Content-Type': contentTypeFor(upload.filename),
                    'Content-Disposition': `attachment; filename="${upload.filename}"`,
                },
                signal,
            });
            data = res.data;
        } catch (err) {
            throw classifyHttpError(err, 'upload');
        }

        const parsed = MediaResponse.safeParse(data);
        if (!parsed.success) {
            throw new DownstreamError('media endpoint returned no id/source_url', 'permanent');
        }
        return { media_id: parsed.data.id, media_url: parsed.data.source_url };
    }
}
