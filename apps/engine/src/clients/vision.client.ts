import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Adjustments } from '@photoflow/sdk';
import { DownstreamError } from '../errors';
import { classifyHttpError } from './http-errors';

export interface CorrectionRequest {
    sku_code: string;
    photo_index: number;
    source_path: string;
    /** Where the service writes the corrected artifact. */
    target_path: string;
    product_name: string;
    locale: string;
}

export interface CorrectionResult {
    corrected_path: string;
    adjustments: Adjustments;
}

export interface VisionClient {
    correct(request: CorrectionRequest, signal?: AbortSignal): Promise<CorrectionResult>;
}

export interface VisionClientConfig {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
}

const multiplier = z.number().positive().max(4);

const CorrectionResponse = z.object({
    corrected_path: z.string().min(1),
    adjustments: z.object({
        brightness: multiplier.optional(),
        contrast: multiplier.optional(),
        saturation: multiplier.optional(),
        sharpness: multiplier.optional(),
    }),
});

export function parseCorrection(data: unknown): CorrectionResult {
    const parsed = CorrectionResponse.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.join('.') || 'response';
        throw new DownstreamError(
            `vision service returned a malformed correction (${where}: ${issue?.message ?? 'invalid'})`,
            'permanent',
        );
    }
    return parsed.data;
}

/**
 * Client for the color-analysis service. The service inspects the photo, renders
 * the corrected artifact at `target_path` and reports the multipliers it applied.
 */
export class HttpVisionClient implements VisionClient {
    constructor(private readonly http: AxiosInstance) { }

    static create(config: VisionClientConfig): HttpVisionClient {
        return new HttpVisionClient(axios.create({
            baseURL: config.baseUrl.replace(/\/+$/, ''),
            timeout: config.timeoutMs,
            headers: {
                Authorization: `Bearer ${config.apiKey}`,
                Accept: 'application/json',
            },
        }));
    }

    async correct(request: CorrectionRequest, signal?: AbortSignal): Promise<CorrectionResult> {
        let data: unknown;
        try {
            const res = await this.http.post<unknown>('/v1/corrections', {
                sku_code: request.sku_code,
                photo_index: request.photo_index,
                source: request.source_path,
                target: request.target_path,
                context: { product_name: request.product_name, locale: request.locale },
            }, { signal });
            data = res.data;
        } catch (err) {
            throw classifyHttpError(err, 'vision correction');
        }
        return parseCorrection(data);
    }
}
