import path from 'path';
import type { PhotoTask, PublishResultEntry } from '@photoflow/sdk';
import { TaskStatus } from '../db/task.entity';
import { DataIntegrityError, asDownstreamError } from '../errors';
import { PublishingClient } from '../clients/wordpress.client';
import { AGENTS } from '../audit/audit-logger';
import { withTimeout } from '../utils/timeout';
import {
    PhotoFailure,
    StepContext,
    StepExecutor,
    StepRunResult,
    describeError,
    mergeByPhotoIndex,
} from './step-executor';

const TAG = '[publish]';

interface CorrectedPhoto {
    photo_index: number;
    corrected_path: string;
}

// Uploads are public as soon as they succeed, so publish_results must record every
// published photo even when the step as a whole fails; retries skip them.
export class PublishExecutor implements StepExecutor {
    readonly step = 'publish' as const;
    readonly agentName = AGENTS.publish;
    readonly from = TaskStatus.COLOR_CORRECTED;
    readonly to = TaskStatus.PUBLISHED;

    constructor(private readonly publisher: PublishingClient) { }

    validate(task: PhotoTask): void {
        this.correctedPhotos(task);
    }

    private correctedPhotos(task: PhotoTask): CorrectedPhoto[] {
        if (task.color_analysis.length === 0) {
            throw new DataIntegrityError(task.id, `${task.status} task has no color_analysis entries`);
        }

        const expected = task.metadata.photo_urls.length;
        if (task.color_analysis.length < expected) {
            throw new DataIntegrityError(task.id, `color_analysis covers ${task.color_analysis.length} of ${expected} photos`);
        }

        return task.color_analysis.map(entry => {
            if (entry.status !== 'completed' || !entry.corrected_path) {
                throw new DataIntegrityError(task.id, `photo ${entry.photo_index} has no corrected image`);
            }
            return { photo_index: entry.photo_index, corrected_path: entry.corrected_path };
        });
    }

    async run(task: PhotoTask, ctx: StepContext): Promise<StepRunResult> {
        const photos = this.correctedPhotos(task);
        const done = new Set(
            task.publish_results.filter(r => r.status === 'published').map(r => r.photo_index),
        );
        const results: PublishResultEntry[] = [];
        const failures: PhotoFailure[] = [];
        const attempted: number[] = [];
        const skipped: number[] = [];

        for (const photo of photos) {
            if (done.has(photo.photo_index)) {
                skipped.push(photo.photo_index);
                continue;
            }
            attempted.push(photo.photo_index);

            try {
                const media = await withTimeout(`publish of photo ${photo.photo_index}`, ctx.timeoutMs, signal =>
                    this.publisher.uploadMedia({
                        path: photo.corrected_path,
                        filename: path.basename(photo.corrected_path),
                    }, signal),
                );
                console.log(`${TAG} ${task.sku_code} photo ${photo.photo_index} published as media ${media.media_id}`);
                results.push({
                    photo_index: photo.photo_index,
                    status: 'published',
                    media_id: media.media_id,
                    media_url: media.media_url,
                });
            } catch (err) {
                const error = asDownstreamError(err);
                console.error(`${TAG} ${task.sku_code} photo ${photo.photo_index} failed (${error.kind}): ${error.message}`);
                failures.push({ photo_index: photo.photo_index, error });
                results.push({
                    photo_index: photo.photo_index,
                    status: 'failed',
                    media_id: null,
                    media_url: null,
                    error: describeError(error),
                });
            }
        }

        return {
            overall: failures.length === 0 ? 'succeeded' : 'failed',
            patch: { publish_results: mergeByPhotoIndex(task.publish_results, results) },
            attempted,
            skipped,
            failures,
        };
    }
}
