import type { ColorAnalysisEntry, PhotoTask } from '@photoflow/sdk';
import { TaskStatus } from '../db/task.entity';
import { DataIntegrityError, asDownstreamError } from '../errors';
import { VisionClient } from '../clients/vision.client';
import { correctedPathFor } from '../clients/photo-storage';
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

const TAG = '[color-correction]';

export class ColorCorrectionExecutor implements StepExecutor {
    readonly step = 'color_correction' as const;
    readonly agentName = AGENTS.colorCorrection;
    readonly from = TaskStatus.UPLOADED;
    readonly to = TaskStatus.COLOR_CORRECTED;

    constructor(private readonly vision: VisionClient) { }

    validate(task: PhotoTask): void {
        if (task.metadata.photo_urls.length === 0) {
            throw new DataIntegrityError(task.id, 'task has no photos to color-correct');
        }
    }

    async run(task: PhotoTask, ctx: StepContext): Promise<StepRunResult> {
        this.validate(task);

        const done = new Set(
            task.color_analysis.filter(e => e.status === 'completed').map(e => e.photo_index),
        );
        const entries: ColorAnalysisEntry[] = [];
        const failures: PhotoFailure[] = [];
        const attempted: number[] = [];
        const skipped: number[] = [];
        const total = task.metadata.photo_urls.length;

        for (const [i, sourcePath] of task.metadata.photo_urls.entries()) {
            const photoIndex = i + 1;
            if (done.has(photoIndex)) {
                skipped.push(photoIndex);
                continue;
            }
            attempted.push(photoIndex);
            console.log(`${TAG} ${task.sku_code} photo ${photoIndex}/${total}: ${sourcePath}`);

            try {
                const result = await withTimeout(`vision correction for photo ${photoIndex}`, ctx.timeoutMs, signal =>
                    this.vision.correct({
                        sku_code: task.sku_code,
                        photo_index: photoIndex,
                        source_path: sourcePath,
                        target_path: correctedPathFor(sourcePath),
                        product_name: task.metadata.product_name,
                        locale: task.metadata.locale,
                    }, signal),
                );
                entries.push({
                    photo_index: photoIndex,
                    source_path: sourcePath,
                    corrected_path: result.corrected_path,
                    status: 'completed',
                    adjustments: result.adjustments,
                });
            } catch (err) {
                const error = asDownstreamError(err);
                console.error(`${TAG} ${task.sku_code} photo ${photoIndex} failed (${error.kind}): ${error.message}`);
                failures.push({ photo_index: photoIndex, error });
                entries.push({
                    photo_index: photoIndex,
                    source_path: sourcePath,
                    corrected_path: null,
                    status: 'failed',
                    adjustments: null,
                    error: describeError(error),
                });
            }
        }

        return {
            overall: failures.length === 0 ? 'succeeded' : 'failed',
            patch: { color_analysis: mergeByPhotoIndex(task.color_analysis, entries) },
            attempted,
            skipped,
            failures,
        };
    }
}
