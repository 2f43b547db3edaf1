/**
 * Lifecycle states for photo tasks.
 * Tasks progress: UPLOADED → COLOR_CORRECTED → PUBLISHED, or → FAILED from either non-terminal state.
 */
export enum TaskStatus {
    UPLOADED = 'UPLOADED',
    COLOR_CORRECTED = 'COLOR_CORRECTED',
    PUBLISHED = 'PUBLISHED',
    FAILED = 'FAILED'
}

/** Position of each status in the pipeline, mirrored into `workflow_step`. */
export const WORKFLOW_STEP: Readonly<Record<Exclude<TaskStatus, TaskStatus.FAILED>, number>> = {
    [TaskStatus.UPLOADED]: 1,
    [TaskStatus.COLOR_CORRECTED]: 2,
    [TaskStatus.PUBLISHED]: 3,
};

export const TERMINAL_STATUSES: readonly TaskStatus[] = [TaskStatus.PUBLISHED, TaskStatus.FAILED];

export function isTerminal(status: TaskStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
    return Object.values(TaskStatus).some(status => status === value);
}

/** Descriptive fields set by the uploader; never written after creation. */
export interface TaskMetadata {
    product_name: string;
    title: string;
    locale: string;
    photo_urls: string[];
}

/** Multipliers around 1.0 applied by the vision service. */
export interface Adjustments {
    brightness?: number;
    contrast?: number;
    saturation?: number;
    sharpness?: number;
}

export type PhotoStepStatus = 'completed' | 'failed';

export interface ColorAnalysisEntry {
    photo_index: number;
    source_path: string;
    corrected_path: string | null;
    status: PhotoStepStatus;
    adjustments: Adjustments | null;
    error?: string;
}

export interface PublishResultEntry {
    photo_index: number;
    status: 'published' | 'failed';
    media_id: number | null;
    media_url: string | null;
    error?: string;
}

export interface AgentLogEntry {
    timestamp: string;
    agent_name: string;
    action: string;
    note: string;
}

export type ErrorKind = 'transient' | 'timeout' | 'permanent' | 'content_rejected' | 'data_integrity';

export interface RetryMetadata {
    count: number;
    last_error: string | null;
    last_error_kind: ErrorKind | null;
}

/** One SKU's photo-processing record. */
export interface PhotoTask {
    id: string;
    sku_code: string;
    status: TaskStatus;
    workflow_step: number;
    metadata: TaskMetadata;
    color_analysis: ColorAnalysisEntry[];
    publish_results: PublishResultEntry[];
    agent_log: AgentLogEntry[];
    retry_metadata: RetryMetadata;
    next_attempt_at: Date | null;
    /** Bumped by every conditional write; lets a writer detect that it read a stale copy. */
    version: number;
    created_at: Date;
    updated_at: Date;
}

export interface SubmitTaskInput {
    sku_code: string;
    metadata: TaskMetadata;
}
