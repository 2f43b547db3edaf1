import { TaskMetadata } from '@photoflow/sdk';
import { NewTask } from '../../src/repositories/task.store';
import { CorrectionRequest, CorrectionResult, VisionClient } from '../../src/clients/vision.client';
import { MediaUpload, PublishedMedia, PublishingClient } from '../../src/clients/wordpress.client';

export function metadata(overrides: Partial<TaskMetadata> = {}): TaskMetadata {
    return {
        product_name: 'Trail Runner 2',
        title: 'Trail Runner 2 - Blue',
        locale: 'en_US',
        photo_urls: ['/photos/NIKE-USA-101/front.jpg', '/photos/NIKE-USA-101/side.jpg'],
        ...overrides,
    };
}

export function newTask(skuCode = 'NIKE-USA-101', overrides: Partial<TaskMetadata> = {}): NewTask {
    return {
        sku_code: skuCode,
        metadata: metadata(overrides),
        agent_log: [{
            timestamp: '2024-05-01T09:00:00.000Z',
            agent_name: 'upload_agent',
            action: 'task_created',
            note: 'Received photos',
        }],
    };
}

type Scripted<Req, Res> = (request: Req, call: number) => Res | Error;

/** Vision client answering from a script; an Error return is thrown. */
export class FakeVision implements VisionClient {
    readonly requests: CorrectionRequest[] = [];

    constructor(private readonly script: Scripted<CorrectionRequest, CorrectionResult> = req => ({
        corrected_path: req.target_path,
        adjustments: { brightness: 1.05, contrast: 1.1 },
    })) { }

    async correct(request: CorrectionRequest): Promise<CorrectionResult> {
        this.requests.push(request);
        const result = this.script(request, this.requests.length);
        if (result instanceof Error) throw result;
        return result;
    }
}

/** Publishing client answering from a script; media ids count up from 12345 by default. */
export class FakePublisher implements PublishingClient {
    readonly uploads: MediaUpload[] = [];

    constructor(private readonly script: Scripted<MediaUpload, PublishedMedia> = (upload, call) => ({
        media_id: 12344 + call,
        media_url: `https://shop.test/wp-content/uploads/${upload.filename}`,
    })) { }

    async uploadMedia(upload: MediaUpload): Promise<PublishedMedia> {
        this.uploads.push(upload);
        const result = this.script(upload, this.uploads.length);
        if (result instanceof Error) throw result;
        return result;
    }
}

/** A clock tests move by hand. */
export class ManualClock {
    constructor(private current = new Date('2024-05-01T10:00:00.000Z')) { }

    now = (): Date => new Date(this.current.getTime());

    advance(ms: number): void {
        this.current = new Date(this.current.getTime() + ms);
    }
}
