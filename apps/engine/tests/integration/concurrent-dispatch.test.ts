import { TaskStatus } from '@photoflow/sdk';
import { DispatchOutcome, StepDispatcher, WorkItem } from '../../src/services/dispatcher';
import { ColorCorrectionExecutor, ExecutorRegistry, PublishExecutor } from '../../src/executors';
import { AuditLogger } from '../../src/audit/audit-logger';
import { CorrectionRequest, VisionClient } from '../../src/clients/vision.client';
import { MediaUpload, PublishingClient } from '../../src/clients/wordpress.client';
import { InMemoryTaskStore } from '../helpers/in-memory-store';
import { newTask } from '../helpers/fixtures';
import { sleep } from '../helpers/poll';

// Deterministic PRNG so a failing interleaving can be replayed
function mulberry32(seed: number): () => number {
    let a = seed;
    return () => {
        a |= 0;
        a = (a + 0x6d2b79f5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

class JitteryVision implements VisionClient {
    calls = 0;
    constructor(private readonly random: () => number) { }

    async correct(request: CorrectionRequest) {
        this.calls++;
        await sleep(Math.floor(this.random() * 4));
        return { corrected_path: request.target_path, adjustments: { brightness: 1.02 } };
    }
}

class JitteryPublisher implements PublishingClient {
    calls = 0;
    constructor(private readonly random: () => number) { }

    async uploadMedia(upload: MediaUpload) {
        this.calls++;
        await sleep(Math.floor(this.random() * 4));
        return { media_id: 9000 + this.calls, media_url: `https://shop.test/${upload.filename}` };
    }
}

function build(store: InMemoryTaskStore, random: () => number) {
    const vision = new JitteryVision(random);
    const publisher = new JitteryPublisher(random);
    const dispatcher = new StepDispatcher(
        store,
        new ExecutorRegistry([new ColorCorrectionExecutor(vision), new PublishExecutor(publisher)]),
        new AuditLogger(store),
        { maxRetries: 3, baseDelayMs: 5000, maxDelayMs: 300_000, executorTimeoutMs: 1000 },
    );
    return { dispatcher, vision, publisher };
}

describe('concurrent dispatch', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('lets exactly one of several simultaneous dispatches commit a transition', async () => {
        const store = new InMemoryTaskStore();
        const { dispatcher, vision } = build(store, mulberry32(7));
        const { id } = await store.insert(newTask('SKU-RACE', { photo_urls: ['/photos/a.jpg'] }));
        const item: WorkItem = { task_id: id, observed_status: TaskStatus.UPLOADED };

        const outcomes = await Promise.all(Array.from({ length: 5 }, () => dispatcher.dispatch(item)));

        expect(outcomes.filter(o => o.kind === 'advanced')).toHaveLength(1);
        expect(outcomes.filter(o => o.kind === 'conflict')).toHaveLength(4);
        expect(vision.calls).toBe(5);

        const task = store.get(id);
        expect(task.status).toBe(TaskStatus.COLOR_CORRECTED);
        expect(task.agent_log.map(e => e.action)).toEqual(['task_created', 'color_correction_completed']);
    });

    it.each([1, 2, 3, 4, 5])('only moves tasks forward under shuffled duplicate delivery (seed %i)', async seed => {
        const random = mulberry32(seed);
        const store = new InMemoryTaskStore();
        const { dispatcher } = build(store, random);
        const ids: string[] = [];
        for (const sku of ['SKU-A', 'SKU-B', 'SKU-C']) {
            ids.push((await store.insert(newTask(sku, { photo_urls: ['/photos/a.jpg', '/photos/b.jpg'] }))).id);
        }

        const statuses = [TaskStatus.UPLOADED, TaskStatus.COLOR_CORRECTED];
        for (let round = 0; round < 10; round++) {
            const batch: WorkItem[] = [];
            for (const id of ids) {
                const current = store.get(id).status;
                if (current !== TaskStatus.UPLOADED && current !== TaskStatus.COLOR_CORRECTED) continue;
                batch.push({ task_id: id, observed_status: current });
                const extra = Math.floor(random() * 3);
                for (let i = 0; i < extra; i++) {
                    batch.push({ task_id: id, observed_status: statuses[Math.floor(random() * statuses.length)] });
                }
            }
            if (batch.length === 0) break;

            for (let i = batch.length - 1; i > 0; i--) {
                const j = Math.floor(random() * (i + 1));
                [batch[i], batch[j]] = [batch[j], batch[i]];
            }
            const outcomes: DispatchOutcome[] = await Promise.all(batch.map(item => dispatcher.dispatch(item)));
            expect(outcomes.every(o => o.kind !== 'failed' && o.kind !== 'retry_scheduled')).toBe(true);
        }

        for (const id of ids) {
            const task = store.get(id);
            expect(task.status).toBe(TaskStatus.PUBLISHED);
            expect(task.agent_log.map(e => e.action)).toEqual([
                'task_created',
                'color_correction_completed',
                'publish_completed',
            ]);

            const transitions = store.allEvents()
                .filter(e => e.task_id === id && e.operation === 'update' && e.old_status !== e.new_status)
                .map(e => `${e.old_status}->${e.new_status}`);
            expect(transitions).toEqual(['UPLOADED->COLOR_CORRECTED', 'COLOR_CORRECTED->PUBLISHED']);
        }
    });
});
