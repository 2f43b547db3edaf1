import { StepDispatcher, WorkItem } from './services/dispatcher';
import { WorkQueue } from './services/work-queue';
import { AGENTS, AuditLogger } from './audit/audit-logger';
import { calculateBackOff } from './utils/backoff';

const TAG = '[engine]';

/**
 * Runs one work item through the dispatcher and re-queues it when it has to come
 * back later: a scheduled retry, a backoff not yet elapsed, or an infrastructure
 * error (store or audit write) that left the task unchanged.
 */
export class TaskRunner {
    // Consecutive infrastructure errors per task, for reconnect-style backoff
    private readonly errorStreaks = new Map<string, number>();

    constructor(
        private readonly dispatcher: Pick<StepDispatcher, 'dispatch'>,
        private readonly audit: AuditLogger,
        private readonly backoff: (attempt: number) => number = calculateBackOff,
    ) { }

    async run(queue: WorkQueue, item: WorkItem): Promise<void> {
        try {
            const outcome = await this.dispatcher.dispatch(item);
            this.errorStreaks.delete(item.task_id);

            switch (outcome.kind) {
                case 'retry_scheduled':
                case 'deferred':
                    queue.schedule(item, outcome.delayMs);
                    break;
                case 'advanced':
                case 'failed':
                case 'stale':
                case 'missing':
                case 'conflict':
                    break;
            }
        } catch (err) {
            const attempt = (this.errorStreaks.get(item.task_id) ?? 0) + 1;
            this.errorStreaks.set(item.task_id, attempt);
            const delay = this.backoff(attempt);
            const message = err instanceof Error ? err.message : String(err);
            console.error(`${TAG} dispatch of ${item.task_id} failed, retrying in ${delay}ms:`, err);

            try {
                await this.audit.append(
                    item.task_id,
                    AGENTS.orchestrator,
                    'dispatch_error',
                    `Dispatch from ${item.observed_status} failed: ${message}`,
                );
            } catch (auditErr) {
                console.error(`${TAG} could not record dispatch error for ${item.task_id}:`, auditErr);
            }

            queue.schedule(item, delay);
        }
    }
}
