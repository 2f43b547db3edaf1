import { TaskStatus } from '../db/task.entity';
import { StepExecutor } from './step-executor';

export { ColorCorrectionExecutor } from './color-correction.executor';
export { PublishExecutor } from './publish.executor';
export { mergeByPhotoIndex, rebaseRun } from './step-executor';
export type { StepExecutor, StepName, StepRunResult, StepContext, PhotoFailure } from './step-executor';

/** Looks executors up by the status they are dispatched from. */
export class ExecutorRegistry {
    private readonly byStatus = new Map<TaskStatus, StepExecutor>();

    constructor(executors: StepExecutor[]) {
        for (const executor of executors) {
            if (this.byStatus.has(executor.from)) {
                throw new Error(`two executors registered for status ${executor.from}`);
            }
            this.byStatus.set(executor.from, executor);
        }
    }

    forStatus(status: TaskStatus): StepExecutor | undefined {
        return this.byStatus.get(status);
    }

    statuses(): TaskStatus[] {
        return Array.from(this.byStatus.keys());
    }
}
