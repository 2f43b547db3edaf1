import { AgentLogEntry } from '@photoflow/sdk';
import { TaskStore } from '../repositories/task.store';
import { AuditWriteError } from '../errors';

export const AGENTS = {
    upload: 'upload_agent',
    colorCorrection: 'color_correct_agent',
    publish: 'publish_agent',
    orchestrator: 'orchestrator',
} as const;

/**
 * Builds and appends agent_log entries. Entries that accompany a status change are
 * built here and committed by the dispatcher in the same conditional write; append()
 * is for notes that stand alone.
 */
export class AuditLogger {
    constructor(
        private readonly store: Pick<TaskStore, 'appendLog'>,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    entry(agentName: string, action: string, note: string): AgentLogEntry {
        return {
            timestamp: this.clock().toISOString(),
            agent_name: agentName,
            action,
            note,
        };
    }

    /** Never fails silently: a failed write surfaces as AuditWriteError. */
    async append(taskId: string, agentName: string, action: string, note: string): Promise<AgentLogEntry> {
        const entry = this.entry(agentName, action, note);
        try {
            await this.store.appendLog(taskId, entry);
        } catch (err) {
            throw new AuditWriteError(taskId, action, err);
        }
        return entry;
    }
}
