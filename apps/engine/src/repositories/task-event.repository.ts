import { Notification, Pool } from 'pg';
import { TaskChangeEvent, TaskEventEntity, toChangeEvent } from '../db/task-event.entity';
import { assertResumable, ChangeSource, ChangeSubscription, EventBounds } from './task.store';

export const TASK_EVENTS_CHANNEL = 'photoflow_task_events';

interface BoundsRow {
    oldest: string | null;
    newest: string | null;
}

export class TaskEventRepository implements ChangeSource {
    constructor(private readonly pool: Pool) { }

    async fetch(after: number, limit: number): Promise<TaskChangeEvent[]> {
        const res = await this.pool.query<TaskEventEntity>(
            'SELECT * FROM task_events WHERE seq > $1 ORDER BY seq ASC LIMIT $2',
            [after, limit],
        );
        const events = res.rows.map(toChangeEvent);

        // Contiguous with the token: nothing can be missing, skip the bounds query
        if (events.length > 0 && events[0].seq === after + 1) return events;

        assertResumable(after, events, await this.bounds());
        return events;
    }

    async bounds(): Promise<EventBounds> {
        const res = await this.pool.query<BoundsRow>(
            'SELECT MIN(seq)::text AS oldest, MAX(seq)::text AS newest FROM task_events',
        );
        const row = res.rows[0];
        return {
            oldest: row?.oldest != null ? Number(row.oldest) : null,
            newest: row?.newest != null ? Number(row.newest) : null,
        };
    }

    // LISTEN needs a session of its own, so it holds one pool client until closed.
    async subscribe(onNotify: () => void, onError: (err: Error) => void): Promise<ChangeSubscription> {
        const client = await this.pool.connect();
        let released = false;

        const onNotification = (msg: Notification) => {
            if (msg.channel === TASK_EVENTS_CHANNEL) onNotify();
        };
        const onClientError = (err: Error) => {
            if (released) return;
            released = true;
            client.off('notification', onNotification);
            client.release(err);
            onError(err);
        };

        client.on('notification', onNotification);
        client.on('error', onClientError);

        try {
            await client.query(`LISTEN ${TASK_EVENTS_CHANNEL}`);
        } catch (err) {
            released = true;
            client.off('notification', onNotification);
            client.off('error', onClientError);
            client.release(err instanceof Error ? err : true);
            throw err;
        }

        return {
            close: async () => {
                if (released) return;
                released = true;
                client.off('notification', onNotification);
                client.off('error', onClientError);
                try {
                    await client.query(`UNLISTEN ${TASK_EVENTS_CHANNEL}`);
                } finally {
                    client.release();
                }
            },
        };
    }

    async prune(olderThan: Date): Promise<number> {
        const res = await this.pool.query('DELETE FROM task_events WHERE created_at < $1', [olderThan]);
        return res.rowCount ?? 0;
    }
}
