import { monitorEventLoopDelay } from 'perf_hooks';

/** p99 event-loop delay, used as a backpressure signal for the change feed. */
export class EventLoopMonitor {
    private monitor: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution: number = 10) {
        this.monitor = monitorEventLoopDelay({ resolution });
        this.monitor.enable();
    }

    get lag(): number {
        return this.monitor.percentile(99) / 1_000_000;
    }

    isLagging(maxLagMs: number): boolean {
        const lag = this.lag;
        if (lag >= maxLagMs) {
            console.warn(`[backpressure] event loop lag ${lag.toFixed(2)}ms >= ${maxLagMs}ms`);
            return true;
        }
        return false;
    }

    disable(): void {
        this.monitor.disable();
    }
}
