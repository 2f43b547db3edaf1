/**
 * Tracks how far the change feed can safely resume from. `cursor` is the last event
 * read; `committed` is the last event before which every dispatch has finished.
 * Several outstanding items may share a position (re-scan items all sit at the head).
 *
 * Items tracked at the start position came from a re-scan, not from an event, so
 * nothing is committed until they are all acknowledged: `committed` is null meanwhile.
 */
export class PositionTracker {
    private readonly outstanding = new Map<number, number>();
    private highest: number;

    constructor(private readonly start: number) {
        this.highest = start;
    }

    get cursor(): number {
        return this.highest;
    }

    get committed(): number | null {
        if (this.outstanding.size === 0) return this.highest;
        const position = Math.min(...this.outstanding.keys()) - 1;
        return position < this.start ? null : position;
    }

    get pending(): number {
        let total = 0;
        for (const count of this.outstanding.values()) total += count;
        return total;
    }

    /** An event that needs no dispatch. */
    skip(seq: number): void {
        this.highest = Math.max(this.highest, seq);
    }

    track(seq: number): void {
        this.outstanding.set(seq, (this.outstanding.get(seq) ?? 0) + 1);
        this.highest = Math.max(this.highest, seq);
    }

    ack(seq: number): void {
        const count = this.outstanding.get(seq);
        if (count === undefined) return;
        if (count <= 1) {
            this.outstanding.delete(seq);
        } else {
            this.outstanding.set(seq, count - 1);
        }
    }
}
