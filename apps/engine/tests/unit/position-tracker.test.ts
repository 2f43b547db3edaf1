import { PositionTracker } from '../../src/services/position-tracker';

describe('PositionTracker', () => {
    it('commits up to the cursor when nothing is outstanding', () => {
        const tracker = new PositionTracker(10);
        tracker.skip(11);
        tracker.skip(12);

        expect(tracker.cursor).toBe(12);
        expect(tracker.committed).toBe(12);
    });

    it('holds the committed position below the oldest unacknowledged event', () => {
        const tracker = new PositionTracker(10);
        tracker.track(11);
        tracker.skip(12);
        tracker.track(13);

        expect(tracker.cursor).toBe(13);
        expect(tracker.committed).toBe(10);

        tracker.ack(13);
        expect(tracker.committed).toBe(10);

        tracker.ack(11);
        expect(tracker.committed).toBe(13);
    });

    it('counts items sharing one position', () => {
        const tracker = new PositionTracker(40);
        tracker.track(40);
        tracker.track(40);
        expect(tracker.pending).toBe(2);
        expect(tracker.committed).toBeNull();

        tracker.ack(40);
        expect(tracker.committed).toBeNull();

        tracker.ack(40);
        expect(tracker.committed).toBe(40);
    });

    it('never commits a position below an empty history while re-scan items run', () => {
        const tracker = new PositionTracker(0);
        tracker.track(0);
        tracker.track(0);
        expect(tracker.committed).toBeNull();

        tracker.ack(0);
        expect(tracker.committed).toBeNull();

        tracker.ack(0);
        expect(tracker.committed).toBe(0);
    });

    it('commits later events once the re-scan items are done', () => {
        const tracker = new PositionTracker(7);
        tracker.track(7);
        tracker.track(8);
        tracker.ack(7);
        expect(tracker.committed).toBe(7);

        tracker.ack(8);
        expect(tracker.committed).toBe(8);
    });

    it('ignores acknowledgements it is not waiting for', () => {
        const tracker = new PositionTracker(5);
        tracker.ack(99);
        expect(tracker.committed).toBe(5);
    });
});
