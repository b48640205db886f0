// src/utils/busy-tracker.ts

/**
 * Counts overlapping busy periods and reports the transitions idle → busy → idle.
 * Each acquire() returns its own release; releasing twice has no effect.
 */
export class BusyTracker {
    private count = 0;

    constructor(private readonly onChange: (busy: boolean) => void) {}

    get busy(): boolean {
        return this.count > 0;
    }

    acquire(): () => void {
        this.count++;
        if (this.count === 1) {
            this.onChange(true);
        }

        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.count--;
            if (this.count === 0) {
                this.onChange(false);
            }
        };
    }
}
