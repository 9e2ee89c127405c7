import { parseOptions, sweeperOptionsSchema } from "../config";
import type { Logger } from "../errors";
import { secondsToMs } from "../utils/time";

/**
 * Removes expired sessions and reports how many went away.
 */
export type SweepTask = () => Promise<number> | number;

export type ExpirySweeperOptions = {
    intervalSeconds: number;
    label?: string;
    logger?: Logger;
};

/**
 * Timer-driven background sweep with its own start/stop lifecycle.
 *
 * Ticks never overlap: a tick that fires while the previous sweep is still
 * running is skipped. The timer is unref'd so it never keeps the process alive.
 */
export class ExpirySweeper {
    private timer: ReturnType<typeof setInterval> | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly intervalMs: number;

    constructor(
        private readonly task: SweepTask,
        private readonly options: ExpirySweeperOptions
    ) {
        const { intervalSeconds } = parseOptions(
            sweeperOptionsSchema,
            { intervalSeconds: options.intervalSeconds },
            "sweeper options"
        );
        this.intervalMs = secondsToMs(intervalSeconds);
    }

    get isRunning(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.tick(), this.intervalMs);
        this.timer.unref?.();
    }

    /**
     * Stops the timer and waits for a sweep that is already running.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.inFlight) await this.inFlight;
    }

    async runOnce(): Promise<number> {
        const removed = await this.task();
        if (removed > 0) {
            this.options.logger?.debug("Expired sessions swept.", { label: this.options.label, removed });
        }
        return removed;
    }

    private tick(): void {
        if (this.inFlight) return;

        this.inFlight = this.runOnce()
            .then(
                () => undefined,
                (error: unknown) => {
                    this.options.logger?.warn("Expired session sweep failed.", { label: this.options.label, error });
                }
            )
            .finally(() => {
                this.inFlight = null;
            });
    }
}
