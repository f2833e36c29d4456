export interface TimingResult {
    label: string;
    durationMs: number;
}

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private debugEnabled: boolean = false;
    private stderrOnly: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    /**
     * Send every level to stderr. The MCP stdio transport owns stdout.
     */
    public setStderrOnly(enabled: boolean): void {
        this.stderrOnly = enabled;
    }

    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    public log(message: string) {
        const line = `[${new Date().toISOString()}] [INFO] ${message}`;
        if (this.stderrOnly) {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    public warn(message: string) {
        console.error(`[${new Date().toISOString()}] [WARN] ${message}`);
    }

    public error(message: string) {
        console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
    }

    public debug(message: string): void {
        if (this.debugEnabled) {
            console.error(`[${new Date().toISOString()}] [DEBUG] ${message}`);
        }
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time a synchronous function and record the result
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    /**
     * Time an async function and record the result
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = await fn();
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    public clearTimings(): void {
        this.timings = [];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Stage Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(24)} ${timing.durationMs.toFixed(3).padStart(9)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(24)} ${total.toFixed(3).padStart(9)}ms`);
        console.error("[TIMING] ==========================\n");
    }
}

export default Logger;
