import { Presets, SingleBar } from 'cli-progress';
import chalk from 'chalk';

export interface ProgressConfig {
    title: string;
    showEta: boolean;
    showRate: boolean;
    showPercentage: boolean;
    format?: string;
}

export function buildFormat(config: ProgressConfig): string {
    let format = ` ${chalk.cyan('{status}')} {bar}`;

    if (config.showPercentage) {
        format += ' | {percentage}%';
    }

    format += ' | {value}/{total}';

    if (config.showRate) {
        format += ' | Rate: {rate}';
    }

    if (config.showEta) {
        format += ' | ETA: {eta}s';
    }

    return format;
}

/**
 * Progress bar for a variant-by-variant enrichment run. Rendered on stderr
 * alongside log output.
 */
export class EnrichmentProgress {
    private readonly bar: SingleBar;
    private readonly title: string;
    private startTime = Date.now();
    private processed = 0;
    private failed = 0;

    constructor(config: ProgressConfig) {
        this.title = config.title;
        this.bar = new SingleBar({
            format: config.format ?? buildFormat(config),
            clearOnComplete: false,
            hideCursor: true,
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, Presets.shades_grey);
    }

    start(total: number): void {
        this.startTime = Date.now();
        this.bar.start(total, 0, { status: this.title, rate: '0/s', eta: '∞' });
    }

    advance(variant: string, failed = false): void {
        this.processed++;
        if (failed) this.failed++;

        const elapsed = (Date.now() - this.startTime) / 1000;
        const rate = elapsed > 0 ? this.processed / elapsed : 0;
        const remaining = this.bar.getTotal() - this.processed;

        this.bar.update(this.processed, {
            status: failed ? chalk.red(variant) : variant,
            rate: `${rate.toFixed(1)}/s`,
            eta: rate > 0 ? Math.ceil(remaining / rate) : '∞',
        });
    }

    complete(message?: string): void {
        this.bar.update(this.processed, {
            status: message ?? chalk.green(`${this.title} - ${this.processed - this.failed} done, ${this.failed} failed`),
            eta: '0',
        });
        this.bar.stop();
    }
}
