import chalk from 'chalk';
import { Diff } from '../../../domain/entities/Diff';
import { ComparisonResult, ComparisonStatus, FilePair, RunSummary } from '../../../domain/entities/ComparisonResult';
import { IProgressPort } from '../../../application/ports/outbound/IProgressPort';

export interface PresenterOptions {
    color: boolean;
    verbose: boolean;
    maxDisplayLines: number;
    out?: (line: string) => void;
    progressOut?: (line: string) => void;
}

const STATUS_LABELS: Record<ComparisonStatus, string> = {
    'match': 'PASS',
    'tolerated': 'TOLERATED',
    'differ': 'FAIL',
    'missing-baseline': 'MISSING',
    'missing-output': 'MISSING',
    'error': 'ERROR',
};

export class ConsoleReportPresenter implements IProgressPort {
    private readonly style: chalk.Chalk;
    private readonly out: (line: string) => void;
    private readonly progressOut: (line: string) => void;
    private total = 0;
    private current = 0;

    constructor(private readonly options: PresenterOptions) {
        this.style = new chalk.Instance({ level: options.color ? 1 : 0 });
        this.out = options.out ?? ((line) => console.log(line));
        this.progressOut = options.progressOut ?? ((line) => process.stderr.write(`${line}\n`));
    }

    // ===== Progress =====

    start(total: number): void {
        this.total = total;
        this.current = 0;
    }

    advance(pair: FilePair): void {
        this.current++;
        if (this.options.verbose) {
            this.progressOut(`[${this.current}/${this.total}] ${pair.name}`);
        }
    }

    finish(): void {
        this.total = 0;
        this.current = 0;
    }

    // ===== Report =====

    presentResult(result: ComparisonResult): void {
        this.out(this.formatStatusLine(result));

        if (result.status === 'differ' && result.diff) {
            for (const line of this.formatHunks(result.diff)) {
                this.out(line);
            }
        }
    }

    presentSummary(summary: RunSummary): void {
        for (const result of summary.results) {
            this.presentResult(result);
        }
        const { counts } = summary;
        const missing = counts['missing-baseline'] + counts['missing-output'];
        const line = `${counts['match']} passed, ${counts['tolerated']} tolerated, ${counts['differ']} failed, ${missing} missing, ${counts['error']} errors`;
        this.out(summary.passed ? this.style.green(line) : this.style.red(line));
    }

    formatStatusLine(result: ComparisonResult): string {
        const label = this.colorLabel(result.status);
        let line = `${label} ${result.pair.name}`;

        if (result.status === 'missing-baseline') {
            line += ` (no baseline at ${result.pair.baselinePath})`;
        } else if (result.status === 'missing-output') {
            line += ` (no output at ${result.pair.currentPath})`;
        } else if (result.status === 'error' && result.errorMessage) {
            line += `: ${result.errorMessage}`;
        }

        const omitted = result.diff?.omittedLines ?? 0;
        if (omitted > 0) {
            line += this.style.dim(` (${omitted} lines within tolerance)`);
        }
        return line;
    }

    /**
     * Raw hunk lines, indented and cut at `maxDisplayLines`.
     */
    formatHunks(diff: Diff): string[] {
        const raw = diff.hunks.flatMap(hunk => [...hunk.rawLines]);
        const limit = this.options.maxDisplayLines;
        const shown = raw.slice(0, limit).map(line => `  ${this.colorDiffLine(line)}`);
        if (raw.length > limit) {
            shown.push(this.style.dim(`  ... (${raw.length - limit} more lines)`));
        }
        return shown;
    }

    private colorLabel(status: ComparisonStatus): string {
        const label = STATUS_LABELS[status];
        switch (status) {
            case 'match':
                return this.style.green(label);
            case 'tolerated':
                return this.style.yellow(label);
            case 'differ':
            case 'error':
                return this.style.red.bold(label);
            default:
                return this.style.magenta(label);
        }
    }

    private colorDiffLine(line: string): string {
        if (line.startsWith('<')) return this.style.red(line);
        if (line.startsWith('>')) return this.style.green(line);
        return this.style.cyan(line);
    }
}
