import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigOverrides, RegdiffConfig, mergeConfig } from '../../../infrastructure/config/RegdiffConfig';
import { JsonConfigRepository } from '../../../infrastructure/config/JsonConfigRepository';
import { ICompareDirectoriesUseCase } from '../../../application/ports/inbound/ICompareDirectoriesUseCase';
import { ICompareFilesUseCase } from '../../../application/ports/inbound/ICompareFilesUseCase';
import { ILogger } from '../../../application/ports/outbound/ILogger';
import { isPassing, RunSummary, ComparisonResult } from '../../../domain/entities/ComparisonResult';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_ERROR = 2;

export type CliOptions = {
    config?: string;
    outputDir?: string;
    regressionDir?: string;
    pattern?: string;
    epsilon?: number;
    exact?: boolean;
    exclude?: string[];
    diffCommand?: string;
    maxLines?: number;
    notify?: boolean;
    color: boolean;
    verbose?: boolean;
};

export interface ReportPresenter {
    presentResult(result: ComparisonResult): void;
    presentSummary(summary: RunSummary): void;
}

export interface Services {
    compareFiles: ICompareFilesUseCase;
    compareDirectories: ICompareDirectoriesUseCase;
    presenter: ReportPresenter;
    logger: ILogger;
}

export type ServiceFactory = (config: RegdiffConfig, color: boolean) => Services;

function parsePositiveNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive number.');
    }
    return parsed;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

export class CliController {
    constructor(
        private readonly workingDir: string,
        private readonly createServices: ServiceFactory,
        private readonly reportFatal: (message: string) => void = (message) => console.error(message)
    ) {}

    buildProgram(version: string): Command {
        const program = new Command();

        program
            .name('regdiff')
            .description('Compare test output against regression baselines, tolerating floating-point noise')
            .version(version)
            .option('-c, --config <path>', 'config file (default: regdiff.config.json)')
            .option('-o, --output-dir <dir>', 'directory with current test output')
            .option('-r, --regression-dir <dir>', 'directory with saved baselines')
            .option('-p, --pattern <glob>', 'files to compare, relative to the output directory')
            .option('-e, --epsilon <number>', 'numeric tolerance', parsePositiveNumber)
            .option('-x, --exact', 'disable numeric tolerance')
            .option('--exclude <pattern...>', 'gitignore-style patterns to skip')
            .option('--diff-command <cmd>', 'line-diff utility to run')
            .option('--max-lines <n>', 'diff lines to show per file', parsePositiveInt)
            .option('--notify', 'desktop notification when the run finishes')
            .option('--no-color', 'disable colored output')
            .option('--verbose', 'debug logging and progress');

        program.action(async () => {
            const options = program.opts<CliOptions>();
            process.exitCode = await this.runAll(options);
        });

        program
            .command('compare <baseline> <current>')
            .description('compare a single pair of files')
            .action(async (baseline: string, current: string) => {
                const options = program.opts<CliOptions>();
                process.exitCode = await this.runCompare(baseline, current, options);
            });

        return program;
    }

    async runAll(options: CliOptions): Promise<number> {
        return this.guard(options, async ({ compareDirectories, presenter }) => {
            const summary = await compareDirectories.execute();
            presenter.presentSummary(summary);
            if (summary.counts['error'] > 0) return EXIT_ERROR;
            return summary.passed ? EXIT_PASSED : EXIT_FAILED;
        });
    }

    async runCompare(baseline: string, current: string, options: CliOptions): Promise<number> {
        return this.guard(options, async ({ compareFiles, presenter }) => {
            const result = await compareFiles.execute({
                name: path.basename(current),
                baselinePath: path.resolve(this.workingDir, baseline),
                currentPath: path.resolve(this.workingDir, current),
            });
            presenter.presentResult(result);
            if (result.status === 'error') return EXIT_ERROR;
            return isPassing(result.status) ? EXIT_PASSED : EXIT_FAILED;
        });
    }

    resolveConfig(options: CliOptions): RegdiffConfig {
        const fileConfig = new JsonConfigRepository(this.workingDir).load(options.config);
        const overrides: ConfigOverrides = {
            outputDir: options.outputDir,
            regressionDir: options.regressionDir,
            pattern: options.pattern,
            epsilon: options.epsilon,
            exactMode: options.exact,
            exclude: options.exclude,
            diffCommand: options.diffCommand,
            maxDisplayLines: options.maxLines,
            notify: options.notify,
            verbose: options.verbose,
        };
        const merged = mergeConfig(fileConfig, overrides);
        return {
            ...merged,
            outputDir: path.resolve(this.workingDir, merged.outputDir),
            regressionDir: path.resolve(this.workingDir, merged.regressionDir),
        };
    }

    private async guard(options: CliOptions, run: (services: Services) => Promise<number>): Promise<number> {
        let services: Services;
        try {
            services = this.createServices(this.resolveConfig(options), options.color);
        } catch (error) {
            this.reportFatal(error instanceof Error ? error.message : String(error));
            return EXIT_ERROR;
        }

        try {
            return await run(services);
        } catch (error) {
            services.logger.error('Run aborted', error);
            return EXIT_ERROR;
        }
    }
}
