import ignore, { Ignore } from 'ignore';
import { ComparisonResult, FilePair, RunSummary, summarize } from '../../domain/entities/ComparisonResult';
import { IFileGlobber } from '../ports/outbound/IFileGlobber';
import { IFileSystemPort } from '../ports/outbound/IFileSystemPort';
import { ILogger } from '../ports/outbound/ILogger';
import { INotificationPort } from '../ports/outbound/INotificationPort';
import { IProgressPort } from '../ports/outbound/IProgressPort';
import { ICompareDirectoriesUseCase } from '../ports/inbound/ICompareDirectoriesUseCase';
import { ICompareFilesUseCase } from '../ports/inbound/ICompareFilesUseCase';

export interface DirectoryLayout {
    outputDir: string;
    regressionDir: string;
    pattern: string;
    exclude: string[];
    notify: boolean;
}

export class CompareDirectoriesUseCase implements ICompareDirectoriesUseCase {
    private readonly excluded: Ignore;

    constructor(
        private readonly compareFiles: ICompareFilesUseCase,
        private readonly fileGlobber: IFileGlobber,
        private readonly fileSystemPort: IFileSystemPort,
        private readonly progressPort: IProgressPort,
        private readonly notificationPort: INotificationPort,
        private readonly layout: DirectoryLayout,
        private readonly logger: ILogger
    ) {
        this.excluded = ignore().add(layout.exclude);
    }

    async execute(): Promise<RunSummary> {
        const pairs = await this.collectPairs();
        this.logger.info(`Comparing ${pairs.length} file(s) against ${this.layout.regressionDir}`);

        const results: ComparisonResult[] = [];
        this.progressPort.start(pairs.length);
        try {
            for (const pair of pairs) {
                this.progressPort.advance(pair);
                results.push(await this.compareSafely(pair));
            }
        } finally {
            this.progressPort.finish();
        }

        const summary = summarize(results);
        if (this.layout.notify) {
            this.notifySummary(summary);
        }
        return summary;
    }

    /**
     * Pairs on the union of names found under both directories, so a
     * baseline without output still shows up as `missing-output`.
     */
    async collectPairs(): Promise<FilePair[]> {
        const [outputs, baselines] = await Promise.all([
            this.fileGlobber.glob(this.layout.pattern, this.layout.outputDir),
            this.fileGlobber.glob(this.layout.pattern, this.layout.regressionDir),
        ]);
        return [...new Set([...outputs, ...baselines])]
            .filter(name => !this.excluded.ignores(name))
            .sort()
            .map(name => ({
                name,
                currentPath: this.fileSystemPort.toAbsolutePath(this.layout.outputDir, name),
                baselinePath: this.fileSystemPort.toAbsolutePath(this.layout.regressionDir, name),
            }));
    }

    private async compareSafely(pair: FilePair): Promise<ComparisonResult> {
        try {
            return await this.compareFiles.execute(pair);
        } catch (error) {
            this.logger.error(`Comparison failed for ${pair.name}`, error);
            const errorMessage = error instanceof Error ? error.message : String(error);
            return { pair, status: 'error', errorMessage };
        }
    }

    private notifySummary(summary: RunSummary): void {
        const { counts } = summary;
        const failures = counts['differ'] + counts['missing-baseline'] + counts['missing-output'] + counts['error'];
        const title = summary.passed ? 'Regression run passed' : 'Regression run failed';
        const message = summary.passed
            ? `${summary.results.length} file(s) match`
            : `${failures} of ${summary.results.length} file(s) need attention`;
        this.notificationPort.notify(title, message);
    }
}
