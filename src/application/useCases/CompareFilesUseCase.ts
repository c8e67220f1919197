import { DiffParser, classifyDiff } from '../../domain/services/DiffParser';
import { ComparisonOptions } from '../../domain/entities/ComparisonOptions';
import { ComparisonResult, FilePair, statusOf } from '../../domain/entities/ComparisonResult';
import { IDiffPort } from '../ports/outbound/IDiffPort';
import { IFileSystemPort } from '../ports/outbound/IFileSystemPort';
import { ILogger } from '../ports/outbound/ILogger';
import { ICompareFilesUseCase } from '../ports/inbound/ICompareFilesUseCase';

export class CompareFilesUseCase implements ICompareFilesUseCase {
    constructor(
        private readonly diffPort: IDiffPort,
        private readonly fileSystemPort: IFileSystemPort,
        private readonly diffParser: DiffParser,
        private readonly options: ComparisonOptions,
        private readonly logger: ILogger
    ) {}

    async execute(pair: FilePair): Promise<ComparisonResult> {
        if (!(await this.fileSystemPort.fileExists(pair.baselinePath))) {
            this.logger.debug(`${pair.name}: no baseline at ${pair.baselinePath}`);
            return { pair, status: 'missing-baseline' };
        }
        if (!(await this.fileSystemPort.fileExists(pair.currentPath))) {
            this.logger.debug(`${pair.name}: no output at ${pair.currentPath}`);
            return { pair, status: 'missing-output' };
        }

        const lines = this.diffPort.diffLines(pair.baselinePath, pair.currentPath);
        const diff = classifyDiff(await this.diffParser.parseAsync(lines), this.options);

        this.logger.debug(
            `${pair.name}: hunks=${diff.hunkCount}, changed=${diff.totalChangedLines}, omitted=${diff.omittedLines}`
        );

        return { pair, status: statusOf(diff), diff };
    }
}
