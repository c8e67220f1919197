import { RunSummary } from '../../../domain/entities/ComparisonResult';

export interface ICompareDirectoriesUseCase {
    execute(): Promise<RunSummary>;
}
