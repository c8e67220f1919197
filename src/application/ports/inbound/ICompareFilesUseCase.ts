import { ComparisonResult, FilePair } from '../../../domain/entities/ComparisonResult';

export interface ICompareFilesUseCase {
    execute(pair: FilePair): Promise<ComparisonResult>;
}
