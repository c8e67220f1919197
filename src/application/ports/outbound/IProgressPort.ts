import { FilePair } from '../../../domain/entities/ComparisonResult';

export interface IProgressPort {
    start(total: number): void;
    advance(pair: FilePair): void;
    finish(): void;
}
