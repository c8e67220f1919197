export { CompareFilesUseCase } from './CompareFilesUseCase';
export { CompareDirectoriesUseCase } from './CompareDirectoriesUseCase';
export type { DirectoryLayout } from './CompareDirectoriesUseCase';
