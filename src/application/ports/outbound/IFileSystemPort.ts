export interface IFileSystemPort {
    fileExists(absolutePath: string): Promise<boolean>;
    toAbsolutePath(root: string, relativePath: string): string;
}
