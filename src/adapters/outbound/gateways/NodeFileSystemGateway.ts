import * as fs from 'fs';
import * as path from 'path';
import { IFileSystemPort } from '../../../application/ports/outbound/IFileSystemPort';

export class NodeFileSystemGateway implements IFileSystemPort {
    async fileExists(absolutePath: string): Promise<boolean> {
        try {
            const stat = await fs.promises.stat(absolutePath);
            return stat.isFile();
        } catch {
            return false;
        }
    }

    toAbsolutePath(root: string, relativePath: string): string {
        return path.resolve(root, relativePath);
    }
}
