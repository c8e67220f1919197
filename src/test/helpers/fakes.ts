import { IDiffPort } from '../../application/ports/outbound/IDiffPort';
import { IFileSystemPort } from '../../application/ports/outbound/IFileSystemPort';
import { IFileGlobber } from '../../application/ports/outbound/IFileGlobber';
import { ILogger } from '../../application/ports/outbound/ILogger';
import { INotificationPort } from '../../application/ports/outbound/INotificationPort';
import { IProgressPort } from '../../application/ports/outbound/IProgressPort';
import { FilePair } from '../../domain/entities/ComparisonResult';

export class FakeDiffPort implements IDiffPort {
    readonly calls: Array<[string, string]> = [];

    constructor(private readonly outputs: Record<string, string[]> = {}) {}

    async *diffLines(baselinePath: string, currentPath: string): AsyncIterable<string> {
        this.calls.push([baselinePath, currentPath]);
        for (const line of this.outputs[currentPath] ?? []) {
            yield line;
        }
    }
}

export class FakeFileSystem implements IFileSystemPort {
    private readonly existing: Set<string>;

    constructor(paths: string[] = []) {
        this.existing = new Set(paths);
    }

    async fileExists(absolutePath: string): Promise<boolean> {
        return this.existing.has(absolutePath);
    }

    toAbsolutePath(root: string, relativePath: string): string {
        return `${root}/${relativePath}`;
    }
}

export class FakeGlobber implements IFileGlobber {
    readonly calls: Array<[string, string]> = [];

    /** A plain list is returned for every directory. */
    constructor(private readonly files: string[] | Record<string, string[]>) {}

    async glob(pattern: string, cwd: string): Promise<string[]> {
        this.calls.push([pattern, cwd]);
        if (Array.isArray(this.files)) {
            return [...this.files];
        }
        return [...(this.files[cwd] ?? [])];
    }
}

export class RecordingLogger implements ILogger {
    readonly entries: string[] = [];
    readonly errors: unknown[] = [];

    debug(message: string): void {
        this.entries.push(`debug: ${message}`);
    }

    info(message: string): void {
        this.entries.push(`info: ${message}`);
    }

    warn(message: string): void {
        this.entries.push(`warn: ${message}`);
    }

    error(message: string, error?: unknown): void {
        this.entries.push(`error: ${message}`);
        this.errors.push(error);
    }
}

export class RecordingProgress implements IProgressPort {
    readonly events: string[] = [];

    start(total: number): void {
        this.events.push(`start ${total}`);
    }

    advance(pair: FilePair): void {
        this.events.push(`advance ${pair.name}`);
    }

    finish(): void {
        this.events.push('finish');
    }
}

export class RecordingNotifier implements INotificationPort {
    readonly notifications: Array<{ title: string; message: string }> = [];

    notify(title: string, message: string): void {
        this.notifications.push({ title, message });
    }
}
