import { spawn } from 'child_process';
import * as readline from 'readline';
import { IDiffPort } from '../../../application/ports/outbound/IDiffPort';
import { DiffProcessError } from '../../../domain/errors/RegdiffError';

/**
 * `diff` exits with 0 (same) or 1 (different). A higher status or a
 * signal (`null`) is a failure.
 */
export function checkDiffExit(diffCommand: string, code: number | null, stderr: string): void {
    if (code === null || code > 1) {
        throw new DiffProcessError(
            `${diffCommand} exited with ${code === null ? 'a signal' : `status ${code}`}: ${stderr.trim()}`,
            code,
            stderr
        );
    }
}

/**
 * Runs the line-diff utility and streams its stdout.
 */
export class ProcessDiffGateway implements IDiffPort {
    constructor(private readonly diffCommand: string = 'diff') {}

    async *diffLines(baselinePath: string, currentPath: string): AsyncIterable<string> {
        const child = spawn(this.diffCommand, [baselinePath, currentPath], {
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stderr = '';
        child.stderr.setEncoding('utf8');
        child.stderr.on('data', (chunk: string) => {
            stderr += chunk;
        });

        const exited = new Promise<number | null>((resolve, reject) => {
            child.once('error', (error) => {
                reject(new DiffProcessError(
                    `Failed to run ${this.diffCommand}: ${error.message}`,
                    null,
                    stderr,
                    { cause: error }
                ));
            });
            child.once('close', (code) => resolve(code));
        });
        // Awaited once stdout drains; attached now so a spawn failure is not unhandled meanwhile.
        exited.catch(() => undefined);

        const rl = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
        try {
            for await (const line of rl) {
                yield line;
            }
        } finally {
            rl.close();
            if (child.exitCode === null && child.signalCode === null) {
                child.kill();
            }
        }

        checkDiffExit(this.diffCommand, await exited, stderr);
    }
}
