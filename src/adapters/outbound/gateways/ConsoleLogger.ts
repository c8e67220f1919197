import { ILogger } from '../../../application/ports/outbound/ILogger';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface ConsoleLoggerOptions {
    verbose: boolean;
    write?: (line: string) => void;
}

export class ConsoleLogger implements ILogger {
    private readonly verbose: boolean;
    private readonly write: (line: string) => void;

    constructor(options: ConsoleLoggerOptions) {
        this.verbose = options.verbose;
        this.write = options.write ?? ((line) => console.error(line));
    }

    debug(message: string): void {
        if (!this.verbose) return;
        this.log('DEBUG', message);
    }

    info(message: string): void {
        this.log('INFO', message);
    }

    warn(message: string): void {
        this.log('WARN', message);
    }

    error(message: string, error?: unknown): void {
        if (error === undefined) {
            this.log('ERROR', message);
            return;
        }
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.log('ERROR', `${message}: ${errorMsg}`);
        const stack = error instanceof Error ? error.stack : undefined;
        if (stack) {
            this.log('ERROR', `  Stack: ${stack.split('\n').slice(1, 4).map(s => s.trim()).join(' -> ')}`);
        }
    }

    private log(level: Level, message: string): void {
        const timestamp = new Date().toISOString().substring(11, 23);
        this.write(`[regdiff] [${timestamp}] ${level} ${message}`);
    }
}
