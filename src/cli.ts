#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';

// Domain
import { DiffParser } from './domain/services/DiffParser';

// Application - Use Cases
import { CompareFilesUseCase, CompareDirectoriesUseCase } from './application/useCases';

// Adapters - Controllers
import { CliController, Services } from './adapters/inbound/controllers/CliController';

// Adapters - Presenters
import { ConsoleReportPresenter } from './adapters/outbound/presenters/ConsoleReportPresenter';

// Adapters - Gateways
import { ConsoleLogger } from './adapters/outbound/gateways/ConsoleLogger';
import { FastGlobGateway } from './adapters/outbound/gateways/FastGlobGateway';
import { NodeFileSystemGateway } from './adapters/outbound/gateways/NodeFileSystemGateway';
import { NodeNotificationGateway } from './adapters/outbound/gateways/NodeNotificationGateway';
import { ProcessDiffGateway } from './adapters/outbound/gateways/ProcessDiffGateway';

import { RegdiffConfig } from './infrastructure/config/RegdiffConfig';

function readVersion(): string {
    const packagePath = path.join(__dirname, '..', 'package.json');
    const manifest: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
        return manifest.version;
    }
    return '0.0.0';
}

export function createServices(config: RegdiffConfig, color: boolean): Services {
    // ===== Adapters Layer - Gateways =====
    const logger = new ConsoleLogger({ verbose: config.verbose });
    const fileSystemGateway = new NodeFileSystemGateway();
    const diffGateway = new ProcessDiffGateway(config.diffCommand);
    const fileGlobber = new FastGlobGateway();
    const notificationGateway = new NodeNotificationGateway(logger);
    const presenter = new ConsoleReportPresenter({
        color,
        verbose: config.verbose,
        maxDisplayLines: config.maxDisplayLines,
    });

    // ===== Domain Layer =====
    const diffParser = new DiffParser();

    // ===== Application Layer - Use Cases =====
    const compareFiles = new CompareFilesUseCase(
        diffGateway,
        fileSystemGateway,
        diffParser,
        { epsilon: config.epsilon, exactMode: config.exactMode },
        logger
    );

    const compareDirectories = new CompareDirectoriesUseCase(
        compareFiles,
        fileGlobber,
        fileSystemGateway,
        presenter,
        notificationGateway,
        {
            outputDir: config.outputDir,
            regressionDir: config.regressionDir,
            pattern: config.pattern,
            exclude: config.exclude,
            notify: config.notify,
        },
        logger
    );

    return { compareFiles, compareDirectories, presenter, logger };
}

if (require.main === module) {
    const controller = new CliController(process.cwd(), createServices);
    controller.buildProgram(readVersion())
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            console.error(error instanceof Error ? error.message : String(error));
            process.exitCode = 2;
        });
}
