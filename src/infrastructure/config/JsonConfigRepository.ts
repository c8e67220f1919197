import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../../domain/errors/RegdiffError';
import { RegdiffConfig, RegdiffConfigSchema, defaultConfig } from './RegdiffConfig';

export const CONFIG_FILE_NAME = 'regdiff.config.json';

export class JsonConfigRepository {
    constructor(private readonly workingDir: string) {}

    /**
     * Reads the given config file, or `regdiff.config.json` in the working
     * directory. A missing default file yields the defaults; a missing
     * explicit file is an error.
     */
    load(configPath?: string): RegdiffConfig {
        const resolved = path.resolve(this.workingDir, configPath ?? CONFIG_FILE_NAME);

        if (!fs.existsSync(resolved)) {
            if (configPath) {
                throw new ConfigError(resolved, 'config file not found');
            }
            return defaultConfig();
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(resolved, `cannot read config: ${reason}`, { cause: e });
        }

        const result = RegdiffConfigSchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(resolved, issues);
        }
        return result.data;
    }
}
