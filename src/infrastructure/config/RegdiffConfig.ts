import { z } from 'zod';
import { DEFAULT_EPSILON } from '../../domain/entities/ComparisonOptions';

export const RegdiffConfigSchema = z.object({
    epsilon: z.number().positive().default(DEFAULT_EPSILON),
    exactMode: z.boolean().default(false),
    outputDir: z.string().min(1).default('output'),
    regressionDir: z.string().min(1).default('regression'),
    pattern: z.string().min(1).default('**/*'),
    exclude: z.array(z.string()).default([]),
    diffCommand: z.string().min(1).default('diff'),
    maxDisplayLines: z.number().int().positive().default(40),
    notify: z.boolean().default(false),
    verbose: z.boolean().default(false),
}).strict();

export type RegdiffConfig = z.infer<typeof RegdiffConfigSchema>;

export type ConfigOverrides = Partial<RegdiffConfig>;

export function defaultConfig(): RegdiffConfig {
    return RegdiffConfigSchema.parse({});
}

/**
 * Later values win; `undefined` overrides are skipped.
 */
export function mergeConfig(base: RegdiffConfig, overrides: ConfigOverrides): RegdiffConfig {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined)
    );
    return RegdiffConfigSchema.parse({ ...base, ...defined });
}
