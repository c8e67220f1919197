export interface IFileGlobber {
    /** Files under `cwd` matching `pattern`, as paths relative to `cwd`. */
    glob(pattern: string, cwd: string): Promise<string[]>;
}
