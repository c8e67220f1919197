import * as assert from 'assert';
import { CompareDirectoriesUseCase, DirectoryLayout } from '../../../application/useCases/CompareDirectoriesUseCase';
import { ICompareFilesUseCase } from '../../../application/ports/inbound/ICompareFilesUseCase';
import { ComparisonResult, ComparisonStatus, FilePair } from '../../../domain/entities/ComparisonResult';
import {
    FakeFileSystem,
    FakeGlobber,
    RecordingLogger,
    RecordingNotifier,
    RecordingProgress,
} from '../../helpers/fakes';

class ScriptedCompareFiles implements ICompareFilesUseCase {
    readonly seen: FilePair[] = [];

    constructor(private readonly outcomes: Record<string, ComparisonStatus | Error>) {}

    async execute(pair: FilePair): Promise<ComparisonResult> {
        this.seen.push(pair);
        const outcome = this.outcomes[pair.name] ?? 'match';
        if (outcome instanceof Error) {
            throw outcome;
        }
        return { pair, status: outcome };
    }
}

const LAYOUT: DirectoryLayout = {
    outputDir: 'out',
    regressionDir: 'reg',
    pattern: '**/*.out',
    exclude: ['logs/'],
    notify: false,
};

suite('CompareDirectoriesUseCase', () => {
    let globber: FakeGlobber;
    let progress: RecordingProgress;
    let notifier: RecordingNotifier;
    let logger: RecordingLogger;

    setup(() => {
        globber = new FakeGlobber(['b.out', 'a.out', 'logs/debug.out', 'c.out']);
        progress = new RecordingProgress();
        notifier = new RecordingNotifier();
        logger = new RecordingLogger();
    });

    function createUseCase(
        compareFiles: ICompareFilesUseCase,
        layout: DirectoryLayout = LAYOUT
    ): CompareDirectoriesUseCase {
        return new CompareDirectoriesUseCase(
            compareFiles,
            globber,
            new FakeFileSystem(),
            progress,
            notifier,
            layout,
            logger
        );
    }

    test('pairs output files with baselines by relative path, sorted, skipping excluded ones', async () => {
        const pairs = await createUseCase(new ScriptedCompareFiles({})).collectPairs();

        assert.deepStrictEqual(globber.calls, [['**/*.out', 'out'], ['**/*.out', 'reg']]);
        assert.deepStrictEqual(pairs, [
            { name: 'a.out', currentPath: 'out/a.out', baselinePath: 'reg/a.out' },
            { name: 'b.out', currentPath: 'out/b.out', baselinePath: 'reg/b.out' },
            { name: 'c.out', currentPath: 'out/c.out', baselinePath: 'reg/c.out' },
        ]);
    });

    test('pairs baselines whose output is gone', async () => {
        globber = new FakeGlobber({
            out: ['a.out', 'new.out'],
            reg: ['a.out', 'gone.out', 'logs/old.out'],
        });

        const pairs = await createUseCase(new ScriptedCompareFiles({})).collectPairs();

        assert.deepStrictEqual(pairs.map(p => p.name), ['a.out', 'gone.out', 'new.out']);
        assert.deepStrictEqual(pairs[1], {
            name: 'gone.out',
            currentPath: 'out/gone.out',
            baselinePath: 'reg/gone.out',
        });
    });

    test('compares every pair in order and drives progress', async () => {
        const compareFiles = new ScriptedCompareFiles({ 'b.out': 'tolerated' });

        const summary = await createUseCase(compareFiles).execute();

        assert.deepStrictEqual(compareFiles.seen.map(p => p.name), ['a.out', 'b.out', 'c.out']);
        assert.deepStrictEqual(progress.events, ['start 3', 'advance a.out', 'advance b.out', 'advance c.out', 'finish']);
        assert.strictEqual(summary.passed, true);
        assert.strictEqual(summary.counts['match'], 2);
        assert.strictEqual(summary.counts['tolerated'], 1);
    });

    test('records a failing pair as an error and keeps going', async () => {
        const compareFiles = new ScriptedCompareFiles({
            'b.out': new Error('diff exited with status 2'),
            'c.out': 'differ',
        });

        const summary = await createUseCase(compareFiles).execute();

        assert.deepStrictEqual(summary.results.map(r => r.status), ['match', 'error', 'differ']);
        assert.strictEqual(summary.results[1].errorMessage, 'diff exited with status 2');
        assert.strictEqual(summary.passed, false);
        assert.ok(logger.entries.includes('error: Comparison failed for b.out'));
    });

    test('sends one notification for a failed run when asked', async () => {
        const compareFiles = new ScriptedCompareFiles({
            'b.out': new Error('boom'),
            'c.out': 'differ',
        });

        await createUseCase(compareFiles, { ...LAYOUT, notify: true }).execute();

        assert.deepStrictEqual(notifier.notifications, [
            { title: 'Regression run failed', message: '2 of 3 file(s) need attention' },
        ]);
    });

    test('sends a passing notification', async () => {
        globber = new FakeGlobber(['a.out', 'b.out']);

        await createUseCase(new ScriptedCompareFiles({}), { ...LAYOUT, notify: true }).execute();

        assert.deepStrictEqual(notifier.notifications, [
            { title: 'Regression run passed', message: '2 file(s) match' },
        ]);
    });

    test('stays quiet when notifications are off', async () => {
        await createUseCase(new ScriptedCompareFiles({ 'a.out': 'differ' })).execute();
        assert.deepStrictEqual(notifier.notifications, []);
    });

    test('counts missing files as failures', async () => {
        const summary = await createUseCase(new ScriptedCompareFiles({
            'a.out': 'missing-baseline',
            'b.out': 'missing-output',
        })).execute();

        assert.strictEqual(summary.counts['missing-baseline'], 1);
        assert.strictEqual(summary.counts['missing-output'], 1);
        assert.strictEqual(summary.passed, false);
    });
});
