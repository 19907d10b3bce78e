import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { AccountingStore, AccountingStoreOptions } from '../AccountingStore';
import { Classifier } from '../../classification/Classifier';
import { CorruptDocumentError, PersistenceError, ValidationError } from '../../types/errors';

jest.mock('../../utils/logger');

describe('AccountingStore', () => {
    let tempDir: string;
    let filePath: string;
    let excluded: string[];

    const today = new Date(2024, 0, 15, 10, 0, 0);

    function options(overrides: Partial<AccountingStoreOptions> = {}): AccountingStoreOptions {
        return {
            filePath,
            classifier: new Classifier({ getCustomCategories: () => [] }),
            exclusions: { getExcludedApps: () => excluded },
            clock: () => today,
            ...overrides
        };
    }

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'accounting-'));
        filePath = path.join(tempDir, 'time_tracking.json');
        excluded = [];
    });

    afterEach(() => {
        fs.removeSync(tempDir);
    });

    describe('record', () => {
        test('今日の日付・分類されたカテゴリに加算されること', () => {
            const store = AccountingStore.load(options());

            expect(store.record('Visual Studio Code', 5)).toBe(true);

            expect(store.snapshotFor('2024-01-15')).toEqual({
                Coding: { total_seconds: 5, apps: { 'Visual Studio Code': 5 } }
            });
            expect(store.isDirty()).toBe(true);
        });

        test('total_seconds はアプリ別秒数の合計になること', () => {
            const store = AccountingStore.load(options());
            store.record('Visual Studio Code', 5);
            store.record('Terminal', 2.5);
            store.record('Visual Studio Code', 10);

            const bucket = store.snapshotFor('2024-01-15').Coding;
            expect(bucket.apps).toEqual({ 'Visual Studio Code': 15, Terminal: 2.5 });
            expect(bucket.total_seconds).toBe(17.5);
        });

        test('プロジェクト指定時はプロジェクト別にも加算されること', () => {
            const store = AccountingStore.load(options());
            store.record('Slack', 10, 'alpha');
            store.record('Slack', 5);

            expect(store.snapshotFor('2024-01-15').Communication).toEqual({
                total_seconds: 15,
                apps: { Slack: 15 },
                projects: { alpha: 10 }
            });
        });

        test('除外対象のアプリは記録されないこと', () => {
            excluded = ['slack'];
            const store = AccountingStore.load(options());

            expect(store.record('Slack', 10)).toBe(false);
            expect(store.snapshotFor('2024-01-15')).toEqual({});
            expect(store.isDirty()).toBe(false);
        });

        test('負の秒数は ValidationError になること', () => {
            const store = AccountingStore.load(options());
            expect(() => store.record('Slack', -1)).toThrow(ValidationError);
            expect(store.dates()).toEqual([]);
        });

        test('0秒の記録はアプリを追加するが合計は変わらないこと', () => {
            const store = AccountingStore.load(options());
            store.record('Slack', 0);
            expect(store.snapshotFor('2024-01-15').Communication).toEqual({ total_seconds: 0, apps: { Slack: 0 } });
        });
    });

    describe('manualEntry', () => {
        test('指定した日付・カテゴリへ分を秒に換算して記録し保存すること', () => {
            const store = AccountingStore.load(options());
            store.manualEntry('Notes', 'Writing', 30, null, '2024-01-01');

            expect(store.snapshotFor('2024-01-01')).toEqual({
                Writing: { total_seconds: 1800, apps: { Notes: 1800 } }
            });
            const saved = fs.readJsonSync(filePath);
            expect(saved['2024-01-01'].Writing.total_seconds).toBe(1800);
            expect(store.isDirty()).toBe(false);
        });

        test('日付省略時は今日に記録されること', () => {
            const store = AccountingStore.load(options());
            store.manualEntry('Notes', 'Writing', 1, 'book');

            expect(store.snapshotFor('2024-01-15').Writing).toEqual({
                total_seconds: 60,
                apps: { Notes: 60 },
                projects: { book: 60 }
            });
        });

        test('除外リストは手入力には適用されないこと', () => {
            excluded = ['notes'];
            const store = AccountingStore.load(options());
            store.manualEntry('Notes', 'Writing', 2);
            expect(store.snapshotFor('2024-01-15').Writing.total_seconds).toBe(120);
        });

        test.each([
            ['空のアプリ名', '  ', 'Writing', 30, '2024-01-01'],
            ['空のカテゴリ', 'Notes', '', 30, '2024-01-01'],
            ['0分', 'Notes', 'Writing', 0, '2024-01-01'],
            ['負の分', 'Notes', 'Writing', -5, '2024-01-01'],
            ['存在しない日付', 'Notes', 'Writing', 30, '2024-02-30'],
            ['形式違いの日付', 'Notes', 'Writing', 30, '01/02/2024']
        ])('%s は拒否され何も書き込まれないこと', (_label, app, category, minutes, date) => {
            const store = AccountingStore.load(options());

            expect(() => store.manualEntry(app, category, minutes, null, date)).toThrow(ValidationError);
            expect(store.dates()).toEqual([]);
            expect(fs.pathExistsSync(filePath)).toBe(false);
        });
    });

    describe('読み出し', () => {
        test('snapshotRange は両端を含み、記録のない日は含まないこと', () => {
            const store = AccountingStore.load(options());
            store.manualEntry('Notes', 'Writing', 1, null, '2024-01-01');
            store.manualEntry('Notes', 'Writing', 2, null, '2024-01-03');
            store.manualEntry('Notes', 'Writing', 3, null, '2024-01-05');

            const range = store.snapshotRange({ start: '2024-01-01', end: '2024-01-03' });
            expect(Object.keys(range)).toEqual(['2024-01-01', '2024-01-03']);
        });

        test('返されたスナップショットを変更してもストアに影響しないこと', () => {
            const store = AccountingStore.load(options());
            store.record('Slack', 10);

            const snapshot = store.snapshotFor('2024-01-15');
            snapshot.Communication.apps.Slack = 999;

            expect(store.snapshotFor('2024-01-15').Communication.apps.Slack).toBe(10);
        });
    });

    describe('永続化', () => {
        test('保存した内容を読み込み直せること', () => {
            const store = AccountingStore.load(options());
            store.record('Slack', 10, 'alpha');
            store.setStreaks({ current: 2, longest: 5, last_date: '2024-01-15' });
            store.persist();

            const reloaded = AccountingStore.load(options());
            expect(reloaded.snapshotFor('2024-01-15')).toEqual(store.snapshotFor('2024-01-15'));
            expect(reloaded.getStreaks()).toEqual({ current: 2, longest: 5, last_date: '2024-01-15' });
            expect(reloaded.dates()).toEqual(['2024-01-15']);
        });

        test('ファイルがなければ空のストアになること', () => {
            const store = AccountingStore.load(options());
            expect(store.dates()).toEqual([]);
            expect(store.getStreaks()).toEqual({ current: 0, longest: 0, last_date: null });
        });

        test('解析できないファイルは CorruptDocumentError で、ファイルは変更されないこと', () => {
            fs.writeFileSync(filePath, '{ not json');

            expect(() => AccountingStore.load(options())).toThrow(CorruptDocumentError);
            expect(fs.readFileSync(filePath, 'utf8')).toBe('{ not json');
        });

        test('日付でも streaks でもないキーは CorruptDocumentError になること', () => {
            fs.writeJsonSync(filePath, { foo: {} });
            expect(() => AccountingStore.load(options())).toThrow(CorruptDocumentError);
        });

        test('書き込みに失敗すると PersistenceError になり未保存のまま残ること', () => {
            fs.writeFileSync(path.join(tempDir, 'blocker'), 'file');
            const store = AccountingStore.load(options({ filePath: path.join(tempDir, 'blocker', 'data.json') }));
            store.record('Slack', 10);

            expect(() => store.persist()).toThrow(PersistenceError);
            expect(store.isDirty()).toBe(true);
            expect(store.snapshotFor('2024-01-15').Communication.total_seconds).toBe(10);
        });

        test('手入力の保存に失敗した場合は記録前の状態に戻ること', () => {
            fs.writeFileSync(path.join(tempDir, 'blocker'), 'file');
            const store = AccountingStore.load(options({ filePath: path.join(tempDir, 'blocker', 'data.json') }));
            store.record('Slack', 10);

            expect(() => store.manualEntry('Slack', 'Communication', 5)).toThrow(PersistenceError);
            expect(() => store.manualEntry('Notes', 'Writing', 5, null, '2024-01-10')).toThrow(PersistenceError);

            expect(store.snapshotFor('2024-01-15')).toEqual({
                Communication: { total_seconds: 10, apps: { Slack: 10 } }
            });
            expect(store.dates()).toEqual(['2024-01-15']);
            expect(store.isDirty()).toBe(true);
        });

        test('一時ファイルが残らないこと', () => {
            const store = AccountingStore.load(options());
            store.record('Slack', 10);
            store.persist();

            expect(fs.readdirSync(tempDir)).toEqual(['time_tracking.json']);
        });
    });

    test('clearAll は全記録と連続日数を消去して保存すること', () => {
        const store = AccountingStore.load(options());
        store.record('Slack', 10);
        store.setStreaks({ current: 1, longest: 1, last_date: '2024-01-15' });
        store.clearAll();

        expect(store.dates()).toEqual([]);
        expect(fs.readJsonSync(filePath)).toEqual({ streaks: { current: 0, longest: 0, last_date: null } });
    });
});
