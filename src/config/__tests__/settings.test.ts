import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Settings, getDefaultConfig } from '../settings';
import { CorruptDocumentError, ValidationError } from '../../types/errors';
import { hashPassword, verifyPassword } from '../../security/passwordGate';
import { Classifier } from '../../classification/Classifier';

jest.mock('../../utils/logger');

describe('Settings', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'));
        configPath = path.join(tempDir, 'tracker_config.json');
    });

    afterEach(() => {
        fs.removeSync(tempDir);
    });

    test('ファイルがなければ既定値で作成されること', () => {
        const settings = new Settings(configPath);

        expect(settings.getGoals()).toEqual({ Coding: 4, Entertainment: 2 });
        expect(settings.getIdleThresholdSeconds()).toBe(300);
        expect(settings.getTickIntervalSeconds()).toBe(5);
        expect(settings.getMaxIncrementSeconds()).toBeNull();
        expect(settings.getProductiveCategories()).toEqual(['Coding', 'Productivity', 'Education']);
        expect(fs.readJsonSync(configPath)).toEqual(getDefaultConfig());
    });

    test('設定の変更は保存され、読み込み直せること', () => {
        const settings = new Settings(configPath);
        settings.setGoal('Coding', 5);
        settings.addExcludedApp('Password Manager');
        settings.setBreakReminderInterval(0);
        settings.setNotificationsEnabled(false);

        const reloaded = new Settings(configPath);
        expect(reloaded.getGoals()).toEqual({ Coding: 5, Entertainment: 2 });
        expect(reloaded.getExcludedApps()).toEqual(['Password Manager']);
        expect(reloaded.getBreakReminderInterval()).toBe(0);
        expect(reloaded.isNotificationsEnabled()).toBe(false);
    });

    test.each([
        ['tick 間隔 0', (s: Settings) => s.setTickIntervalSeconds(0)],
        ['負のアイドル閾値', (s: Settings) => s.setIdleThresholdSeconds(-1)],
        ['空のカテゴリの目標', (s: Settings) => s.setGoal(' ', 1)],
        ['負の目標', (s: Settings) => s.setGoal('Coding', -2)],
        ['空のパターン', (s: Settings) => s.addCustomCategory('', 'Writing')],
        ['上限 0', (s: Settings) => s.setMaxIncrementSeconds(0)]
    ])('%s は ValidationError になり保存されないこと', (_label, change) => {
        const settings = new Settings(configPath);
        const before = fs.readFileSync(configPath, 'utf8');

        expect(() => change(settings)).toThrow(ValidationError);
        expect(fs.readFileSync(configPath, 'utf8')).toBe(before);
    });

    test('不正な値の項目は既定値になり、他の項目は読み込まれること', () => {
        fs.writeJsonSync(configPath, { idle_threshold_seconds: 'abc', tick_interval_seconds: 10 });
        const settings = new Settings(configPath);

        expect(settings.getIdleThresholdSeconds()).toBe(300);
        expect(settings.getTickIntervalSeconds()).toBe(10);
    });

    test('解析できないファイルは CorruptDocumentError になり上書きされないこと', () => {
        fs.writeFileSync(configPath, 'not json');
        expect(() => new Settings(configPath)).toThrow(CorruptDocumentError);
        expect(fs.readFileSync(configPath, 'utf8')).toBe('not json');
    });

    test('知らないキーは保存時にも残ること', () => {
        fs.writeJsonSync(configPath, { theme: 'dark' });
        const settings = new Settings(configPath);
        settings.setGoal('Reading', 1);

        const saved = fs.readJsonSync(configPath);
        expect(saved.theme).toBe('dark');
        expect(saved.goals).toEqual({ Coding: 4, Entertainment: 2, Reading: 1 });
    });

    describe('分類ルール', () => {
        test('既存パターンの更新は位置を保ち、新規は末尾に追加されること', () => {
            const settings = new Settings(configPath);
            settings.addCustomCategory('code', 'Writing');
            settings.addCustomCategory('studio', 'Design');
            settings.addCustomCategory('code', 'Notes');

            expect(settings.getCustomCategories()).toEqual([['code', 'Notes'], ['studio', 'Design']]);
            expect(new Settings(configPath).getCustomCategories()).toEqual([['code', 'Notes'], ['studio', 'Design']]);
        });

        test('数字だけのパターンも追加順のまま保存・読み込みされること', () => {
            const settings = new Settings(configPath);
            settings.addCustomCategory('game', 'Entertainment');
            settings.addCustomCategory('2048', 'Coding');

            expect(fs.readJsonSync(configPath).custom_categories).toEqual([['game', 'Entertainment'], ['2048', 'Coding']]);

            const reloaded = new Settings(configPath);
            expect(reloaded.getCustomCategories()).toEqual([['game', 'Entertainment'], ['2048', 'Coding']]);
            expect(new Classifier(reloaded).classify('2048 game')).toBe('Entertainment');
        });

        test('ペア配列形式も順序どおりに読み込めること', () => {
            fs.writeJsonSync(configPath, { custom_categories: [['10', 'A'], ['2', 'B']] });
            expect(new Settings(configPath).getCustomCategories()).toEqual([['10', 'A'], ['2', 'B']]);
        });

        test('削除できること', () => {
            const settings = new Settings(configPath);
            settings.addCustomCategory('code', 'Writing');
            settings.removeCustomCategory('code');
            expect(settings.getCustomCategories()).toEqual([]);
        });
    });

    test('プロジェクトを登録すると作成日時が付くこと', () => {
        const settings = new Settings(configPath);
        settings.addProject('alpha', { description: 'first' });

        const project = settings.getProjects().alpha;
        expect(project.description).toBe('first');
        expect(typeof project.created_at).toBe('string');
    });

    describe('パスワード', () => {
        test('未設定なら常に通ること', () => {
            const settings = new Settings(configPath);
            expect(settings.hasPassword()).toBe(false);
            expect(settings.checkPassword('')).toBe(true);
        });

        test('設定後は一致するパスワードのみ通ること', () => {
            const settings = new Settings(configPath);
            settings.setPassword('test-secret');

            expect(settings.checkPassword('test-secret')).toBe(true);
            expect(settings.checkPassword('wrong')).toBe(false);
            expect(fs.readJsonSync(configPath).password_hash).toBe(hashPassword('test-secret'));

            settings.clearPassword();
            expect(settings.checkPassword('wrong')).toBe(true);
        });

        test('SHA-256 の16進表記であること', () => {
            expect(hashPassword('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
            expect(verifyPassword('abc', null)).toBe(true);
        });
    });
});
