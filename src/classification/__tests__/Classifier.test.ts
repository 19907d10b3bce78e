import { Classifier, CustomRuleSource, KeywordTables } from '../Classifier';

function rules(entries: Array<[string, string]> = []): CustomRuleSource {
    return { getCustomCategories: () => entries };
}

describe('Classifier', () => {
    describe('組み込みキーワード', () => {
        const classifier = new Classifier(rules());

        test.each([
            ['Visual Studio Code', 'Coding'],
            ['Slack', 'Communication'],
            ['Spotify', 'Entertainment'],
            ['Figma', 'Design'],
            ['Anki', 'Education']
        ])('%s は %s に分類されること', (app, category) => {
            expect(classifier.classify(app)).toBe(category);
        });

        test('大文字小文字を区別しないこと', () => {
            expect(classifier.classify('VISUAL STUDIO CODE')).toBe('Coding');
        });

        test('どれにも一致しなければ Other になること', () => {
            expect(classifier.classify('Mystery Tool')).toBe('Other');
            expect(classifier.isUnrecognized('Mystery Tool')).toBe(true);
            expect(classifier.isUnrecognized('Slack')).toBe(false);
        });
    });

    describe('ブラウザのサイト判定', () => {
        const classifier = new Classifier(rules());

        test('サイトのキーワードでカテゴリが決まること', () => {
            expect(classifier.classify('Google Chrome - YouTube')).toBe('Entertainment');
            expect(classifier.classify('Google Chrome - GitHub')).toBe('Coding');
            expect(classifier.classify('Firefox - Reddit')).toBe('Social Media');
        });
    });

    describe('ユーザー定義ルール', () => {
        test('組み込みキーワードより優先されること', () => {
            const classifier = new Classifier(rules([['code', 'Writing']]));
            expect(classifier.classify('Visual Studio Code')).toBe('Writing');
        });

        test('挿入順で最初に一致したルールが使われること', () => {
            const classifier = new Classifier(rules([['studio', 'First'], ['code', 'Second']]));
            expect(classifier.classify('Visual Studio Code')).toBe('First');
        });

        test('空のパターンは無視されること', () => {
            const classifier = new Classifier(rules([['', 'Everything']]));
            expect(classifier.classify('Slack')).toBe('Communication');
        });
    });

    test('キーワード表を差し替えられること', () => {
        const tables: KeywordTables = {
            fallback: 'Misc',
            groups: [
                { category: 'Alpha', keywords: ['shared'], sites: [] },
                { category: 'Beta', keywords: ['shared', 'beta'], sites: [] }
            ]
        };
        const classifier = new Classifier(rules(), tables);

        expect(classifier.classify('shared thing')).toBe('Alpha');
        expect(classifier.classify('beta thing')).toBe('Beta');
        expect(classifier.classify('nothing')).toBe('Misc');
        expect(classifier.getFallbackCategory()).toBe('Misc');
    });
});
