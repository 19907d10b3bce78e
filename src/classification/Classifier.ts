import keywordTables from './keywordTables.json';

export interface SiteGroup {
    category: string;
    keywords: string[];
}

/**
 * キーワード群。sites を持つ群（ブラウザ）はサイト種別で二段階判定する
 */
export interface KeywordGroup {
    category: string;
    keywords: string[];
    sites: SiteGroup[];
}

export interface KeywordTables {
    fallback: string;
    groups: KeywordGroup[];
}

export interface CustomRuleSource {
    getCustomCategories(): ReadonlyArray<readonly [string, string]>;
}

export const BUILT_IN_TABLES: KeywordTables = keywordTables;

function containsAny(haystack: string, keywords: readonly string[]): boolean {
    return keywords.some(keyword => haystack.includes(keyword.toLowerCase()));
}

/**
 * アプリ識別子 → カテゴリ
 * 1. ユーザー定義ルール（挿入順、最初の一致）
 * 2. 組み込みキーワード群（固定順、最初に一致した群）
 * 3. どれにも一致しなければ fallback
 */
export class Classifier {
    constructor(
        private readonly rules: CustomRuleSource,
        private readonly tables: KeywordTables = BUILT_IN_TABLES
    ) {}

    classify(appId: string): string {
        const app = appId.toLowerCase();

        for (const [pattern, category] of this.rules.getCustomCategories()) {
            if (pattern && app.includes(pattern.toLowerCase())) {
                return category;
            }
        }

        for (const group of this.tables.groups) {
            if (!containsAny(app, group.keywords)) {
                continue;
            }
            const site = group.sites.find(candidate => containsAny(app, candidate.keywords));
            return site ? site.category : group.category;
        }

        return this.tables.fallback;
    }

    isUnrecognized(appId: string): boolean {
        return this.classify(appId) === this.tables.fallback;
    }

    getFallbackCategory(): string {
        return this.tables.fallback;
    }
}
