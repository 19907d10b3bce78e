import * as fs from 'fs-extra';
import * as path from 'path';
import { CorruptDocumentError, PersistenceError } from '../types/errors';

/**
 * 一時ファイルに書いてからリネームする（読み手に書きかけのファイルを見せない）
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
    const tempPath = `${filePath}.tmp`;
    try {
        fs.ensureDirSync(path.dirname(filePath));
        fs.writeJsonSync(tempPath, data, { spaces: 2 });
        fs.moveSync(tempPath, filePath, { overwrite: true });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new PersistenceError(`Failed to write ${filePath}: ${message}`, filePath, error);
    }
}

/**
 * JSONファイルを読み込む。存在しなければ null、解析できなければ CorruptDocumentError
 */
export function readJsonDocument(filePath: string): Record<string, unknown> | null {
    if (!fs.pathExistsSync(filePath)) {
        return null;
    }
    const text = fs.readFileSync(filePath, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CorruptDocumentError(`Cannot parse ${filePath}: ${message}`, filePath);
    }
    if (!isPlainObject(parsed)) {
        throw new CorruptDocumentError(`${filePath} does not contain a JSON object`, filePath);
    }
    return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
