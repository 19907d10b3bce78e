import { createHash } from 'node:crypto';

/**
 * 統計閲覧用パスワードのハッシュ（SHA-256, hex）
 * データ自体は暗号化しない。表示前のゲートとしてのみ使う
 */
export function hashPassword(password: string): string {
    return createHash('sha256').update(password, 'utf8').digest('hex');
}

export function verifyPassword(password: string, passwordHash: string | null): boolean {
    if (!passwordHash) {
        return true;
    }
    return hashPassword(password) === passwordHash;
}
