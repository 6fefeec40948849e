import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const PackageJsonSchema = z.looseObject({ version: z.string() });

/** package.json が読めない場合のバージョン */
export const FALLBACK_VERSION = '0.0.0-local';

/**
 * バージョン情報を取得する
 *
 * WHY: TypeScript を直接実行するため、ビルド時の埋め込みではなく package.json から読む
 */
export function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const projectRoot = join(dirname(currentFile), '..', '..', '..');
    const packageJson: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(packageJson);
    return parsed.success ? parsed.data.version : FALLBACK_VERSION;
  } catch {
    // package.jsonの読み取りに失敗した場合のフォールバック
    return FALLBACK_VERSION;
  }
}
