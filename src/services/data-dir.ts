// ============================================================================
// Data Directory — where session files live
// ============================================================================
// DATA_DIR wins; otherwise ./data relative to the CWD.
// ============================================================================

import fs from 'fs';
import path from 'path';
import { DATA_DIR } from '../config.js';

export function getDataDir(): string {
    return DATA_DIR() || path.join(process.cwd(), 'data');
}

export function ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        console.log(`[DataDir] Directory created: ${dir}`);
    }
}

/**
 * Atomic write: write to .tmp, then rename over the target.
 */
export function writeFileAtomic(filePath: string, data: string): void {
    ensureDir(path.dirname(filePath));
    const tmp = filePath + '.tmp';
    fs.writeFileSync(tmp, data, { encoding: 'utf-8', mode: 0o600 });
    fs.renameSync(tmp, filePath);
}

/**
 * File contents, or null when the file does not exist.
 */
export function readFileSafe(filePath: string): string | null {
    if (!fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, 'utf-8');
}
