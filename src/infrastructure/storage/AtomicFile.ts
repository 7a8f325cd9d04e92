import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * A sibling path for writing `target` before it is renamed into place.
 * Keeps the extension so encoders can infer the container.
 */
export function tempPathFor(target: string): string {
    const ext = path.extname(target);
    const base = target.substring(0, target.length - ext.length);
    return `${base}.tmp-${uuidv4().substring(0, 8)}${ext}`;
}

/**
 * Writes to a temp sibling then renames over `target`, so readers see
 * either the old file or the complete new one.
 */
export async function writeFileAtomic(target: string, data: string | Buffer): Promise<void> {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const temp = tempPathFor(target);
    try {
        await fs.promises.writeFile(temp, data);
        await fs.promises.rename(temp, target);
    } catch (error) {
        await fs.promises.rm(temp, { force: true });
        throw error;
    }
}

export async function writeJsonAtomic(target: string, value: unknown): Promise<void> {
    await writeFileAtomic(target, JSON.stringify(value, null, 2));
}

/**
 * Runs `produce` against a temp path and renames its output over `target`
 * only if it resolves. The temp file is removed on failure.
 */
export async function produceAtomically<T>(target: string, produce: (tempPath: string) => Promise<T>): Promise<T> {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const temp = tempPathFor(target);
    try {
        const result = await produce(temp);
        await fs.promises.rename(temp, target);
        return result;
    } catch (error) {
        await fs.promises.rm(temp, { force: true });
        throw error;
    }
}

/**
 * Parsed JSON at `filePath`, or undefined when the file does not exist.
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFileError(error)) {
            return undefined;
        }
        throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    return parsed;
}

/**
 * fs errors may come from another realm (Jest's node environment), so this
 * checks the code rather than the prototype.
 */
export function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.promises.stat(filePath);
        return stat.isFile();
    } catch (error) {
        if (isMissingFileError(error)) {
            return false;
        }
        throw error;
    }
}
