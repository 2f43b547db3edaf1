import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { DownstreamError } from '../errors';

export interface PhotoStorage {
    read(ref: string): Promise<Buffer>;
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Photos referenced by absolute path, file:// URL, or a path relative to `root`. */
export class LocalPhotoStorage implements PhotoStorage {
    constructor(private readonly root: string = process.cwd()) { }

    resolve(ref: string): string {
        const filePath = ref.startsWith('file://') ? fileURLToPath(ref) : ref;
        return path.resolve(this.root, filePath);
    }

    async read(ref: string): Promise<Buffer> {
        try {
            return await fs.readFile(this.resolve(ref));
        } catch (err) {
            if (isNotFound(err)) {
                throw new DownstreamError(`corrected image not found: ${ref}`, 'permanent', null, err);
            }
            throw new DownstreamError(`could not read ${ref}: ${err instanceof Error ? err.message : String(err)}`, 'transient', null, err);
        }
    }
}

/** `<source without extension>_color_corrected.jpg`, next to the source photo. */
export function correctedPathFor(sourcePath: string): string {
    const ext = path.extname(sourcePath);
    const base = ext ? sourcePath.slice(0, -ext.length) : sourcePath;
    return `${base}_color_corrected.jpg`;
}
