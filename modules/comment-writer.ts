import fs, { type FileHandle } from 'fs/promises';
import type { CommentRecord } from '../types';
import { toTsvRow } from './utils';

export default class CommentTsvWriter {
    private written = 0;
    private closed = false;

    private constructor(readonly path: string, private handle: FileHandle) {}

    // 'w' truncates whatever the previous run left behind
    static open = async (path: string): Promise<CommentTsvWriter> => {
        const handle = await fs.open(path, 'w');
        return new CommentTsvWriter(path, handle);
    }

    get recordCount(): number {
        return this.written;
    }

    write = async (record: CommentRecord): Promise<void> => {
        if (this.closed) throw new Error(`writer for ${this.path} is already closed`);
        await this.handle.write(toTsvRow(record));
        this.written++;
    }

    close = async (): Promise<void> => {
        if (this.closed) return;
        this.closed = true;
        await this.handle.close();
    }
}
