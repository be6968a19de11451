/**
 * Capture sinks: where the relay persists each stream's job bytes.
 * @module ruida/sink
 */
import {open, type FileHandle} from 'fs/promises';
import {join} from 'path';

import type {BusySession} from './session';

/** Byte destination owned by exactly one busy session. */
export interface CaptureSink {
    /** Human-readable location, e.g. a file path. */
    readonly name: string;
    write(data: Buffer): Promise<void>;
    /** Flush and release. Safe to call more than once. */
    close(): Promise<void>;
}

/** Creates the sink for a freshly opened session. */
export type CaptureSinkFactory = (session: BusySession) => Promise<CaptureSink>;

/** `out_<startedAt>_<id>.rd`; unique per relay run. */
export const captureFileName = (session: BusySession): string => `out_${session.startedAt}_${session.id}.rd`;

/** Appends job bytes to a newly created file. */
export class FileCaptureSink implements CaptureSink {
    public readonly name: string;
    private handle: FileHandle | null;
    private written = 0;

    private constructor(name: string, handle: FileHandle) {
        this.name = name;
        this.handle = handle;
    }

    /**
     * Create the file; fails when it already exists.
     * @param path Target file path.
     */
    public static async create(path: string): Promise<FileCaptureSink> {
        const handle = await open(path, 'wx');
        return new FileCaptureSink(path, handle);
    }

    /** Bytes written so far. */
    public get size(): number {
        return this.written;
    }

    public async write(data: Buffer): Promise<void> {
        if (!this.handle) {
            throw new Error(`Capture file ${this.name} is closed`);
        }
        let offset = 0;
        while (offset < data.length) {
            const {bytesWritten} = await this.handle.write(data, offset, data.length - offset);
            offset += bytesWritten;
        }
        this.written += data.length;
    }

    public async close(): Promise<void> {
        const handle = this.handle;
        if (!handle) return;
        this.handle = null;
        await handle.close();
    }
}

/**
 * Factory writing one capture file per session into `directory`.
 * @param directory Target directory. Defaults to the working directory.
 */
export const fileCaptureSinkFactory = (directory = process.cwd()): CaptureSinkFactory => {
    return (session) => FileCaptureSink.create(join(directory, captureFileName(session)));
};
