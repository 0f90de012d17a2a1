import * as fs from 'fs';
import { ioError } from '../errors';

export interface TraceSink {
    write(text: string): void;
    close(): void;
}

/** Shared by every job of a run; closing it leaves the stream open. */
export class ConsoleSink implements TraceSink {
    constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

    write(text: string): void {
        this.stream.write(text);
    }

    close(): void {}
}

const FLUSH_THRESHOLD = 64 * 1024;

export class FileSink implements TraceSink {
    private pending: string[] = [];
    private pendingLength = 0;
    private fd: number | undefined;

    private constructor(private readonly filePath: string, fd: number) {
        this.fd = fd;
    }

    /** Creates or truncates `filePath`. */
    static open(filePath: string): FileSink {
        let fd: number;
        try {
            fd = fs.openSync(filePath, 'w');
        } catch (error) {
            throw ioError(`Could not create output ${filePath}`, error);
        }
        return new FileSink(filePath, fd);
    }

    write(text: string): void {
        this.pending.push(text);
        this.pendingLength += text.length;
        if (this.pendingLength >= FLUSH_THRESHOLD) {
            this.flush();
        }
    }

    close(): void {
        if (this.fd === undefined) { return; }
        const fd = this.fd;
        try {
            this.flush();
        } finally {
            this.fd = undefined;
            fs.closeSync(fd);
        }
    }

    private flush(): void {
        if (this.fd === undefined || this.pending.length === 0) { return; }
        const chunk = this.pending.join('');
        this.pending = [];
        this.pendingLength = 0;
        try {
            fs.writeSync(this.fd, chunk);
        } catch (error) {
            throw ioError(`Could not write output ${this.filePath}`, error);
        }
    }
}
