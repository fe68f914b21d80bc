// src/io.ts
import fs from 'fs';

/** Byte ports used by the '.' and ',' commands. `read` returns null at end of input. */
export interface Io {
    write(bytes: Uint8Array): void;
    read(): number | null;
}

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
    e instanceof Error && 'code' in e;

/**
 * Blocking stdin/stdout. Each write goes straight to the descriptor, so
 * output is never held back behind a pending read.
 */
export const createProcessIo = (): Io => {
    const buf = Buffer.alloc(1);
    return {
        write(bytes: Uint8Array): void {
            let offset = 0;
            while (offset < bytes.length) {
                offset += fs.writeSync(process.stdout.fd, bytes, offset);
            }
        },
        read(): number | null {
            for (;;) {
                try {
                    const n = fs.readSync(process.stdin.fd, buf, 0, 1, null);
                    return n === 0 ? null : buf[0];
                } catch (e) {
                    if (isErrnoException(e) && e.code === 'EAGAIN') continue;
                    if (isErrnoException(e) && e.code === 'EOF') return null;
                    throw e;
                }
            }
        },
    };
};

/** In-memory ports: fixed input, captured output. */
export class BufferIo implements Io {
    private readonly input: Uint8Array;
    private inputPos = 0;
    private readonly chunks: Uint8Array[] = [];

    constructor(input: string | Uint8Array = '') {
        this.input = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
    }

    write(bytes: Uint8Array): void {
        this.chunks.push(Uint8Array.from(bytes));
    }

    read(): number | null {
        if (this.inputPos >= this.input.length) return null;
        return this.input[this.inputPos++];
    }

    get output(): Buffer {
        return Buffer.concat(this.chunks);
    }

    get text(): string {
        return this.output.toString('utf8');
    }
}
