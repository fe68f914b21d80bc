// src/loop-stack.ts
import { excessiveLoopDepth } from './errors.js';
import { MAX_LOOP_DEPTH, type SourcePosition } from './types.js';

/** Indices of the currently open '[' commands, innermost on top. */
export class LoopStack {
    private readonly entries: number[] = [];

    constructor(private readonly limit: number = MAX_LOOP_DEPTH) { }

    get depth(): number {
        return this.entries.length;
    }

    isEmpty(): boolean {
        return this.entries.length === 0;
    }

    push(index: number, at: SourcePosition): void {
        if (this.entries.length >= this.limit) {
            throw excessiveLoopDepth(at, this.limit);
        }
        this.entries.push(index);
    }

    peek(): number | undefined {
        return this.entries[this.entries.length - 1];
    }

    pop(): number | undefined {
        return this.entries.pop();
    }

    // outermost open loop
    bottom(): number | undefined {
        return this.entries[0];
    }
}
