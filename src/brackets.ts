// src/brackets.ts
import { unmatchedLoopEnd, unmatchedLoopStart } from './errors.js';
import { LoopStack } from './loop-stack.js';
import { Op, OpType } from './types.js';

export const NO_JUMP = -1;

/**
 * Pairs every '[' with its ']' in one pass and returns a table parallel to
 * `prog`: each bracket holds the index of its partner, everything else
 * NO_JUMP. Errors come out in source order, and an unclosed '[' is reported
 * at the outermost one.
 */
export const resolveJumps = (prog: Op[], maxDepth?: number): Int32Array => {
    const jumps = new Int32Array(prog.length).fill(NO_JUMP);
    const open = new LoopStack(maxDepth);

    for (let pc = 0; pc < prog.length; pc++) {
        const op = prog[pc];
        if (op.type === OpType.OPEN) {
            open.push(pc, op);
        } else if (op.type === OpType.CLOSE) {
            const start = open.pop();
            if (start === undefined) {
                throw unmatchedLoopEnd(op);
            }
            jumps[start] = pc;
            jumps[pc] = start;
        }
    }

    const unclosed = open.bottom();
    if (unclosed !== undefined) {
        throw unmatchedLoopStart(prog[unclosed]);
    }

    return jumps;
};
