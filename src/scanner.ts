// src/scanner.ts
import { Op, OpType, CharCode } from './types.js';

const opMap: Record<number, OpType> = {
    [CharCode.LT]: OpType.LEFT,
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.ADD]: OpType.ADD,
    [CharCode.SUB]: OpType.SUB,
    [CharCode.LB]: OpType.OPEN,
    [CharCode.RB]: OpType.CLOSE,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
};

/**
 * Turns source text into the command sequence. Every code point advances the
 * column, commands or not, so positions match the text as written.
 */
export const scan = (source: string): Op[] => {
    const prog: Op[] = [];
    let line = 1;
    let column = 1;

    for (const ch of source) {
        const c = ch.codePointAt(0) ?? 0;
        if (c === CharCode.LF) {
            line++;
            column = 1;
            continue;
        }

        const opType = opMap[c];
        if (opType) {
            prog.push(new Op(opType, line, column));
        }
        column++;
    }

    return prog;
};
