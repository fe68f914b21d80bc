// src/types.ts
export enum OpType {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
  ADD = 'ADD',
  SUB = 'SUB',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
}

export const TAPE_SIZE = 30000;
export const CELL_MAX = 0xFFFFFFFF;
export const MAX_LOOP_DEPTH = 32767;

export interface SourcePosition {
  line: number;
  column: number;
}

export class Op implements SourcePosition {
  constructor(
    public readonly type: OpType,
    public readonly line: number,
    public readonly column: number
  ) {}
}

export enum CharCode {
  LF = 10,    // '\n'
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}
