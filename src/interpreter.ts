// src/interpreter.ts
import { resolveJumps } from './brackets.js';
import { pointerOutOfBounds, stepLimitExceeded, unmatchedLoopEnd, unmatchedLoopStart } from './errors.js';
import { BufferIo, type Io } from './io.js';
import { LoopStack } from './loop-stack.js';
import { scan } from './scanner.js';
import { CharCode, Op, OpType, TAPE_SIZE } from './types.js';

export interface InterpreterOptions {
    io: Io;
    /** Skip '\n' bytes before taking a value for ','. */
    skipInputNewlines: boolean;
    /** Stop with StepLimitExceeded after this many commands. */
    maxSteps?: number;
}

export const DEFAULT_OPTIONS: Readonly<Omit<InterpreterOptions, 'io'>> = {
    skipInputNewlines: true,
};

export interface MachineState {
    readonly tape: Uint32Array;
    pointer: number;
    cursor: number;
    readonly loops: LoopStack;
}

export const createState = (): MachineState => ({
    tape: new Uint32Array(TAPE_SIZE),
    pointer: 0,
    cursor: 0,
    loops: new LoopStack(),
});

const REPLACEMENT_CHAR = 0xFFFD;
const encoder = new TextEncoder();

// Lone surrogates come out of TextEncoder as U+FFFD as well.
const encodeCell = (value: number): Uint8Array =>
    encoder.encode(String.fromCodePoint(value <= 0x10FFFF ? value : REPLACEMENT_CHAR));

export class Interpreter {
    public readonly state: MachineState = createState();
    private readonly jumps: Int32Array;
    private readonly options: InterpreterOptions;
    private steps = 0;

    constructor(private readonly prog: Op[], options: Partial<InterpreterOptions> = {}) {
        this.jumps = resolveJumps(prog);
        this.options = { ...DEFAULT_OPTIONS, io: new BufferIo(), ...options };
    }

    get done(): boolean {
        return this.state.cursor >= this.prog.length;
    }

    private readInput(): number {
        const { io, skipInputNewlines } = this.options;
        let value = io.read();
        while (skipInputNewlines && value === CharCode.LF) {
            value = io.read();
        }
        // end of input stores 0
        return value ?? 0;
    }

    /** Executes the command under the cursor. */
    step(): void {
        if (this.done) return;
        const s = this.state;
        const op = this.prog[s.cursor];

        const { maxSteps } = this.options;
        if (maxSteps !== undefined && this.steps >= maxSteps) {
            throw stepLimitExceeded(op, maxSteps);
        }
        this.steps++;

        switch (op.type) {
            case OpType.LEFT:
                if (s.pointer === 0) throw pointerOutOfBounds(op, 'underflow');
                s.pointer--;
                break;
            case OpType.RIGHT:
                if (s.pointer === TAPE_SIZE - 1) throw pointerOutOfBounds(op, 'overflow');
                s.pointer++;
                break;
            case OpType.ADD:
                // Uint32Array stores modulo 2^32
                s.tape[s.pointer] = s.tape[s.pointer] + 1;
                break;
            case OpType.SUB:
                s.tape[s.pointer] = s.tape[s.pointer] - 1;
                break;
            case OpType.OUTPUT:
                this.options.io.write(encodeCell(s.tape[s.pointer]));
                break;
            case OpType.INPUT:
                s.tape[s.pointer] = this.readInput();
                break;
            case OpType.OPEN:
                if (s.tape[s.pointer] === 0) {
                    s.cursor = this.jumps[s.cursor] + 1;
                    return;
                }
                s.loops.push(s.cursor, op);
                break;
            case OpType.CLOSE: {
                const start = s.loops.peek();
                if (start === undefined) {
                    throw unmatchedLoopEnd(op);
                }
                if (s.tape[s.pointer] !== 0) {
                    s.cursor = start + 1;
                    return;
                }
                s.loops.pop();
                break;
            }
        }
        s.cursor++;
    }

    run(): MachineState {
        while (!this.done) {
            this.step();
        }
        const unclosed = this.state.loops.bottom();
        if (unclosed !== undefined) {
            throw unmatchedLoopStart(this.prog[unclosed]);
        }
        return this.state;
    }
}

/** Scans, resolves brackets and runs `source` on a fresh machine. */
export const run = (source: string, options: Partial<InterpreterOptions> = {}): MachineState => {
    const prog = scan(source);
    const interpreter = new Interpreter(prog, options);
    return interpreter.run();
};
