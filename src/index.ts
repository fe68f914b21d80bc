// src/index.ts
export * from './types.js';
export * from './errors.js';
export { scan } from './scanner.js';
export { LoopStack } from './loop-stack.js';
export { NO_JUMP, resolveJumps } from './brackets.js';
export { BufferIo, createProcessIo, type Io } from './io.js';
export {
    DEFAULT_OPTIONS,
    Interpreter,
    createState,
    run,
    type InterpreterOptions,
    type MachineState,
} from './interpreter.js';
