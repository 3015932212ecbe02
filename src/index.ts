// Tablet VM - 17-opcode virtual computer and its assembler

// Emulator
export * from './emulator/index.js';

// Assembler
export * from './assembler/index.js';
