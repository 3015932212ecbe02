/**
 * Tablet Assembler
 *
 * Assembles mnemonic source into four-word instructions.
 */

export * from './lexer.js';
export * from './parser.js';
export * from './macros.js';
export * from './assembler.js';
export { main as runAssemblerCli, formatHexDump } from './cli.js';
