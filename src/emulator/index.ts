export { TabletCpu, CpuState, FaultReason, type CpuConfig, type CpuFault } from './cpu.js';
export { SparseMemory, PAGE_WORDS, MAX_ADDRESS } from './memory.js';
export { OPCODE, MNEMONICS, INSTRUCTION_WORDS, isOpcode, mnemonicOf, opcodeOf, type Mnemonic, type Opcode } from './opcodes.js';
export { KeyboardController, type InputDevice, type KeySource } from './keyboard.js';
export {
  SixelDisplay,
  DEFAULT_DISPLAY_ADDRESS,
  DEFAULT_DISPLAY_WIDTH,
  DEFAULT_DISPLAY_HEIGHT,
  MAX_DISPLAY_SIZE,
  checkFrameBuffer,
  type DisplayDevice,
  type FrameSink,
  type SixelDisplayConfig,
} from './display.js';
export { encodeSixels, renderFrame, SIXEL_BEGIN, SIXEL_END, CURSOR_HOME, CLEAR_SCREEN } from './sixel.js';
export {
  decodeInstruction,
  disassemble,
  disassembleWords,
  formatInstruction,
  formatListingLine,
  type DecodedInstruction,
} from './disassembler.js';
export { encodeImage, decodeImage, WORD_BYTES } from './image.js';
export { main as runRunnerCli, runCpu, type RunnerIo, type TerminalInput, type TerminalOutput } from './cli.js';
