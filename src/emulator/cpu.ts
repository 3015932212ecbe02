/**
 * Tablet CPU Emulator
 *
 * Memory-to-memory machine with 17 opcodes. There are no registers besides
 * the program counter; every operand is a word address (or, for lpc/beq,
 * the address of a word holding the jump target).
 */

import { SparseMemory } from './memory.js';
import { OPCODE, INSTRUCTION_WORDS } from './opcodes.js';
import { InputDevice } from './keyboard.js';
import { DisplayDevice } from './display.js';
import { DecodedInstruction, decodeInstruction, formatInstruction } from './disassembler.js';

export enum CpuState {
  RUNNING = 'RUNNING',
  HALTED = 'HALTED',
  FAULTED = 'FAULTED',
}

export enum FaultReason {
  ILLEGAL_OPCODE = 'ILLEGAL_OPCODE',
  DIVIDE_BY_ZERO = 'DIVIDE_BY_ZERO',
}

/**
 * Machine state at the instruction that faulted
 */
export interface CpuFault {
  reason: FaultReason;
  message: string;
  pc: number;
  opcode: number;
  a: number;
  b: number;
  c: number;
}

export interface CpuConfig {
  /** Memory to execute from (default: a fresh, empty memory) */
  memory?: SparseMemory;
  /** Device polled by `key` (default: none, `key` reads 0) */
  keyboard?: InputDevice;
  /** Device refreshed by `drw` (default: none, `drw` does nothing) */
  display?: DisplayDevice;
  /** Initial PC value (default 0) */
  initialPc?: number;
  /** Called before each instruction executes */
  trace?: (instruction: DecodedInstruction) => void;
}

export class TabletCpu {
  public readonly memory: SparseMemory;
  public pc: number;
  public state: CpuState = CpuState.RUNNING;
  public fault: CpuFault | null = null;
  public cycles: number = 0;

  private readonly initialPc: number;
  private readonly keyboard: InputDevice | null;
  private readonly display: DisplayDevice | null;
  private readonly trace: ((instruction: DecodedInstruction) => void) | null;

  constructor(config: CpuConfig = {}) {
    this.memory = config.memory ?? new SparseMemory();
    this.keyboard = config.keyboard ?? null;
    this.display = config.display ?? null;
    this.trace = config.trace ?? null;
    this.initialPc = (config.initialPc ?? 0) >>> 0;
    this.pc = this.initialPc;
  }

  get running(): boolean {
    return this.state === CpuState.RUNNING;
  }

  /**
   * Reset PC, state and counters, and clear memory
   */
  reset(): void {
    this.memory.clear();
    this.pc = this.initialPc;
    this.state = CpuState.RUNNING;
    this.fault = null;
    this.cycles = 0;
  }

  /**
   * Load a program image into memory
   */
  loadProgram(words: ArrayLike<number>, address: number = 0): void {
    this.memory.load(words, address);
  }

  /**
   * The instruction at PC, without executing it
   */
  fetch(): DecodedInstruction {
    return decodeInstruction(this.memory, this.pc);
  }

  /**
   * Execute one instruction
   * Returns true if execution should continue, false if halted or faulted
   */
  step(): boolean {
    if (this.state !== CpuState.RUNNING) {
      return false;
    }

    const instruction = this.fetch();
    this.trace?.(instruction);

    const { opcode, a, b, c } = instruction;
    const mem = this.memory;

    // Default next PC
    let nextPc = (this.pc + INSTRUCTION_WORDS) >>> 0;

    switch (opcode) {
      case OPCODE.BRK:
        this.state = CpuState.HALTED;
        this.cycles++;
        return false;

      case OPCODE.LPC:
        nextPc = mem.read(a);
        break;

      case OPCODE.BEQ:
        if (mem.read(b) === 0) {
          nextPc = mem.read(a);
        }
        break;

      case OPCODE.SPC:
        mem.write(a, this.pc);
        break;

      case OPCODE.LEA:
        mem.write(a, mem.read(b));
        break;

      case OPCODE.LRA:
        mem.write(a, mem.read(mem.read(b)));
        break;

      case OPCODE.SRA:
        mem.write(mem.read(b), mem.read(a));
        break;

      case OPCODE.ADD:
        mem.write(a, (mem.read(b) + mem.read(c)) >>> 0);
        break;

      case OPCODE.SUB:
        mem.write(a, (mem.read(b) - mem.read(c)) >>> 0);
        break;

      case OPCODE.MUL:
        // Math.imul keeps the low 32 bits exact where a float product would not
        mem.write(a, Math.imul(mem.read(b), mem.read(c)) >>> 0);
        break;

      case OPCODE.DIV: {
        const divisor = mem.read(c);
        if (divisor === 0) {
          return this.raise(FaultReason.DIVIDE_BY_ZERO, instruction);
        }
        mem.write(a, Math.floor(mem.read(b) / divisor));
        break;
      }

      case OPCODE.MOD: {
        const divisor = mem.read(c);
        if (divisor === 0) {
          return this.raise(FaultReason.DIVIDE_BY_ZERO, instruction);
        }
        mem.write(a, mem.read(b) % divisor);
        break;
      }

      case OPCODE.CMP:
        mem.write(a, mem.read(b) < mem.read(c) ? 1 : 0);
        break;

      case OPCODE.NAD:
        mem.write(a, ~(mem.read(b) & mem.read(c)) >>> 0);
        break;

      case OPCODE.DRW:
        this.display?.refresh(mem);
        break;

      case OPCODE.KEY:
        mem.write(a, this.keyboard ? this.keyboard.readKey() : 0);
        break;

      case OPCODE.NOP:
        break;

      default:
        return this.raise(FaultReason.ILLEGAL_OPCODE, instruction);
    }

    this.pc = nextPc;
    this.cycles++;
    return true;
  }

  /**
   * Run until halted, faulted, or `maxSteps` instructions have executed
   */
  run(maxSteps: number = Infinity): CpuState {
    let steps = 0;
    while (steps < maxSteps && this.step()) {
      steps++;
    }
    return this.state;
  }

  private raise(reason: FaultReason, instruction: DecodedInstruction): false {
    const what = reason === FaultReason.ILLEGAL_OPCODE
      ? `Illegal opcode 0x${instruction.opcode.toString(16)}`
      : 'Division by zero';
    this.fault = {
      reason,
      message: `${what} at pc 0x${this.pc.toString(16)} (${formatInstruction(instruction)})`,
      pc: this.pc,
      opcode: instruction.opcode,
      a: instruction.a,
      b: instruction.b,
      c: instruction.c,
    };
    this.state = CpuState.FAULTED;
    return false;
  }
}
