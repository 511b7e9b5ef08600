/**
 * Instruction Registry
 *
 * Central registry that imports and manages all instruction handlers.
 * Acts as a dispatcher for the compiler (keyword lookup and argument
 * parsing) and for the program runtime (execution).
 */

import type { CommandKeyword, CommandOf } from '@hrm/types'
import {
  ADDInstruction,
  BUMPDNInstruction,
  BUMPUPInstruction,
  SUBInstruction,
} from './arithmetic'
import type { InstructionHandler } from './base'
import {
  JUMPInstruction,
  JUMPNInstruction,
  JUMPZInstruction,
} from './control-flow'
import { INBOXInstruction, OUTBOXInstruction } from './io'
import { COPYFROMInstruction, COPYTOInstruction } from './memory'

type HandlerTable = {
  readonly [K in CommandKeyword]: InstructionHandler<CommandOf<K>>
}

/**
 * Instruction Registry
 *
 * Maps every keyword of the instruction set to its handler. The table is
 * keyed by the closed keyword union, so a missing handler is a type error.
 */
export class InstructionRegistry {
  private static instance: InstructionRegistry | null = null

  private readonly handlers: HandlerTable = {
    // IO instructions
    INBOX: new INBOXInstruction(),
    OUTBOX: new OUTBOXInstruction(),

    // Memory instructions
    COPYFROM: new COPYFROMInstruction(),
    COPYTO: new COPYTOInstruction(),

    // Arithmetic instructions
    ADD: new ADDInstruction(),
    SUB: new SUBInstruction(),
    BUMPUP: new BUMPUPInstruction(),
    BUMPDN: new BUMPDNInstruction(),

    // Control flow instructions
    JUMP: new JUMPInstruction(),
    JUMPZ: new JUMPZInstruction(),
    JUMPN: new JUMPNInstruction(),
  }

  /**
   * Shared registry; handlers are stateless so one instance serves every program
   */
  static getInstance(): InstructionRegistry {
    if (InstructionRegistry.instance === null) {
      InstructionRegistry.instance = new InstructionRegistry()
    }
    return InstructionRegistry.instance
  }

  /**
   * Get handler for a keyword, typed for any command
   */
  getHandler(keyword: CommandKeyword): InstructionHandler {
    return this.handlers[keyword]
  }

  /**
   * Get handler for a keyword, typed for that keyword's command
   */
  getHandlerFor<K extends CommandKeyword>(
    keyword: K,
  ): InstructionHandler<CommandOf<K>> {
    return this.handlers[keyword]
  }

  /**
   * Check if a keyword has a registered handler
   */
  hasHandler(keyword: string): keyword is CommandKeyword {
    return Object.hasOwn(this.handlers, keyword)
  }

  getRegisteredKeywords(): CommandKeyword[] {
    return this.getAllHandlers().map((handler) => handler.keyword)
  }

  getAllHandlers(): InstructionHandler[] {
    return Object.values(this.handlers)
  }
}
