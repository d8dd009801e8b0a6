/**
 * In-process graph codec
 *
 * Packs JavaScript object graphs, including suspended computations over
 * registered code, into word buffers.
 */

import { getPackingEnv, logger, WordUtils } from '@heappack/core'
import {
  type Fingerprint,
  type GraphCodec,
  type PackOutcome,
  PackStatus,
  type UnpackOutcome,
} from '@heappack/types'
import { type CodeTable, defaultCodeTable } from './code-table'
import { HeapPacker } from './pack'
import { HeapUnpacker } from './unpack'

export interface HeapGraphCodecConfig {
  /** Largest buffer a pack may produce, in words */
  capacityWords: number
}

export class HeapGraphCodec implements GraphCodec {
  private readonly config: HeapGraphCodecConfig

  constructor(
    readonly codeTable: CodeTable = defaultCodeTable,
    config: Partial<HeapGraphCodecConfig> = {},
  ) {
    this.config = {
      capacityWords: getPackingEnv().HEAPPACK_BUFFER_WORDS,
      ...config,
    }
  }

  get capacityWords(): number {
    return this.config.capacityWords
  }

  codeIdentity(): Fingerprint {
    return this.codeTable.fingerprint()
  }

  pack(root: unknown): PackOutcome {
    const outcome = new HeapPacker(
      this.codeTable,
      this.config.capacityWords,
    ).pack(root)
    if (outcome.status !== PackStatus.SUCCESS) {
      logger.debug('Graph pack stopped', {
        status: PackStatus[outcome.status],
        detail: outcome.detail,
      })
    }
    return outcome
  }

  unpack(buffer: Uint8Array): UnpackOutcome {
    const outcome = new HeapUnpacker(this.codeTable).unpack(buffer)
    if (outcome.status !== PackStatus.SUCCESS) {
      logger.debug('Graph unpack rejected buffer', {
        words: WordUtils.count(buffer),
        detail: outcome.detail,
      })
    }
    return outcome
  }
}
