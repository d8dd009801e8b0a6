import { readFile, writeFile } from 'node:fs/promises'
import { PacketCodec } from '@heappack/codec'
import { fingerprintEquals, fingerprintToHex, logger } from '@heappack/core'
import {
  DECODE_ERRORS,
  type DecodeFailureCode,
  EncodingFormat,
  PackError,
  type Safe,
  safeError,
  safeResult,
} from '@heappack/types'
import { Command } from 'commander'
import { IDENTITY_HELP, parseFormat } from '../utils/format-option'

/**
 * Re-encode a packet whose program identity matches this executable's.
 * The graph is never rebuilt, so packets of any type convert.
 */
export function convertPacket(
  data: Uint8Array,
  from: EncodingFormat,
  to: EncodingFormat,
  codec: PacketCodec = new PacketCodec(),
): Safe<Uint8Array, PackError<DecodeFailureCode>> {
  const [error, record] = codec.parse(data, from)
  if (error) return safeError(error)

  const program = codec.programIdentity()
  if (!fingerprintEquals(record.program, program)) {
    return safeError(
      new PackError(DECODE_ERRORS.BINARY_MISMATCH, {
        expected: fingerprintToHex(program),
        found: fingerprintToHex(record.program),
      }),
    )
  }
  return safeResult(codec.format(record, to))
}

export function createConvertCommand(): Command {
  return new Command('convert')
    .description('Re-encode a packet file in another format')
    .argument('<input>', 'Packet file to read')
    .argument('<output>', 'Packet file to write')
    .option('--from <format>', 'Input encoding', parseFormat, EncodingFormat.BINARY)
    .option('--to <format>', 'Output encoding', parseFormat, EncodingFormat.TEXT)
    .addHelpText('after', IDENTITY_HELP)
    .action(
      async (
        input: string,
        output: string,
        options: { from: EncodingFormat; to: EncodingFormat },
      ) => {
        const data = await readFile(input)
        const [error, converted] = convertPacket(data, options.from, options.to)
        if (error) {
          logger.error(`Cannot convert ${input}`, error)
          process.exitCode = 1
          return
        }
        await writeFile(output, converted)
        logger.info('Packet converted', {
          input,
          output,
          from: options.from,
          to: options.to,
        })
      },
    )
}
