import { readFile } from 'node:fs/promises'
import { PacketCodec } from '@heappack/codec'
import { fingerprintEquals, logger } from '@heappack/core'
import {
  EncodingFormat,
  type PackError,
  type Safe,
  safeError,
  safeResult,
} from '@heappack/types'
import { Command } from 'commander'
import { IDENTITY_HELP, parseFormat } from '../utils/format-option'

/**
 * Text form of a packet of any type, plus whether its program identity
 * matches this executable's
 */
export function inspectPacket(
  data: Uint8Array,
  format: EncodingFormat,
  codec: PacketCodec = new PacketCodec(),
): Safe<string, PackError<'parse_error'>> {
  const [error, record] = codec.parse(data, format)
  if (error) return safeError(error)

  const matches = fingerprintEquals(record.program, codec.programIdentity())
  return safeResult(
    `${codec.text.format(record)}program matches: ${matches ? 'yes' : 'no'}`,
  )
}

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Print a packet file in text form')
    .argument('<file>', 'Packet file')
    .option(
      '-f, --format <format>',
      'Encoding of the file: binary or text',
      parseFormat,
      EncodingFormat.BINARY,
    )
    .addHelpText('after', IDENTITY_HELP)
    .action(async (file: string, options: { format: EncodingFormat }) => {
      const data = await readFile(file)
      const [error, report] = inspectPacket(data, options.format)
      if (error) {
        logger.error(`Cannot inspect ${file}`, error)
        process.exitCode = 1
        return
      }
      console.log(report)
    })
}
