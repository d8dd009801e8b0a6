import { EncodingFormat } from '@heappack/types'
import { InvalidArgumentError } from 'commander'

const FORMATS: Record<string, EncodingFormat> = {
  binary: EncodingFormat.BINARY,
  text: EncodingFormat.TEXT,
}

/**
 * Commander parser for `binary` / `text` option values
 */
export function parseFormat(value: string): EncodingFormat {
  const format = FORMATS[value.toLowerCase()]
  if (format === undefined) {
    throw new InvalidArgumentError(`Expected binary or text, got ${value}`)
  }
  return format
}

export const IDENTITY_HELP = `
Packets carry the identity of the program that wrote them. Set
HEAPPACK_EXECUTABLE to that program's entry script to accept its packets
here; packets whose graphs point at registered code match only when this
executable registers the same code.`
