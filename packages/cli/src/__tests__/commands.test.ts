import {
  PacketCodec,
  Rep,
  SerializationService,
} from '@heappack/codec'
import { ExecutableIdentity, fingerprintToHex } from '@heappack/core'
import { CodeTable, HeapGraphCodec } from '@heappack/heap'
import { EncodingFormat } from '@heappack/types'
import { InvalidArgumentError } from 'commander'
import { describe, expect, it } from 'vitest'
import { convertPacket, createConvertCommand } from '../commands/convert'
import { identityReport } from '../commands/identity'
import { createInspectCommand, inspectPacket } from '../commands/inspect'
import { createProgram } from '../program'
import { parseFormat } from '../utils/format-option'

function packetBytes(format: EncodingFormat): Uint8Array {
  const service = new SerializationService(
    new HeapGraphCodec(new CodeTable(), { capacityWords: 64 }),
  )
  const [error, packet] = service.trySerialize('hi', Rep.str)
  if (error) throw error
  return new PacketCodec().encode(packet, format)
}

describe('heappack CLI', () => {
  it('should register its commands', () => {
    const names = createProgram().commands.map((command) => command.name())

    expect(names).toEqual(['identity', 'inspect', 'convert'])
  })

  it('should name the identity override in the help of inspect and convert', () => {
    for (const command of [createInspectCommand(), createConvertCommand()]) {
      let help = ''
      command.configureOutput({
        writeOut: (text) => {
          help += text
        },
      })
      command.outputHelp()

      expect(help).toContain('HEAPPACK_EXECUTABLE')
    }
  })

  it('should parse format names', () => {
    expect(parseFormat('binary')).toBe(EncodingFormat.BINARY)
    expect(parseFormat('TEXT')).toBe(EncodingFormat.TEXT)
    expect(() => parseFormat('json')).toThrow(InvalidArgumentError)
  })

  it('should print the executable and program identities', () => {
    const codec = new PacketCodec()

    expect(identityReport(codec).split('\n')).toEqual([
      `executable ${fingerprintToHex(ExecutableIdentity.current())}`,
      `program ${fingerprintToHex(codec.programIdentity())}`,
    ])
  })

  describe('inspect', () => {
    it('should print a binary packet as text', () => {
      const [error, report] = inspectPacket(
        packetBytes(EncodingFormat.BINARY),
        EncodingFormat.BINARY,
      )

      expect(error).toBeUndefined()
      const lines = report?.split('\n') ?? []
      expect(lines[0]).toBe(
        `Serialization Packet, size 4, program ${fingerprintToHex(new PacketCodec().programIdentity())}`,
      )
      expect(lines[2]).toBe(
        '0:\t0x4b43415050414548\t0x0000000000000001\t0x0000000000000207\t0x0000000000006968',
      )
      expect(lines[3]).toBe('program matches: yes')
    })

    it('should report packets of a program with other registered code', () => {
      const codeTable = new CodeTable()
      codeTable.register('shout', (text: string) => text.toUpperCase())
      const service = new SerializationService(
        new HeapGraphCodec(codeTable, { capacityWords: 64 }),
      )
      const [error, packet] = service.trySerialize('hi', Rep.str)
      if (error) throw error

      const [inspectError, report] = inspectPacket(
        new PacketCodec().encode(packet),
        EncodingFormat.BINARY,
      )
      expect(inspectError).toBeUndefined()
      expect(report?.split('\n')[3]).toBe('program matches: no')
    })

    it('should report unparseable input', () => {
      const [error] = inspectPacket(new Uint8Array(3), EncodingFormat.BINARY)

      expect(error?.code).toBe('parse_error')
    })
  })

  describe('convert', () => {
    it('should convert between encodings without changing the record', () => {
      const codec = new PacketCodec()
      const binary = packetBytes(EncodingFormat.BINARY)

      const [toTextError, text] = convertPacket(
        binary,
        EncodingFormat.BINARY,
        EncodingFormat.TEXT,
      )
      expect(toTextError).toBeUndefined()
      if (!text) return

      const [backError, back] = convertPacket(
        text,
        EncodingFormat.TEXT,
        EncodingFormat.BINARY,
      )
      expect(backError).toBeUndefined()
      expect(back).toEqual(binary)
      expect(codec.parse(text, EncodingFormat.TEXT)[1]?.wordCount).toBe(4)
    })

    it('should refuse packets from another executable', () => {
      const codec = new PacketCodec()
      const [, record] = codec.parse(
        packetBytes(EncodingFormat.BINARY),
        EncodingFormat.BINARY,
      )
      if (!record) throw new Error('expected a record')
      const foreign = codec.format(
        { ...record, program: { hi: 0n, lo: 1n } },
        EncodingFormat.TEXT,
      )

      const [error] = convertPacket(
        foreign,
        EncodingFormat.TEXT,
        EncodingFormat.BINARY,
      )
      expect(error?.code).toBe('binary_mismatch')
    })
  })
})
