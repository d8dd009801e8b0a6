import { PacketCodec } from '@heappack/codec'
import { ExecutableIdentity, fingerprintToHex } from '@heappack/core'
import { Command } from 'commander'

/**
 * The executable fingerprint, then the program identity packets are
 * checked against: the executable combined with the registered code
 */
export function identityReport(codec: PacketCodec = new PacketCodec()): string {
  return [
    `executable ${fingerprintToHex(ExecutableIdentity.current())}`,
    `program ${fingerprintToHex(codec.programIdentity())}`,
  ].join('\n')
}

export function createIdentityCommand(): Command {
  return new Command('identity')
    .description('Print the fingerprints of this executable')
    .action(() => {
      console.log(identityReport())
    })
}
