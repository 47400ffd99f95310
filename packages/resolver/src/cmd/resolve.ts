/**
 * Resolve a public key over the DHT and print its signed packet.
 *
 *   npm run resolve -- <z32-key> [--bootstrap host:port]... [--max-attempts N]
 *                                [--timeout SECONDS] [--log-level LEVEL]
 *
 * Looks the key up twice: once cold from the network, then again a second
 * later, which is answered from the cache.
 */

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { NodeSocketFactory } from '../adapters/node/node-socket'
import { validateLogLevel } from '../config'
import { DHTClient } from '../dht/dht-client'
import { errorMessage } from '../errors'
import { PublicKey } from '../identity'
import { LOG_LEVELS } from '../logging/logger'
import type { SignedPacket } from '../signed-packet'

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function report(label: string, elapsedMs: number, packet: SignedPacket | null): void {
  process.stdout.write(`\n${label}: ${elapsedMs} ms\n`)
  process.stdout.write(packet ? `${packet.toString()}\n` : 'Failed to resolve\n')
}

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('resolve')
    .command('$0 <key>', 'Resolve a public key to its signed packet')
    .positional('key', { type: 'string', demandOption: true, describe: 'z-base-32 public key' })
    .option('bootstrap', {
      type: 'string',
      array: true,
      describe: 'Bootstrap node host:port (repeatable)',
    })
    .option('max-attempts', { type: 'number', default: 200 })
    .option('timeout', { type: 'number', default: 60, describe: 'Lookup timeout in seconds' })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      describe: 'Log level (default: PKARR_LOG_LEVEL or info)',
    })
    .strict()
    .parse()

  let publicKey: PublicKey
  try {
    publicKey = PublicKey.fromZ32(argv.key)
  } catch (err) {
    process.stderr.write(`Invalid public key: ${errorMessage(err)}\n`)
    return 1
  }

  const client = new DHTClient({
    socketFactory: new NodeSocketFactory(),
    bootstrapNodes: argv.bootstrap,
    config: argv['log-level'] === undefined ? {} : { logLevel: validateLogLevel(argv['log-level']) },
    skipMaintenance: true,
  })

  await client.start()
  try {
    process.stdout.write(`Resolving ${publicKey.toZ32()} ...\n`)
    const lookupOptions = {
      maxAttempts: argv['max-attempts'],
      timeoutMs: Math.round(argv.timeout * 1000),
    }

    const cold = await client.lookupWithStats(publicKey, lookupOptions)
    report(`Resolved in ${cold.attempts} attempts (${cold.termination})`, cold.elapsedMs, cold.packet)

    await sleep(1000)

    const warm = await client.lookupWithStats(publicKey, lookupOptions)
    report(`Second lookup (${warm.termination})`, warm.elapsedMs, warm.packet)
  } finally {
    client.stop()
  }
  return 0
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    process.stderr.write(`${errorMessage(err)}\n`)
    process.exitCode = 1
  },
)
