#!/usr/bin/env node
// Reads delimiter-separated values from a TCP peer and prints one per line
import net from 'node:net'
import { TextDecoder } from 'node:util'
import winston from 'winston'
import { createRetainingBuffer } from '../core/strategy'
import { DelimitedReader } from '../stream/delimited-reader'
import { bufferOptions, loadConfig } from './config'
import { createLogger } from './logger'

/**
 * Destination for decoded values, e.g. `process.stdout`.
 * `write` returns false when the sink wants the writer to wait for 'drain'.
 */
export interface TextSink {
  write(text: string): boolean
  once(event: 'drain', listener: () => void): unknown
}

/**
 * Drain `source` through the reader, writing each value to `sink`.
 * Pieces of an oversized value are written as they arrive; the line ends
 * once the value is complete. Reading pauses while the sink is full.
 * @returns Number of complete values written
 */
export async function consumeStream(
  source: AsyncIterable<Uint8Array>,
  reader: DelimitedReader,
  sink: TextSink,
  logger: winston.Logger
): Promise<number> {
  const decoder = new TextDecoder()
  let chunks = 0
  let bytes = 0

  const write = async (value: Uint8Array, complete: boolean): Promise<void> => {
    const line = decoder.decode(value, { stream: !complete }) + (complete ? '\n' : '')
    if (!sink.write(line)) {
      await new Promise<void>((resolve) => sink.once('drain', resolve))
    }
  }

  for await (const chunk of source) {
    chunks++
    bytes += chunk.length
    const records = reader.push(chunk)
    logger.debug(`chunk ${chunks}: ${chunk.length} bytes, ${records.length} values`)
    for (const record of records) {
      await write(record.value, record.complete)
    }
  }

  for (const record of reader.end()) {
    await write(record.value, record.complete)
  }

  logger.verbose(
    `stream ended after ${bytes} bytes in ${chunks} chunks: ` +
      `${reader.recordsEmitted} values, ${reader.fragmentsEmitted} fragments`
  )
  return reader.recordsEmitted
}

export async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger({ level: config.logLevel })
  const buffer = createRetainingBuffer(bufferOptions(config))
  const reader = new DelimitedReader(buffer, config.delimiter.charCodeAt(0))

  logger.info(
    `connecting to ${config.host}:${config.port} ` +
      `(${config.strategy} buffer, ${buffer.capacity} bytes)`
  )
  const socket = net.connect({ host: config.host, port: config.port })
  const count = await consumeStream(socket, reader, process.stdout, logger)
  logger.info(`connection closed, ${count} values received`)
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createLogger({ level: 'error' }).error(error instanceof Error ? error : String(error))
    process.exitCode = 1
  })
}
