#!/usr/bin/env node
import { runCli } from './cli.js'

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf8')
}

const input = await readStdin()
process.exitCode = runCli(process.argv.slice(2), input, {
  stdout: text => process.stdout.write(text),
  stderr: line => console.error(line),
})
