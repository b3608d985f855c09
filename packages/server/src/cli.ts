import 'dotenv/config'
import { DatasetError } from '@dataset-gateway/validation'
import { buildProgram } from './program.js'

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv)
  } catch (err) {
    const detail = err instanceof DatasetError ? JSON.stringify(err.toJSON(), null, 2) : String(err)
    process.stderr.write(`${detail}\n`)
    process.exit(1)
  }
}

await main()
