import { promises as fs } from "node:fs"
import path from "node:path"
import process from "node:process"
import { encryptVault } from "../src/vault/crypto.js"
import { buildRandomVaultDb } from "../src/vault/fixture.js"

interface GeneratorOptions {
  readonly outputPath: string
  readonly password: string
  readonly count: number
}

const usage = "Usage: tsx scripts/generate_test_vault.ts <output.json> --password <password> [--num-entries N]"

const parseArgs = (): GeneratorOptions => {
  const args = process.argv.slice(2)
  let outputPath: string | null = null
  let password: string | null = null
  let count = 25
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index]
    switch (arg) {
      case "-p":
      case "--password":
        password = args[++index] ?? null
        break
      case "-n":
      case "--num-entries":
        count = Number(args[++index])
        break
      default:
        if (arg && !arg.startsWith("-") && outputPath === null) outputPath = arg
        else throw new Error(`Unknown argument ${arg}\n${usage}`)
    }
  }
  if (!outputPath || !password) throw new Error(usage)
  if (!Number.isInteger(count) || count < 0) throw new Error(`--num-entries must be a non-negative integer\n${usage}`)
  return { outputPath: path.resolve(outputPath), password, count }
}

const main = async () => {
  const options = parseArgs()
  console.log(`Generating a test vault with ${options.count} entries at ${options.outputPath}...`)
  const vault = encryptVault(buildRandomVaultDb(options.count), options.password)
  await fs.writeFile(options.outputPath, `${JSON.stringify(vault, null, 2)}\n`, "utf8")
  console.log("Done.")
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exitCode = 1
})
