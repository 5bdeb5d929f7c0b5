import { execFile } from "node:child_process"
import { promisify } from "node:util"
import clipboardy from "clipboardy"
import { createDebugLog, describeError, type DebugLog } from "./debugLog.js"

const execFileAsync = promisify(execFile)
const COMMAND_TIMEOUT_MS = 2_500

export const AUTO_CLIPBOARD_TOOL = "auto"

const defaultLog = createDebugLog("clipboard")

/** Splits a configured command line on whitespace; single and double quotes group words. */
export const splitCommandLine = (commandLine: string): string[] => {
  const words: string[] = []
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g
  for (const match of commandLine.matchAll(pattern)) {
    words.push(match[1] ?? match[2] ?? match[3] ?? "")
  }
  return words
}

const writeThroughCommand = async (text: string, commandLine: string, log: DebugLog): Promise<void> => {
  const [command, ...args] = splitCommandLine(commandLine)
  if (!command) throw new Error("Empty clipboard command")
  const pending = execFileAsync(command, args, { timeout: COMMAND_TIMEOUT_MS })
  // A command that fails to start closes its stdin under the write.
  pending.child.stdin?.on("error", (error) => log("copy_stdin_error", { error: describeError(error) }))
  pending.child.stdin?.end(text)
  await pending
}

/**
 * Copies `text` with the configured tool. Returns false when copying is disabled or fails;
 * failures only reach the debug log.
 */
export const copyToClipboard = async (text: string, tool: string, log: DebugLog = defaultLog): Promise<boolean> => {
  const trimmed = tool.trim()
  if (!trimmed) return false
  try {
    if (trimmed === AUTO_CLIPBOARD_TOOL) {
      await clipboardy.write(text)
    } else {
      await writeThroughCommand(text, trimmed, log)
    }
    return true
  } catch (error) {
    log("copy_failed", { tool: trimmed, error: describeError(error) })
    return false
  }
}
