import { execFile } from "node:child_process"
import os from "node:os"
import { promisify } from "node:util"
import clipboardy from "clipboardy"
import { debugLog, describeError } from "./debugLog.js"

const execFileAsync = promisify(execFile)
const COMMAND_TIMEOUT_MS = 2_500
const FAKE_ENV = "CHATPANE_FAKE_CLIPBOARD"

export interface ClipboardWriter {
  writeText(text: string): Promise<void>
}

export class ClipboardWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "ClipboardWriteError"
  }
}

/** OSC 52 sequence asking the terminal to put `text` on the system clipboard. */
export const osc52Sequence = (text: string): string =>
  `\u001b]52;c;${Buffer.from(text, "utf8").toString("base64")}\u0007`

const runWithInput = async (command: string, args: string[], input: string): Promise<boolean> => {
  try {
    const child = execFileAsync(command, args, { timeout: COMMAND_TIMEOUT_MS })
    child.child.stdin?.end(input)
    await child
    return true
  } catch (error) {
    debugLog("clipboard", { clipboardCommandError: describeError(error), command })
    return false
  }
}

const writePlatformText = async (text: string): Promise<boolean> => {
  const platform = os.platform()
  if (platform === "darwin") return runWithInput("pbcopy", [], text)
  if (platform === "linux") {
    if (process.env.WAYLAND_DISPLAY && (await runWithInput("wl-copy", [], text))) return true
    if (await runWithInput("xclip", ["-selection", "clipboard"], text)) return true
    return runWithInput("xsel", ["--clipboard", "--input"], text)
  }
  return false
}

export interface SystemClipboardOptions {
  /** Stream that receives an OSC 52 copy sequence before the native write. */
  readonly terminal?: NodeJS.WritableStream | null
}

/**
 * Clipboard writer for the host system: OSC 52 to the terminal when one is
 * given, then clipboardy, then the platform's copy commands.
 * `CHATPANE_FAKE_CLIPBOARD=1` keeps the text in memory instead.
 */
export const createSystemClipboard = (options: SystemClipboardOptions = {}): ClipboardWriter & { lastText(): string | null } => {
  let last: string | null = null
  return {
    lastText: () => last,
    writeText: async (text) => {
      last = text
      if (process.env[FAKE_ENV] === "1") return
      options.terminal?.write(osc52Sequence(text))
      try {
        await clipboardy.write(text)
        return
      } catch (error) {
        debugLog("clipboard", { clipboardyError: describeError(error) })
      }
      if (await writePlatformText(text)) return
      throw new ClipboardWriteError("No clipboard backend accepted the text.")
    },
  }
}
