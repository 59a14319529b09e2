import { promises as fs } from "node:fs"
import { text } from "node:stream/consumers"
import { Args, Options } from "@effect/cli"
import { Effect } from "effect"
import { InputReadError } from "../errors.js"
import { COLOR_MODES } from "../theme/colorMode.js"
import { describeError } from "../util/debugLog.js"

export const fileArg = Args.text({ name: "file" }).pipe(Args.optional)
export const configOption = Options.text("config").pipe(Options.optional)
export const themeOption = Options.text("theme").pipe(Options.optional)
export const colorModeOption = Options.choice("color-mode", COLOR_MODES).pipe(Options.optional)
export const strictOption = Options.boolean("config-strict").pipe(Options.optional)

/** Reads the named file, or stdin when no file (or `-`) is given. */
export const readInput = (file: string | null): Effect.Effect<string, InputReadError> =>
  Effect.tryPromise({
    try: () => (file && file !== "-" ? fs.readFile(file, "utf8") : text(process.stdin)),
    catch: (error) =>
      new InputReadError({
        message: `Cannot read ${file && file !== "-" ? file : "stdin"}: ${describeError(error)}`,
        path: file,
      }),
  })
