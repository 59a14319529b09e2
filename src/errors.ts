import { Data } from "effect"

/** Configuration could not be read or did not validate. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
  readonly source: string
}> {}

/** The document to render could not be read from a file or stdin. */
export class InputReadError extends Data.TaggedError("InputReadError")<{
  readonly message: string
  readonly path: string | null
}> {}
