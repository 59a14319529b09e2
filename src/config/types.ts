import type { ColorMode } from "../theme/colorMode.js"

export type PanelConfigInput = {
  theme?: string
  syntaxStyle?: string
  display?: {
    colorMode?: ColorMode
    asciiOnly?: boolean
  }
  layout?: {
    defaultWrapWidth?: number
    minColumnWidth?: number
  }
  selection?: {
    clickTolerance?: number
    multiClickWindowMs?: number
    flashTickMs?: number
  }
}

export type ResolvedPanelConfig = {
  readonly theme: string
  /** Null means the theme's own syntax style. */
  readonly syntaxStyle: string | null
  readonly display: {
    readonly colorMode: ColorMode
    readonly asciiOnly: boolean
  }
  readonly layout: {
    readonly defaultWrapWidth: number
    readonly minColumnWidth: number
  }
  readonly selection: {
    readonly clickTolerance: number
    readonly multiClickWindowMs: number
    readonly flashTickMs: number
  }
  readonly meta: {
    readonly strict: boolean
    readonly sources: readonly string[]
    readonly warnings: readonly string[]
  }
}

export type ResolvePanelConfigOptions = {
  readonly workspace?: string | null
  readonly cliConfigPath?: string | null
  readonly cliTheme?: string | null
  readonly cliColorMode?: ColorMode | null
  readonly cliStrict?: boolean | null
  /** False forces color mode `none` regardless of other layers. */
  readonly colorAllowed?: boolean
}
