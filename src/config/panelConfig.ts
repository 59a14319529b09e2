import { Context, Effect, Layer } from "effect"
import { ConfigError } from "../errors.js"
import { describeError } from "../util/debugLog.js"
import { resolvePanelConfig } from "./load.js"
import type { ResolvedPanelConfig, ResolvePanelConfigOptions } from "./types.js"

export type PanelConfig = ResolvedPanelConfig

export const PanelConfigTag = Context.GenericTag<PanelConfig>("PanelConfig")

export const loadPanelConfig = (options: ResolvePanelConfigOptions = {}): Effect.Effect<PanelConfig, ConfigError> =>
  Effect.tryPromise({
    try: () => resolvePanelConfig(options),
    catch: (error) =>
      error instanceof ConfigError ? error : new ConfigError({ message: describeError(error), source: "resolve" }),
  })

export const PanelConfigLayer = (options: ResolvePanelConfigOptions = {}): Layer.Layer<PanelConfig, ConfigError> =>
  Layer.effect(PanelConfigTag, loadPanelConfig(options))
