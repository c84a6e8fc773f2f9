import { loadAppConfig } from "../config/appConfig.js"

/** Writes `[modekeys:<scope>] <message>` to stderr when MODEKEYS_DEBUG=1. */
export const debugLog = (scope: string, message: string): void => {
  if (!loadAppConfig().debug) return
  console.error(`[modekeys:${scope}] ${message}`)
}
