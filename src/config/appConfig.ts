import dotenv from "dotenv"
import type { Viewport } from "../keybinds/types.js"

dotenv.config()

export interface AppConfig {
  readonly debug: boolean
  readonly fallbackViewport: Viewport
}

const DEFAULT_WIDTH = 80
const DEFAULT_HEIGHT = 24

const readCells = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw)
  return raw?.trim() && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

const computeConfig = (): AppConfig => ({
  debug: process.env.MODEKEYS_DEBUG === "1",
  fallbackViewport: {
    width: readCells(process.env.MODEKEYS_WIDTH ?? process.env.COLUMNS, DEFAULT_WIDTH),
    height: readCells(process.env.MODEKEYS_HEIGHT ?? process.env.LINES, DEFAULT_HEIGHT),
  },
})

export const loadAppConfig = (): AppConfig => computeConfig()
