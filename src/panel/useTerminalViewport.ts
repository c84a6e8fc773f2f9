import { useEffect, useRef } from "react"
import { useStdout } from "ink"
import { loadAppConfig } from "../config/appConfig.js"
import type { Viewport } from "../keybinds/types.js"

type TerminalSize = {
  readonly columns?: number
  readonly rows?: number
}

const usable = (value: number | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0

export const readTerminalViewport = (size: TerminalSize | undefined, fallback: Viewport): Viewport => ({
  width: usable(size?.columns) ? size.columns : fallback.width,
  height: usable(size?.rows) ? size.rows : fallback.height,
})

/** Reports the terminal size once on mount and again on every stdout resize. */
export const useTerminalViewport = (enabled: boolean, onResize: (viewport: Viewport) => void): void => {
  const { stdout } = useStdout()
  const callback = useRef(onResize)
  callback.current = onResize

  useEffect(() => {
    if (!enabled) return undefined
    const fallback = loadAppConfig().fallbackViewport
    const handler = () => callback.current(readTerminalViewport(stdout, fallback))
    handler()
    stdout.on("resize", handler)
    return () => {
      stdout.off("resize", handler)
    }
  }, [enabled, stdout])
}
