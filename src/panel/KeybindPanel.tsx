import React, { useEffect, useState } from "react"
import { Box, Text } from "ink"
import type { KeybindSession, SessionState } from "../session/session.js"
import { paintLine, type Palette } from "../layout/theme.js"
import { useTerminalViewport } from "./useTerminalViewport.js"

interface KeybindPanelProps {
  readonly session: KeybindSession
  readonly palette: Palette
  /** Track the terminal size instead of the session's pinned viewport. */
  readonly followTerminal?: boolean
}

export const KeybindPanel: React.FC<KeybindPanelProps> = ({ session, palette, followTerminal = false }) => {
  const [state, setState] = useState<SessionState>(() => session.getState())

  useEffect(() => session.onChange(setState), [session])
  useTerminalViewport(followTerminal, (viewport) => {
    session.handle({ type: "resize", viewport })
  })

  return (
    <Box flexDirection="column">
      {state.lines.map((line, index) => (
        <Text key={index} wrap="truncate">
          {paintLine(line, palette)}
        </Text>
      ))}
    </Box>
  )
}
