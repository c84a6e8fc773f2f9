import { sliceToWidth, stringWidth } from "./text.js"

export type Tone =
  | "modifier"
  | "key"
  | "arrow"
  | "action"
  | "separator"
  | "marker"
  | "title"
  | "border"
  | "summary"
  | "muted"
  | "plain"

export interface Segment {
  readonly text: string
  readonly tone: Tone
}

export type StyledLine = ReadonlyArray<Segment>

export const plainText = (line: StyledLine): string => line.map((segment) => segment.text).join("")

export const plainLines = (lines: ReadonlyArray<StyledLine>): string[] => lines.map(plainText)

export const lineWidth = (line: StyledLine): number =>
  line.reduce((total, segment) => total + stringWidth(segment.text), 0)

/**
 * Cuts a styled line down to `maxWidth` cells, ending it with `ellipsis` when
 * anything was dropped. The plain text matches `truncateToWidth` on the joined
 * string.
 */
export const truncateLine = (line: StyledLine, maxWidth: number, ellipsis: string): StyledLine => {
  if (maxWidth <= 0) return []
  if (lineWidth(line) <= maxWidth) return line
  const ellipsisWidth = stringWidth(ellipsis)
  if (ellipsisWidth >= maxWidth) return [{ text: sliceToWidth(ellipsis, maxWidth), tone: "muted" }]

  let budget = maxWidth - ellipsisWidth
  const kept: Segment[] = []
  for (const segment of line) {
    const width = stringWidth(segment.text)
    if (width <= budget) {
      kept.push(segment)
      budget -= width
      continue
    }
    const partial = sliceToWidth(segment.text, budget)
    if (partial) kept.push({ text: partial, tone: segment.tone })
    break
  }
  kept.push({ text: ellipsis, tone: "muted" })
  return kept
}

export const padLine = (line: StyledLine, targetWidth: number): StyledLine => {
  const gap = targetWidth - lineWidth(line)
  return gap > 0 ? [...line, { text: " ".repeat(gap), tone: "plain" }] : line
}
