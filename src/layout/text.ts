import stringWidth from "string-width"

export { stringWidth }

const CONTROL_RUN = /[\u0000-\u001f\u007f-\u009f]+/g

/** Collapses each run of control characters (newlines, tabs, escapes) to one space. */
export const singleLine = (value: string): string => value.replace(CONTROL_RUN, " ")

const graphemes = new Intl.Segmenter()

/** Longest prefix of `value` that fits in `maxWidth` cells, never splitting a grapheme. */
export const sliceToWidth = (value: string, maxWidth: number): string => {
  let width = 0
  let result = ""
  for (const { segment } of graphemes.segment(value)) {
    const next = stringWidth(segment)
    if (width + next > maxWidth) break
    width += next
    result += segment
  }
  return result
}

export const truncateToWidth = (value: string, maxWidth: number, ellipsis: string): string => {
  if (maxWidth <= 0) return ""
  if (stringWidth(value) <= maxWidth) return value
  const ellipsisWidth = stringWidth(ellipsis)
  if (ellipsisWidth >= maxWidth) return sliceToWidth(ellipsis, maxWidth)
  return `${sliceToWidth(value, maxWidth - ellipsisWidth)}${ellipsis}`
}

export const titleCase = (value: string): string => `${value.charAt(0).toUpperCase()}${value.slice(1)}`
