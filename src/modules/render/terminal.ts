import type { Rgb } from './palette'
import { cellAt, type ProjectionGrid } from './projection'

export const ESC = '\u001b['
export const RESET = `${ESC}0m`
export const UPPER_HALF_BLOCK = '▀'
export const LOWER_HALF_BLOCK = '▄'

const DEFAULT_FG = `${ESC}39m`
const DEFAULT_BG = `${ESC}49m`

export const fg = ([r, g, b]: Rgb): string => `${ESC}38;2;${r};${g};${b}m`
export const bg = ([r, g, b]: Rgb): string => `${ESC}48;2;${r};${g};${b}m`
export const moveTo = (row: number, column: number): string => `${ESC}${row + 1};${column + 1}H`

/**
 * One string per character row. Cell density paints a space on the pixel colour; half density
 * stacks two pixels per character with the upper half block, top pixel in the foreground.
 */
export function renderGrid(grid: ProjectionGrid): string[] {
  const lines: string[] = []
  const characterRows = grid.subRows === 0 ? 0 : grid.height / grid.subRows
  for (let row = 0; row < characterRows; row += 1) {
    let line = ''
    let active = ''
    const emit = (style: string, glyph: string) => {
      if (style !== active) {
        line += style
        active = style
      }
      line += glyph
    }

    for (let x = 0; x < grid.width; x += 1) {
      if (grid.subRows === 1) {
        const cell = cellAt(grid, x, row)
        emit(cell ? bg(cell.color) : DEFAULT_BG, ' ')
        continue
      }
      const top = cellAt(grid, x, row * 2)
      const bottom = cellAt(grid, x, row * 2 + 1)
      if (top && bottom) {
        emit(fg(top.color) + bg(bottom.color), UPPER_HALF_BLOCK)
      } else if (top) {
        emit(fg(top.color) + DEFAULT_BG, UPPER_HALF_BLOCK)
      } else if (bottom) {
        emit(fg(bottom.color) + DEFAULT_BG, LOWER_HALF_BLOCK)
      } else {
        emit(DEFAULT_FG + DEFAULT_BG, ' ')
      }
    }
    lines.push(line + RESET)
  }
  return lines
}

/** Strips SGR and cursor sequences, leaving the glyphs a terminal would show. */
export const visibleText = (line: string): string => line.replace(/\u001b\[[0-9;]*[A-Za-z]/g, '')
