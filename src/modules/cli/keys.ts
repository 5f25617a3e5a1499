import { FLOOR_STEP_DB, ZOOM_STEP, type ViewStateStore } from '../settings/view-state'

/** The subset of readline's key event the dispatcher reads. */
export interface KeyPress {
  name?: string
  sequence?: string
  ctrl?: boolean
  shift?: boolean
}

export type ExportKind = 'image' | 'matrix'

export type ViewCommand =
  | { type: 'togglePause' }
  | { type: 'toggleStyle' }
  | { type: 'toggleDensity' }
  | { type: 'cycleScale' }
  | { type: 'zoom'; delta: number }
  | { type: 'floor'; delta: number }
  | { type: 'palette'; step: number }
  | { type: 'toggleFullscreen' }
  | { type: 'toggleDetailed' }
  | { type: 'toggleOverview' }
  | { type: 'toggleHelp' }

export type KeyCommand = ViewCommand | { type: 'quit' } | { type: 'export'; kind: ExportKind; path: string | null }

export interface PathPrompt {
  kind: ExportKind
  input: string
}

const CHARACTER_BINDINGS: Record<string, KeyCommand> = {
  q: { type: 'quit' },
  p: { type: 'togglePause' },
  a: { type: 'toggleStyle' },
  r: { type: 'toggleDensity' },
  m: { type: 'cycleScale' },
  '+': { type: 'zoom', delta: ZOOM_STEP },
  '=': { type: 'zoom', delta: ZOOM_STEP },
  '-': { type: 'zoom', delta: -ZOOM_STEP },
  '[': { type: 'floor', delta: -FLOOR_STEP_DB },
  ']': { type: 'floor', delta: FLOOR_STEP_DB },
  c: { type: 'palette', step: 1 },
  C: { type: 'palette', step: -1 },
  s: { type: 'export', kind: 'image', path: null },
  w: { type: 'export', kind: 'matrix', path: null },
  f: { type: 'toggleFullscreen' },
  d: { type: 'toggleDetailed' },
  o: { type: 'toggleOverview' },
  h: { type: 'toggleHelp' },
}

export const KEY_HELP =
  'q quit  p pause  a style  r render  m scale  +/- zoom  [/] floor  c/C palette  s/S png  w/W csv  f fullscreen  d details  o overview  h help'

/**
 * Maps key presses to commands. `S` and `W` open a path prompt; while it is open, keys edit the
 * path until Enter exports or Escape cancels.
 */
export class KeyDispatcher {
  #prompt: PathPrompt | null = null

  get prompt(): PathPrompt | null {
    return this.#prompt
  }

  handle(key: KeyPress): KeyCommand | null {
    if (this.#prompt) {
      return this.#handlePrompt(this.#prompt, key)
    }
    if (key.ctrl && key.name === 'c') {
      return { type: 'quit' }
    }
    if (key.name === 'escape') {
      return { type: 'quit' }
    }
    if (key.name === 'f1') {
      return { type: 'toggleHelp' }
    }
    const character = key.sequence
    if (character === 'S' || character === 'W') {
      this.#prompt = { kind: character === 'S' ? 'image' : 'matrix', input: '' }
      return null
    }
    return character !== undefined ? (CHARACTER_BINDINGS[character] ?? null) : null
  }

  #handlePrompt(prompt: PathPrompt, key: KeyPress): KeyCommand | null {
    switch (key.name) {
      case 'escape':
        this.#prompt = null
        return null
      case 'return':
      case 'enter': {
        this.#prompt = null
        const path = prompt.input.trim()
        return { type: 'export', kind: prompt.kind, path: path.length > 0 ? path : null }
      }
      case 'backspace':
        this.#prompt = { ...prompt, input: prompt.input.slice(0, -1) }
        return null
      default: {
        const character = key.sequence
        if (!key.ctrl && character !== undefined && character.length === 1 && character >= ' ') {
          this.#prompt = { ...prompt, input: prompt.input + character }
        }
        return null
      }
    }
  }
}

/** Applies a view command to the store; returns false for commands the store does not own. */
export function applyViewCommand(store: ViewStateStore, command: KeyCommand): boolean {
  switch (command.type) {
    case 'togglePause':
      store.togglePause()
      return true
    case 'toggleStyle':
      store.toggleStyle()
      return true
    case 'toggleDensity':
      store.toggleDensity()
      return true
    case 'cycleScale':
      store.cycleScale()
      return true
    case 'zoom':
      store.adjustZoom(command.delta)
      return true
    case 'floor':
      store.adjustFloor(command.delta)
      return true
    case 'palette':
      store.cyclePalette(command.step)
      return true
    case 'toggleFullscreen':
      store.toggleFullscreen()
      return true
    case 'toggleDetailed':
      store.toggleDetailed()
      return true
    case 'toggleOverview':
      store.toggleOverview()
      return true
    case 'toggleHelp':
      store.toggleHelp()
      return true
    case 'quit':
    case 'export':
      return false
  }
}
