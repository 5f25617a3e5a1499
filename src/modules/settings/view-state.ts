import {
  FREQ_SCALES,
  MAX_ZOOM,
  MIN_ZOOM,
  type AnimationStyle,
  type FreqScale,
  type RenderDensity,
  type SpectrogramConfig,
} from './config'

export interface ViewState {
  version: number
  zoom: number
  freqScale: FreqScale
  style: AnimationStyle
  density: RenderDensity
  dbFloor: number
  dbCeiling: number
  overview: boolean
  paused: boolean
  paletteIndex: number
  fullscreen: boolean
  detailed: boolean
  showHelp: boolean
}

export type ViewStatePatch = Partial<Omit<ViewState, 'version'>>

export interface ViewStateStore {
  get(): ViewState
  set(patch: ViewStatePatch): ViewState
  subscribe(listener: (state: ViewState) => void): () => void
  toggleStyle(): ViewState
  toggleDensity(): ViewState
  cycleScale(): ViewState
  adjustZoom(delta: number): ViewState
  adjustFloor(delta: number): ViewState
  cyclePalette(step: number): ViewState
  toggleOverview(): ViewState
  toggleFullscreen(): ViewState
  togglePause(): ViewState
  toggleDetailed(): ViewState
  toggleHelp(): ViewState
}

export const ZOOM_STEP = 0.25
export const FLOOR_STEP_DB = 2
export const MIN_FLOOR_DB = -140
/** The floor never comes closer than this to the ceiling. */
export const MIN_DISPLAY_RANGE_DB = 10

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max)

export function initialViewState(config: SpectrogramConfig, paletteIndex = 0): ViewState {
  return {
    version: 0,
    zoom: config.zoom,
    freqScale: config.freqScale,
    style: config.style,
    density: config.density,
    dbFloor: config.dbFloor,
    dbCeiling: config.dbCeiling,
    overview: config.overview,
    paused: false,
    paletteIndex,
    fullscreen: config.fullscreen,
    detailed: config.detailed,
    showHelp: false,
  }
}

class InMemoryViewStateStore implements ViewStateStore {
  #state: ViewState
  #paletteCount: number
  #listeners = new Set<(state: ViewState) => void>()

  constructor(initial: ViewState, paletteCount: number) {
    this.#state = Object.freeze({ ...initial })
    this.#paletteCount = Math.max(1, paletteCount)
  }

  get(): ViewState {
    return this.#state
  }

  set(patch: ViewStatePatch): ViewState {
    this.#state = Object.freeze({ ...this.#state, ...patch, version: this.#state.version + 1 })
    this.#listeners.forEach((listener) => listener(this.#state))
    return this.#state
  }

  subscribe(listener: (state: ViewState) => void): () => void {
    this.#listeners.add(listener)
    listener(this.#state)
    return () => this.#listeners.delete(listener)
  }

  toggleStyle(): ViewState {
    return this.set({ style: this.#state.style === 'horizontal' ? 'waterfall' : 'horizontal' })
  }

  toggleDensity(): ViewState {
    return this.set({ density: this.#state.density === 'cell' ? 'half' : 'cell' })
  }

  cycleScale(): ViewState {
    const next = (FREQ_SCALES.indexOf(this.#state.freqScale) + 1) % FREQ_SCALES.length
    return this.set({ freqScale: FREQ_SCALES[next] })
  }

  adjustZoom(delta: number): ViewState {
    return this.set({ zoom: clamp(this.#state.zoom + delta, MIN_ZOOM, MAX_ZOOM) })
  }

  adjustFloor(delta: number): ViewState {
    const { dbFloor, dbCeiling } = this.#state
    return this.set({ dbFloor: clamp(dbFloor + delta, MIN_FLOOR_DB, dbCeiling - MIN_DISPLAY_RANGE_DB) })
  }

  cyclePalette(step: number): ViewState {
    const count = this.#paletteCount
    const next = (((this.#state.paletteIndex + step) % count) + count) % count
    return this.set({ paletteIndex: next })
  }

  toggleOverview(): ViewState {
    return this.set({ overview: !this.#state.overview })
  }

  toggleFullscreen(): ViewState {
    return this.set({ fullscreen: !this.#state.fullscreen })
  }

  togglePause(): ViewState {
    return this.set({ paused: !this.#state.paused })
  }

  toggleDetailed(): ViewState {
    return this.set({ detailed: !this.#state.detailed })
  }

  toggleHelp(): ViewState {
    return this.set({ showHelp: !this.#state.showHelp })
  }
}

export function createViewStateStore(initial: ViewState, paletteCount: number): ViewStateStore {
  return new InMemoryViewStateStore(initial, paletteCount)
}
