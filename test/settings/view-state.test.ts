import { describe, expect, it } from 'vitest'
import { resolveConfig } from '../../src/modules/settings/config'
import { createViewStateStore, initialViewState, type ViewState } from '../../src/modules/settings/view-state'

const createStore = () => createViewStateStore(initialViewState(resolveConfig()), 8)

describe('view state store', () => {
  it('starts at version 0 from the configuration', () => {
    const state = createStore().get()
    expect(state.version).toBe(0)
    expect(state.zoom).toBe(1)
    expect(state.style).toBe('waterfall')
    expect(state.paused).toBe(false)
    expect(Object.isFrozen(state)).toBe(true)
  })

  it('bumps the version and notifies subscribers on every change', () => {
    const store = createStore()
    const seen: ViewState[] = []
    const unsubscribe = store.subscribe((state) => seen.push(state))
    store.togglePause()
    store.toggleStyle()
    unsubscribe()
    store.toggleOverview()

    expect(seen.map((state) => state.version)).toEqual([0, 1, 2])
    expect(seen[2].paused).toBe(true)
    expect(seen[2].style).toBe('horizontal')
    expect(store.get().version).toBe(3)
  })

  it('clamps zoom to [1, 64]', () => {
    const store = createStore()
    expect(store.adjustZoom(-0.25).zoom).toBe(1)
    expect(store.adjustZoom(0.25).zoom).toBe(1.25)
    expect(store.adjustZoom(100).zoom).toBe(64)
  })

  it('keeps the floor between -140 dB and 10 dB under the ceiling', () => {
    const store = createStore()
    expect(store.adjustFloor(2).dbFloor).toBe(-78)
    expect(store.adjustFloor(100).dbFloor).toBe(-10)
    expect(store.adjustFloor(-500).dbFloor).toBe(-140)
  })

  it('wraps the palette index in both directions', () => {
    const store = createStore()
    expect(store.cyclePalette(-1).paletteIndex).toBe(7)
    expect(store.cyclePalette(1).paletteIndex).toBe(0)
    expect(store.cyclePalette(9).paletteIndex).toBe(1)
  })

  it('cycles frequency scales and toggles density', () => {
    const store = createStore()
    expect(store.cycleScale().freqScale).toBe('log')
    expect(store.cycleScale().freqScale).toBe('mel')
    expect(store.cycleScale().freqScale).toBe('linear')
    expect(store.toggleDensity().density).toBe('half')
  })
})
