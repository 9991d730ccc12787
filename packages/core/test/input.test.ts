import { describe, expect, it } from 'vitest'
import { InputCollector, type InputEvent, isInputEvent } from '../src/input'

const keyDown = (code: string, shift = false): InputEvent => ({
  type: 'key-down',
  code,
  shift,
  control: false,
  alt: false,
})

const keyUp = (code: string): InputEvent => ({
  type: 'key-up',
  code,
  shift: false,
  control: false,
  alt: false,
})

describe('InputCollector', () => {
  it('reports the last key pressed in a frame', () => {
    const collector = new InputCollector()
    collector.push(keyDown('KeyA'))
    collector.push(keyDown('KeyB', true))
    const snapshot = collector.capture(16)
    expect(snapshot.key).toBe('KeyB')
    expect(snapshot.shift).toBe(true)
    expect([...snapshot.keysDown].sort()).toEqual(['KeyA', 'KeyB'])
  })

  it('clears the pressed key and click after they are captured', () => {
    const collector = new InputCollector()
    collector.push(keyDown('Space'))
    collector.push({ type: 'pointer-down', button: 'left' })
    const first = collector.capture(16)
    const second = collector.capture(16)
    expect(first.key).toBe('Space')
    expect(first.leftClick).toBe(true)
    expect(second.key).toBeNull()
    expect(second.leftClick).toBe(false)
    expect([...second.keysDown]).toEqual(['Space'])
  })

  it('ignores presses of buttons other than the left one for leftClick', () => {
    const collector = new InputCollector()
    collector.push({ type: 'pointer-down', button: 'right' })
    expect(collector.capture(16).leftClick).toBe(false)
  })

  it('removes released keys from the held set', () => {
    const collector = new InputCollector()
    collector.push(keyDown('ArrowUp'))
    collector.push(keyUp('ArrowUp'))
    const snapshot = collector.capture(16)
    expect(snapshot.key).toBe('ArrowUp')
    expect(snapshot.keysDown.size).toBe(0)
  })

  it('keeps the pointer position across frames', () => {
    const collector = new InputCollector()
    collector.push({ type: 'pointer-move', x: 12, y: 40 })
    collector.capture(16)
    expect(collector.capture(16).mousePosition).toEqual({ x: 12, y: 40 })
  })

  it('holds key presses until the capture interval elapses', () => {
    const collector = new InputCollector({ intervalMs: 50 })
    collector.push(keyDown('KeyQ'))
    collector.push({ type: 'pointer-move', x: 3, y: 4 })

    const early = collector.capture(20)
    expect(early.key).toBeNull()
    expect(early.mousePosition).toEqual({ x: 3, y: 4 })
    expect(early.keysDown.has('KeyQ')).toBe(true)

    const stillEarly = collector.capture(20)
    expect(stillEarly.key).toBeNull()

    const due = collector.capture(20)
    expect(due.key).toBe('KeyQ')

    expect(collector.capture(20).key).toBeNull()
  })

  it('returns frozen snapshots', () => {
    const snapshot = new InputCollector().capture(0)
    expect(Object.isFrozen(snapshot)).toBe(true)
  })

  it('rejects negative intervals', () => {
    expect(() => new InputCollector({ intervalMs: -1 })).toThrow(RangeError)
  })

  it('recognises input events among window events', () => {
    expect(isInputEvent({ type: 'pointer-up' })).toBe(true)
    expect(isInputEvent({ type: 'resize' })).toBe(false)
  })
})
