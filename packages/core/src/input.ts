export type PointerButton = 'left' | 'middle' | 'right'

export interface ModifierState {
  readonly shift: boolean
  readonly control: boolean
  readonly alt: boolean
}

export type InputEvent =
  | ({ readonly type: 'key-down'; readonly code: string } & ModifierState)
  | ({ readonly type: 'key-up'; readonly code: string } & ModifierState)
  | { readonly type: 'pointer-move'; readonly x: number; readonly y: number }
  | { readonly type: 'pointer-down'; readonly button: PointerButton }
  | { readonly type: 'pointer-up'; readonly button: PointerButton }

export interface PointerPosition {
  readonly x: number
  readonly y: number
}

/**
 * Immutable record of input for one frame. `key` keeps the single-key model
 * applications are written against (the most recent key press wins);
 * `keysDown` carries every key held at capture time for chorded input.
 */
export interface InputSnapshot extends ModifierState {
  readonly key: string | null
  readonly keysDown: ReadonlySet<string>
  readonly mousePosition: PointerPosition
  readonly leftClick: boolean
}

const NO_MODIFIERS: ModifierState = { shift: false, control: false, alt: false }

export const EMPTY_INPUT_SNAPSHOT: InputSnapshot = Object.freeze({
  key: null,
  keysDown: Object.freeze(new Set<string>()),
  mousePosition: Object.freeze({ x: 0, y: 0 }),
  leftClick: false,
  ...NO_MODIFIERS,
})

export interface InputCollectorOptions {
  /**
   * Minimum accumulated time between full captures. Frames inside the window
   * see no key press or click; pending input is delivered at the next full
   * capture.
   */
  readonly intervalMs?: number
}

export const isInputEvent = (event: { readonly type: string }): event is InputEvent =>
  event.type === 'key-down' ||
  event.type === 'key-up' ||
  event.type === 'pointer-move' ||
  event.type === 'pointer-down' ||
  event.type === 'pointer-up'

export class InputCollector {
  private readonly intervalMs: number
  private readonly held = new Set<string>()
  private pendingKey: string | null = null
  private pendingLeftClick = false
  private modifiers: ModifierState = NO_MODIFIERS
  private pointer: PointerPosition = EMPTY_INPUT_SNAPSHOT.mousePosition
  private accumulatedMs = 0

  constructor(options: InputCollectorOptions = {}) {
    const interval = options.intervalMs ?? 0
    if (!Number.isFinite(interval) || interval < 0) {
      throw new RangeError(`Input interval must be >= 0, got ${interval}`)
    }
    this.intervalMs = interval
  }

  push(event: InputEvent): void {
    switch (event.type) {
      case 'key-down':
        this.held.add(event.code)
        this.pendingKey = event.code
        this.modifiers = pickModifiers(event)
        return
      case 'key-up':
        this.held.delete(event.code)
        this.modifiers = pickModifiers(event)
        return
      case 'pointer-move':
        this.pointer = Object.freeze({ x: event.x, y: event.y })
        return
      case 'pointer-down':
        if (event.button === 'left') {
          this.pendingLeftClick = true
        }
        return
      case 'pointer-up':
        return
    }
  }

  capture(elapsedMs: number): InputSnapshot {
    this.accumulatedMs += Math.max(0, elapsedMs)
    const keysDown = Object.freeze(new Set(this.held))

    if (this.intervalMs > 0 && this.accumulatedMs < this.intervalMs) {
      return Object.freeze({
        key: null,
        keysDown,
        mousePosition: this.pointer,
        leftClick: false,
        ...NO_MODIFIERS,
      })
    }

    this.accumulatedMs = 0
    const snapshot: InputSnapshot = Object.freeze({
      key: this.pendingKey,
      keysDown,
      mousePosition: this.pointer,
      leftClick: this.pendingLeftClick,
      ...this.modifiers,
    })
    this.pendingKey = null
    this.pendingLeftClick = false
    return snapshot
  }
}

const pickModifiers = (state: ModifierState): ModifierState => ({
  shift: state.shift,
  control: state.control,
  alt: state.alt,
})
