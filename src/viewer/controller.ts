import {
  FilterInputError,
  clearFilters,
  formatLevelFilter,
  formatTextMatcher,
  normalizePackageName,
  parseLevelFilter,
  parseTextMatcher
} from "../logcat/filter.ts"

import type { FilterState } from "../logcat/filter.ts"
import type { PromptKind, ViewState } from "./view-state.ts"

/** Shape of a Node `readline` keypress event. */
export interface KeyInput {
  readonly name?: string
  readonly sequence?: string
  readonly ctrl?: boolean
  readonly meta?: boolean
  readonly shift?: boolean
}

export interface RenderSink {
  requestFullRender(): void
  requestStatus(): void
}

export interface InteractiveControllerOptions {
  readonly filter: FilterState
  readonly view: ViewState
  readonly renderer: RenderSink
  readonly onQuit: () => void
  /** Called after the package name changes, before the re-render is requested. */
  readonly onPackageChange?: (packageName: string | null) => void
}

const PROMPT_LABELS = {
  package: "package",
  tag: "tag",
  level: "level (E, W+, VDI)",
  text: "text"
} as const satisfies Record<PromptKind, string>

/**
 * Key-at-a-time command loop. Each key either mutates the filter or view
 * state and asks the renderer to repaint, or edits the inline prompt.
 * Prompts are part of the state, so nothing here ever blocks the tailer.
 */
export class InteractiveController {
  private readonly opts: InteractiveControllerOptions
  private quitting = false

  public constructor(opts: InteractiveControllerOptions) {
    this.opts = opts
  }

  public get isQuitting(): boolean {
    return this.quitting
  }

  public handleKey(key: KeyInput): void {
    if (this.quitting) return

    if (key.ctrl && key.name === "c") {
      this.quit()
      return
    }

    if (this.opts.view.prompt) {
      this.handlePromptKey(key)
      return
    }

    this.handleCommandKey(key)
  }

  private handleCommandKey(key: KeyInput): void {
    const { view, filter, renderer } = this.opts
    if (key.ctrl || key.meta) return

    const hadNotice = view.notice !== null
    view.notice = null

    if (key.name === "escape") {
      if (view.helpVisible) {
        view.helpVisible = false
        renderer.requestFullRender()
      } else if (hadNotice) {
        renderer.requestStatus()
      }
      return
    }

    switch (key.sequence) {
      case "q":
        this.quit()
        return
      case " ":
        view.paused = !view.paused
        if (view.paused) renderer.requestStatus()
        else renderer.requestFullRender()
        return
      case "?":
        view.helpVisible = !view.helpVisible
        renderer.requestFullRender()
        return
      case "p":
        filter.packageFilterEnabled = !filter.packageFilterEnabled
        if (filter.packageFilterEnabled && !filter.packageName) {
          view.notice = { kind: "info", text: "no package name set (press P)" }
        }
        renderer.requestFullRender()
        return
      case "P":
        this.openPrompt("package", filter.packageName ?? "")
        return
      case "t":
        this.openPrompt("tag", formatTextMatcher(filter.tagFilter))
        return
      case "l":
        this.openPrompt("level", formatLevelFilter(filter.levelFilter))
        return
      case "/":
        this.openPrompt("text", formatTextMatcher(filter.textFilter))
        return
      case "c":
        clearFilters(filter, { includePackage: false })
        renderer.requestFullRender()
        return
      case "C":
        clearFilters(filter, { includePackage: true })
        renderer.requestFullRender()
        return
      default:
        if (hadNotice) renderer.requestStatus()
    }
  }

  private handlePromptKey(key: KeyInput): void {
    const { view, renderer } = this.opts
    const prompt = view.prompt
    if (!prompt) return

    if (key.name === "escape") {
      view.prompt = null
      renderer.requestStatus()
      return
    }

    if (key.name === "return" || key.name === "enter") {
      view.prompt = null
      this.commit(prompt.kind, prompt.value)
      return
    }

    if (key.name === "backspace") {
      prompt.value = prompt.value.slice(0, -1)
      renderer.requestStatus()
      return
    }

    if (key.ctrl && key.name === "u") {
      prompt.value = ""
      renderer.requestStatus()
      return
    }

    const text = printableText(key)
    if (text === null) return
    prompt.value += text
    renderer.requestStatus()
  }

  private openPrompt(kind: PromptKind, initial: string): void {
    this.opts.view.prompt = { kind, label: PROMPT_LABELS[kind], value: initial }
    this.opts.renderer.requestStatus()
  }

  /**
   * Applies a prompt value. Invalid input leaves the previous filter in
   * place and shows an inline error.
   */
  public commit(kind: PromptKind, value: string): void {
    const { filter, view, renderer } = this.opts

    try {
      if (kind === "package") {
        const name = normalizePackageName(value)
        filter.packageName = name
        filter.packageFilterEnabled = name !== null
        this.opts.onPackageChange?.(name)
      } else if (kind === "tag") {
        filter.tagFilter = parseTextMatcher(value)
      } else if (kind === "level") {
        filter.levelFilter = parseLevelFilter(value)
      } else {
        filter.textFilter = parseTextMatcher(value)
      }
    } catch (error: unknown) {
      if (!(error instanceof FilterInputError)) throw error
      view.notice = { kind: "error", text: error.message }
      renderer.requestStatus()
      return
    }

    view.notice = null
    renderer.requestFullRender()
  }

  private quit(): void {
    this.quitting = true
    this.opts.view.prompt = null
    this.opts.onQuit()
  }
}

function printableText(key: KeyInput): string | null {
  if (key.ctrl || key.meta) return null
  const seq = key.sequence ?? ""
  if (seq.length === 0) return null
  // Arrow keys and friends arrive as escape sequences.
  if (/[\x00-\x1f\x7f]/.test(seq)) return null
  return seq
}
