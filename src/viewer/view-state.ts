import type { TailerStatus } from "./tailer.ts"

export type PromptKind = "package" | "tag" | "level" | "text"

export interface PromptState {
  readonly kind: PromptKind
  readonly label: string
  value: string
}

export type Notice = {
  readonly kind: "info" | "error"
  readonly text: string
}

export interface ViewState {
  /** The tailer keeps buffering while paused; only the visible window freezes. */
  paused: boolean
  helpVisible: boolean
  status: TailerStatus
  notice: Notice | null
  prompt: PromptState | null
}

export function createViewState(init: Partial<ViewState> = {}): ViewState {
  return {
    paused: init.paused ?? false,
    helpVisible: init.helpVisible ?? false,
    status: init.status ?? { state: "opening" },
    notice: init.notice ?? null,
    prompt: init.prompt ?? null
  }
}
